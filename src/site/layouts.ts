/**
 * Homepage layouts, one pure function per layout variant
 */

import type { LayoutVariant } from '../content/types.js';
import { escapeHtml } from '../utils/text.js';
import {
  joinFragments,
  renderHero,
  renderLinkButtons,
  renderOverview,
  renderPageBody,
  renderParagraphs,
  renderStatementArt,
} from './fragments.js';
import type { HeroContent, RenderContext } from './fragments.js';
import { PROFILE_ART_TITLE, PROFILE_CARDS, SELECTED_OUTPUTS, SELECTED_OUTPUTS_TITLE } from './placeholders.js';

/**
 * Everything a homepage layout may draw from, already resolved for the root page
 */
export interface HomeView {
  ctx: RenderContext;
  /** Output path of the homepage */
  from: string;
  hero: HeroContent;
  /** Sections after the hero, rendered */
  sectionsHtml: string;
  newsletterHtml: string;
}

export type HomeLayout = (view: HomeView) => string;

function renderStandardHome(view: HomeView): string {
  const { ctx, from, hero } = view;
  return joinFragments(
    renderHero(ctx.site, hero, renderStatementArt()),
    renderOverview(ctx, from),
    view.sectionsHtml,
    renderPageBody(view.newsletterHtml)
  );
}

function renderLinkhubHome(view: HomeView): string {
  const { site, links } = view.ctx;
  return joinFragments(
    '<section class="linkhub">',
    '  <div class="linkhub-inner">',
    `    <p class="eyebrow">${escapeHtml(site.name)}</p>`,
    `    <h1>${escapeHtml(view.hero.heading)}</h1>`,
    site.tagline ? `    <p class="subtitle">${escapeHtml(site.tagline)}</p>` : '',
    renderParagraphs(site.contactBlurb),
    renderLinkButtons(links),
    view.newsletterHtml,
    '  </div>',
    '</section>'
  );
}

function renderProfileHome(view: HomeView): string {
  const { site } = view.ctx;
  const art = joinFragments(
    `<h3>${escapeHtml(PROFILE_ART_TITLE)}</h3>`,
    site.contactBlurb ? `<p>${escapeHtml(site.contactBlurb)}</p>` : ''
  );
  const cards = PROFILE_CARDS.map(
    (card) => `<div class="profile-card"><h3>${escapeHtml(card.title)}</h3><p>${escapeHtml(card.text)}</p></div>`
  ).join('');
  const outputs = SELECTED_OUTPUTS.map((item) => `<li>${escapeHtml(item)}</li>`).join('');

  return joinFragments(
    renderHero(site, view.hero, art),
    '<section class="profile-section">',
    `  <div class="profile-grid">${cards}</div>`,
    '</section>',
    '<section class="profile-section">',
    '  <div class="content-block reveal">',
    `    <h2>${escapeHtml(SELECTED_OUTPUTS_TITLE)}</h2>`,
    `    <ul class="outputs-list">${outputs}</ul>`,
    view.newsletterHtml,
    '  </div>',
    '</section>'
  );
}

export const HOME_LAYOUTS: Readonly<Record<LayoutVariant, HomeLayout>> = {
  standard: renderStandardHome,
  linkhub: renderLinkhubHome,
  profile: renderProfileHome,
};

export function renderHomeMain(view: HomeView): string {
  return HOME_LAYOUTS[view.ctx.site.layoutVariant](view);
}
