/**
 * HTML fragments shared by every page: header, footer, hero, sections, link lists,
 * newsletter form and blog index.
 *
 * Every fragment takes the output path of the page it is rendered into (`from`) and
 * builds internal links with relativeLink, so the same fragment is correct at any depth.
 * All content values go through escapeHtml.
 */

import type { BlogPost, LinkEntry, Page, Section, SiteConfig } from '../content/types.js';
import {
  OUTPUT_LAYOUT,
  ROOT_SLUG,
  assetOutputPath,
  blogPostOutputPath,
  outputPathFor,
  relativeLink,
  resolveCtaUrl,
} from '../utils/paths.js';
import { escapeHtml, splitParagraphs } from '../utils/text.js';
import { DEFAULT_HERO_IMAGE, HERO_METRICS, HERO_STATEMENT } from './placeholders.js';

/**
 * Read-only inputs of one build, passed explicitly to every render call
 */
export interface RenderContext {
  readonly site: SiteConfig;
  readonly pages: ReadonlyMap<string, Page>;
  readonly links: readonly LinkEntry[];
  readonly posts: readonly BlogPost[];
}

export const BLOG_SLUG = 'blog';
export const CONTACT_SLUG = 'contact';
export const NAV_SLUGS: readonly string[] = [ROOT_SLUG, 'about', 'research', 'projects', BLOG_SLUG, CONTACT_SLUG];
export const LEGAL_SLUGS: readonly string[] = ['privacy', 'imprint'];

const OVERVIEW_EXCLUDED = new Set<string>([ROOT_SLUG, BLOG_SLUG, CONTACT_SLUG, ...LEGAL_SLUGS]);

/**
 * Join non-empty fragments with newlines
 */
export function joinFragments(...parts: string[]): string {
  return parts.filter((part) => part !== '').join('\n');
}

export function pageHref(from: string, slug: string): string {
  return relativeLink(from, outputPathFor(slug));
}

export function imageHref(from: string, fileName: string): string {
  return relativeLink(from, assetOutputPath('img', fileName));
}

export function renderParagraphs(text: string): string {
  return splitParagraphs(text)
    .map((paragraph) => `<p>${escapeHtml(paragraph)}</p>`)
    .join('\n');
}

/**
 * "Open Science Lab" -> "OSL"
 */
export function siteInitials(name: string): string {
  const initials = name
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase())
    .join('');
  return initials || 'Home';
}

export function renderHeader(ctx: RenderContext, activeSlug: string, from: string): string {
  const navLinks: string[] = [];
  for (const slug of NAV_SLUGS) {
    const page = ctx.pages.get(slug);
    if (!page) {
      continue;
    }
    const attrs = slug === activeSlug ? ' class="active" aria-current="page"' : '';
    navLinks.push(`<a${attrs} href="${escapeHtml(pageHref(from, slug))}">${escapeHtml(page.title)}</a>`);
  }

  const contactHref = ctx.pages.has(CONTACT_SLUG) ? pageHref(from, CONTACT_SLUG) : '#';

  return joinFragments(
    '<header class="site-header">',
    `  <a class="logo" href="${escapeHtml(pageHref(from, ROOT_SLUG))}">${escapeHtml(siteInitials(ctx.site.name))}</a>`,
    `  <nav class="nav">${navLinks.join('')}</nav>`,
    `  <a class="cta" href="${escapeHtml(contactHref)}">Get in touch</a>`,
    '</header>'
  );
}

/**
 * Link list as tags (footer and contact page)
 */
export function renderLinkTags(links: readonly LinkEntry[]): string {
  if (links.length === 0) {
    return '';
  }
  const items = links.map((link) => {
    const className = link.kind === 'placeholder' ? 'tag' : 'tag primary';
    return `<a class="${className}" href="${escapeHtml(link.url)}" rel="noopener">${escapeHtml(link.label)}</a>`;
  });
  return `<div class="tag-list">${items.join('')}</div>`;
}

/**
 * Link list as a vertical column of buttons (linkhub homepage)
 */
export function renderLinkButtons(links: readonly LinkEntry[]): string {
  if (links.length === 0) {
    return '';
  }
  const items = links.map((link) => {
    const className = link.kind === 'placeholder' ? 'linkhub-link placeholder' : 'linkhub-link';
    return `<a class="${className}" href="${escapeHtml(link.url)}" rel="noopener">${escapeHtml(link.label)}</a>`;
  });
  return `<div class="linkhub-links">${items.join('')}</div>`;
}

function domainHref(domain: string): string {
  return /^[a-z][a-z0-9+.-]*:/i.test(domain) ? domain : `https://${domain}`;
}

export function renderFooter(ctx: RenderContext, from: string): string {
  const { site } = ctx;

  const legalLinks: string[] = [];
  for (const slug of LEGAL_SLUGS) {
    const page = ctx.pages.get(slug);
    if (page) {
      legalLinks.push(`<a href="${escapeHtml(pageHref(from, slug))}">${escapeHtml(page.title)}</a>`);
    }
  }

  const domain = site.domain
    ? `      <p><a href="${escapeHtml(domainHref(site.domain))}">${escapeHtml(site.domain)}</a></p>`
    : '';

  return joinFragments(
    '<footer class="site-footer">',
    '  <div class="footer-grid">',
    '    <div>',
    `      <p class="footer-title">${escapeHtml(site.name)}</p>`,
    site.address ? `      <p>${escapeHtml(site.address)}</p>` : '',
    site.footerNote ? `      <p>${escapeHtml(site.footerNote)}</p>` : '',
    domain,
    '    </div>',
    '    <div>',
    '      <p class="footer-title">Elsewhere</p>',
    renderLinkTags(ctx.links),
    '    </div>',
    '    <div>',
    '      <p class="footer-title">Legal</p>',
    `      <div class="footer-links">${legalLinks.join('')}</div>`,
    '    </div>',
    '  </div>',
    '</footer>'
  );
}

/**
 * Newsletter form. Posts to the bundled endpoint unless the site is configured
 * for a provider and has its URL.
 */
export function renderNewsletter(site: SiteConfig, from: string): string {
  const endpoint =
    site.newsletterMode === 'local' || !site.newsletterProviderUrl
      ? relativeLink(from, OUTPUT_LAYOUT.SUBSCRIBE_ENDPOINT)
      : site.newsletterProviderUrl;

  return joinFragments(
    '<div class="newsletter" id="newsletter">',
    '  <div>',
    '    <h3>Newsletter</h3>',
    '    <p>Subscribe for updates, events, and highlights.</p>',
    '  </div>',
    `  <form class="newsletter-form" data-newsletter-form action="${escapeHtml(endpoint)}" method="post">`,
    '    <label class="sr-only" for="newsletter-email">Email</label>',
    '    <input id="newsletter-email" name="email" type="email" placeholder="you@example.org" required />',
    '    <button class="button" type="submit">Subscribe</button>',
    '    <p class="form-status" aria-live="polite"></p>',
    '  </form>',
    '</div>'
  );
}

/**
 * Bullet list; with linkEmails, items containing "@" become mailto links
 */
export function renderBullets(items: readonly string[], linkEmails: boolean): string {
  if (items.length === 0) {
    return '';
  }
  const rendered = items.map((item) => {
    const safe = escapeHtml(item);
    if (linkEmails && item.includes('@')) {
      return `<li><a href="mailto:${safe}">${safe}</a></li>`;
    }
    return `<li>${safe}</li>`;
  });
  return `<ul class="bullet-list">${rendered.join('')}</ul>`;
}

function renderCta(ctx: RenderContext, text: string, rawUrl: string, from: string, className: string): string {
  const href = resolveCtaUrl(rawUrl, ctx.pages, from);
  if (!text || !href) {
    return '';
  }
  return `<a class="${className}" href="${escapeHtml(href)}">${escapeHtml(text)}</a>`;
}

function renderFigure(from: string, imageName: string, heading: string): string {
  const src = imageHref(from, imageName || DEFAULT_HERO_IMAGE);
  return `<figure class="image-frame"><img src="${escapeHtml(src)}" alt="${escapeHtml(`${heading} image`)}" /></figure>`;
}

/**
 * A non-hero content section
 */
export function renderSection(ctx: RenderContext, section: Section, pageSlug: string, from: string): string {
  const idAttr = section.id ? ` id="${escapeHtml(section.id)}"` : '';
  return joinFragments(
    `<section class="content-section reveal"${idAttr}>`,
    '  <div class="content-grid">',
    '    <div>',
    `      <h2>${escapeHtml(section.heading)}</h2>`,
    renderParagraphs(section.body),
    renderBullets(section.bullets, pageSlug === CONTACT_SLUG),
    renderCta(ctx, section.ctaText, section.ctaUrl, from, 'button ghost'),
    '    </div>',
    `    ${renderFigure(from, section.image, section.heading)}`,
    '  </div>',
    '</section>'
  );
}

/**
 * Hero inputs taken from the page's first section
 */
export interface HeroContent {
  heading: string;
  bodyHtml: string;
  ctaHtml: string;
  figureHtml: string;
}

const EMPTY_SECTION: Section = {
  id: '',
  order: 0,
  heading: '',
  body: '',
  ctaText: '',
  ctaUrl: '',
  image: '',
  bullets: [],
};

export function resolveHero(ctx: RenderContext, page: Page, from: string): HeroContent {
  const first = page.sections[0] ?? EMPTY_SECTION;
  const heading = first.heading || page.title;
  return {
    heading,
    bodyHtml: renderParagraphs(first.body),
    ctaHtml: renderCta(ctx, first.ctaText, first.ctaUrl, from, 'button'),
    figureHtml: renderFigure(from, first.image, heading),
  };
}

/**
 * Default card beside the hero copy
 */
export function renderStatementArt(): string {
  const metrics = HERO_METRICS.map(
    (metric) => `<div><span>${escapeHtml(metric.value)}</span>${escapeHtml(metric.label)}</div>`
  ).join('');
  return joinFragments(
    `<h3>${escapeHtml(HERO_STATEMENT.title)}</h3>`,
    `<p>${escapeHtml(HERO_STATEMENT.text)}</p>`,
    `<div class="hero-metrics">${metrics}</div>`
  );
}

export function renderHero(site: SiteConfig, hero: HeroContent, artHtml: string): string {
  return joinFragments(
    '<section class="hero">',
    '  <div class="hero-orbit"></div>',
    '  <div class="hero-inner">',
    '    <div>',
    `      <p class="eyebrow">${escapeHtml(site.name)}</p>`,
    `      <h1>${escapeHtml(hero.heading)}</h1>`,
    site.tagline ? `      <p class="subtitle">${escapeHtml(site.tagline)}</p>` : '',
    hero.bodyHtml,
    hero.ctaHtml ? `      <div class="hero-actions">${hero.ctaHtml}</div>` : '',
    '    </div>',
    '    <div class="hero-art">',
    `      ${hero.figureHtml}`,
    artHtml,
    '    </div>',
    '  </div>',
    '</section>'
  );
}

/**
 * One card per content page (not the root, blog, contact or legal pages)
 */
export function renderOverview(ctx: RenderContext, from: string): string {
  const cards: string[] = [];
  for (const page of ctx.pages.values()) {
    if (OVERVIEW_EXCLUDED.has(page.slug)) {
      continue;
    }
    const teaser = splitParagraphs(page.sections[0]?.body ?? '')[0] ?? `Explore ${page.title}.`;
    cards.push(
      `<a class="card" href="${escapeHtml(pageHref(from, page.slug))}"><h3>${escapeHtml(page.title)}</h3><p>${escapeHtml(teaser)}</p></a>`
    );
  }
  if (cards.length === 0) {
    return '';
  }
  return joinFragments(
    '<section class="overview">',
    `  <div class="card-grid">${cards.join('')}</div>`,
    '</section>'
  );
}

export function renderBlogIndex(posts: readonly BlogPost[], from: string): string {
  if (posts.length === 0) {
    return '<p>No posts yet. Add a file to the blog folder to publish the first update.</p>';
  }
  const cards = posts.map((post) => {
    const href = relativeLink(from, blogPostOutputPath(post.slug));
    const teaser = splitParagraphs(post.body)[0] ?? '';
    return joinFragments(
      '<article class="post-card">',
      `  <p class="post-date">${escapeHtml(post.date)}</p>`,
      `  <h3><a href="${escapeHtml(href)}">${escapeHtml(post.title)}</a></h3>`,
      teaser ? `  <p>${escapeHtml(teaser)}</p>` : '',
      '</article>'
    );
  });
  return `<div class="post-grid">\n${cards.join('\n')}\n</div>`;
}

/**
 * Closing content block (blog index, newsletter, contact links); empty when nothing to show
 */
export function renderPageBody(...parts: string[]): string {
  const inner = joinFragments(...parts);
  if (!inner) {
    return '';
  }
  return joinFragments(
    '<section class="page-body">',
    '  <div class="content-block reveal">',
    inner,
    '  </div>',
    '</section>'
  );
}
