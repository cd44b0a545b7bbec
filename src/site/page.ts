/**
 * Page assembly: one complete HTML document per page or blog post
 */

import type { BlogPost, Page } from '../content/types.js';
import { OUTPUT_LAYOUT, ROOT_SLUG, blogPostOutputPath, outputPathFor, relativeLink } from '../utils/paths.js';
import { escapeHtml, fillTemplate } from '../utils/text.js';
import {
  BLOG_SLUG,
  CONTACT_SLUG,
  joinFragments,
  pageHref,
  renderBlogIndex,
  renderFooter,
  renderHeader,
  renderHero,
  renderLinkTags,
  renderNewsletter,
  renderPageBody,
  renderParagraphs,
  renderSection,
  renderStatementArt,
  resolveHero,
} from './fragments.js';
import type { RenderContext } from './fragments.js';
import { renderHomeMain } from './layouts.js';
import type { Theme } from './theme.js';

export interface RenderedDocument {
  /** Output path relative to the output root */
  path: string;
  html: string;
}

interface DocumentParts {
  title: string;
  from: string;
  activeSlug: string;
  main: string;
}

function renderDocument(ctx: RenderContext, theme: Theme, parts: DocumentParts): string {
  const { site } = ctx;
  const { from } = parts;
  return fillTemplate(theme.pageTemplate, {
    title: escapeHtml(parts.title),
    description: escapeHtml(site.metaDescription),
    cssHref: escapeHtml(relativeLink(from, OUTPUT_LAYOUT.CSS_FILE)),
    jsHref: escapeHtml(relativeLink(from, OUTPUT_LAYOUT.JS_FILE)),
    newsletterMode: escapeHtml(site.newsletterMode),
    newsletterUrl: escapeHtml(site.newsletterProviderUrl),
    header: renderHeader(ctx, parts.activeSlug, from),
    main: parts.main,
    footer: renderFooter(ctx, from),
  });
}

/**
 * Render one page of the page table
 */
export function renderPage(ctx: RenderContext, theme: Theme, page: Page): RenderedDocument {
  const from = outputPathFor(page.slug);
  const hero = resolveHero(ctx, page, from);
  const sectionsHtml = joinFragments(
    ...page.sections.slice(1).map((section) => renderSection(ctx, section, page.slug, from))
  );
  const hasNewsletter = page.slug === ROOT_SLUG || page.slug === CONTACT_SLUG;
  const newsletterHtml = hasNewsletter ? renderNewsletter(ctx.site, from) : '';

  let main: string;
  if (page.slug === ROOT_SLUG) {
    main = renderHomeMain({ ctx, from, hero, sectionsHtml, newsletterHtml });
  } else {
    main = joinFragments(
      renderHero(ctx.site, hero, renderStatementArt()),
      sectionsHtml,
      renderPageBody(
        page.slug === BLOG_SLUG ? renderBlogIndex(ctx.posts, from) : '',
        newsletterHtml,
        page.slug === CONTACT_SLUG ? renderLinkTags(ctx.links) : ''
      )
    );
  }

  return {
    path: from,
    html: renderDocument(ctx, theme, { title: page.title, from, activeSlug: page.slug, main }),
  };
}

/**
 * Render one blog post at blog/<slug>/index.html
 */
export function renderBlogPost(ctx: RenderContext, theme: Theme, post: BlogPost): RenderedDocument {
  const from = blogPostOutputPath(post.slug);
  const backHref = pageHref(from, BLOG_SLUG);

  const main = joinFragments(
    '<section class="page-hero">',
    '  <div class="page-hero-inner">',
    '    <p class="eyebrow">Blog</p>',
    `    <h1>${escapeHtml(post.title)}</h1>`,
    `    <p class="post-date">${escapeHtml(post.date)}</p>`,
    '  </div>',
    '</section>',
    '<section class="page-body">',
    '  <div class="content-block">',
    renderParagraphs(post.body),
    `    <a class="button ghost" href="${escapeHtml(backHref)}">Back to blog</a>`,
    '  </div>',
    '</section>'
  );

  return {
    path: from,
    html: renderDocument(ctx, theme, { title: post.title, from, activeSlug: BLOG_SLUG, main }),
  };
}
