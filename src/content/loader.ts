/**
 * Content loader: reads the content directory into a SiteContent
 * pages.csv is required; site.json, links.csv, blog/ are optional
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import * as Papa from 'papaparse';
import { z } from 'zod';
import type { LinkEntry, Page, Section, SiteConfig, SiteContent } from './types.js';
import {
  DEFAULT_SITE_CONFIG,
  linkRowSchema,
  pageRowSchema,
  parseOrder,
  siteConfigFileSchema,
} from './schema.js';
import type { PageRow } from './schema.js';
import { readBlogPosts } from './blog.js';
import { isValidPageSlug, normalizeSlug, ROOT_SLUG } from '../utils/paths.js';
import { splitBullets } from '../utils/text.js';
import { ContentMissingError, InvalidContentError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Canonical content directory layout
 */
export const CONTENT_LAYOUT = {
  PAGES_FILE: 'pages.csv',
  SITE_FILE: 'site.json',
  LINKS_FILE: 'links.csv',
  BLOG_DIR: 'blog',
  MEDIA_DIR: 'media',
} as const;

async function readOptionalFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse CSV text with a header row into validated records
 */
export function parseCsv<S extends z.ZodTypeAny>(text: string, rowSchema: S, source: string): z.output<S>[] {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim(),
    transform: (value) => value.trim(),
  });

  const fatal = result.errors.find((error) => error.type === 'Quotes');
  if (fatal) {
    throw InvalidContentError.fromInvalidShape(source, `row ${fatal.row ?? '?'}: ${fatal.message}`);
  }

  const rows = z.array(rowSchema).safeParse(result.data);
  if (!rows.success) {
    throw InvalidContentError.fromInvalidShape(source, describeZodError(rows.error));
  }
  return rows.data;
}

/**
 * "about-us" -> "About-Us"
 */
function titleFromSlug(slug: string): string {
  return slug.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) =>
    `${before}${letter.toUpperCase()}`
  );
}

function toSection(row: PageRow): Section {
  return {
    id: row.section_id,
    order: parseOrder(row.order),
    heading: row.heading,
    body: row.body,
    ctaText: row.cta_text,
    ctaUrl: row.cta_url,
    image: row.hero_image,
    bullets: splitBullets(row.bullets),
  };
}

/**
 * Group page-table rows into pages.
 * The last non-empty page_title wins; sections are sorted by order, ties keep row order.
 * Throws InvalidContentError for slugs that are not safe output directories.
 */
export function buildPages(rows: readonly PageRow[], source: string = CONTENT_LAYOUT.PAGES_FILE): Map<string, Page> {
  const drafts = new Map<string, { title: string; sections: Section[] }>();

  for (const row of rows) {
    const slug = normalizeSlug(row.page_slug);
    if (!isValidPageSlug(slug)) {
      throw InvalidContentError.fromUnsafeSlug(source, slug);
    }
    let draft = drafts.get(slug);
    if (!draft) {
      draft = { title: titleFromSlug(slug) || 'Home', sections: [] };
      drafts.set(slug, draft);
    }
    if (row.page_title) {
      draft.title = row.page_title;
    }
    draft.sections.push(toSection(row));
  }

  const pages = new Map<string, Page>();
  for (const [slug, draft] of drafts) {
    pages.set(slug, {
      slug,
      title: draft.title,
      sections: [...draft.sections].sort((a, b) => a.order - b.order),
    });
  }
  return pages;
}

export async function readPages(contentDir: string): Promise<Map<string, Page>> {
  const path = join(contentDir, CONTENT_LAYOUT.PAGES_FILE);
  const text = await readOptionalFile(path);
  if (text === null) {
    throw ContentMissingError.fromMissingPages(path);
  }
  const pages = buildPages(parseCsv(text, pageRowSchema, path), path);
  getLogger().debug(`Loaded ${pages.size} pages from ${path}`);
  if (!pages.has(ROOT_SLUG)) {
    getLogger().warn(`${path} has no root page; index.html will not be written`);
  }
  return pages;
}

export async function readSiteConfig(contentDir: string): Promise<SiteConfig> {
  const path = join(contentDir, CONTENT_LAYOUT.SITE_FILE);
  const text = await readOptionalFile(path);
  if (text === null) {
    getLogger().debug(`No ${CONTENT_LAYOUT.SITE_FILE}; using default site config`);
    return DEFAULT_SITE_CONFIG;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw InvalidContentError.fromMalformedJson(path, reason);
  }

  const parsed = siteConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    throw InvalidContentError.fromInvalidShape(path, describeZodError(parsed.error));
  }
  return parsed.data;
}

/**
 * Rows without a label are skipped; sorted by order, ties keep row order
 */
export async function readLinks(contentDir: string): Promise<LinkEntry[]> {
  const path = join(contentDir, CONTENT_LAYOUT.LINKS_FILE);
  const text = await readOptionalFile(path);
  if (text === null) {
    return [];
  }

  return parseCsv(text, linkRowSchema, path)
    .filter((row) => row.label !== '')
    .map((row): LinkEntry => ({
      label: row.label,
      url: row.url,
      kind: row.kind,
      order: parseOrder(row.order),
    }))
    .sort((a, b) => a.order - b.order);
}

/**
 * Load everything a build needs. Nothing is rendered until this resolves,
 * so the set of known slugs is fixed before any link is resolved.
 */
export async function loadContent(contentDir: string): Promise<SiteContent> {
  const logger = getLogger();
  logger.phaseStart('load content');

  const pages = await readPages(contentDir);
  const site = await readSiteConfig(contentDir);
  const links = await readLinks(contentDir);
  const posts = await readBlogPosts(join(contentDir, CONTENT_LAYOUT.BLOG_DIR));

  logger.phaseComplete(
    'Load content',
    `${pages.size} pages, ${links.length} links, ${posts.length} blog posts`
  );

  return { pages, site, links, posts };
}
