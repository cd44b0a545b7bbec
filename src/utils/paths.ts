/**
 * Path utilities and naming policy for output layout
 * Defines the output tree, slug normalization, and relative link math
 */

import { createHash } from 'crypto';
import { posix } from 'path';

/**
 * Canonical output layout structure (paths relative to the output root)
 */
export const OUTPUT_LAYOUT = {
  /** Page file inside every page directory */
  INDEX_FILE: 'index.html',
  /** Shared CSS/JS/image assets */
  ASSETS_DIR: 'assets',
  CSS_FILE: 'assets/css/style.css',
  JS_FILE: 'assets/js/main.js',
  IMG_DIR: 'assets/img',
  /** Blog index page and post directories */
  BLOG_DIR: 'blog',
  /** Newsletter endpoint served next to the site */
  SUBSCRIBE_ENDPOINT: 'subscribe',
} as const;

export const ROOT_SLUG = '';

const ROOT_ALIASES = new Set(['', 'index', 'home']);

/**
 * Anything that can answer "is this slug a known page?"
 */
export interface SlugTable {
  has(slug: string): boolean;
}

/**
 * Normalize a page identifier to its canonical slug.
 * Trims whitespace and edge slashes; "", "/", "index" and "home" all map to the root slug.
 * Case is preserved.
 */
export function normalizeSlug(raw: string): string {
  const slug = (raw ?? '').trim().replace(/^\/+|\/+$/g, '');
  return ROOT_ALIASES.has(slug) ? ROOT_SLUG : slug;
}

/**
 * Validate a normalized page slug before it becomes an output directory.
 * Every "/"-separated segment must be non-empty and neither "." nor "..";
 * backslashes are not allowed anywhere.
 */
export function isValidPageSlug(slug: string): boolean {
  if (slug === ROOT_SLUG) {
    return true;
  }

  if (slug.includes('\\')) {
    return false;
  }

  return slug.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..');
}

/**
 * Output location of a page: index.html for the root, <slug>/index.html otherwise
 */
export function outputPathFor(slug: string): string {
  if (slug === ROOT_SLUG) {
    return OUTPUT_LAYOUT.INDEX_FILE;
  }
  return posix.join(slug, OUTPUT_LAYOUT.INDEX_FILE);
}

/**
 * Output location of a blog post: blog/<slug>/index.html
 */
export function blogPostOutputPath(postSlug: string): string {
  return posix.join(OUTPUT_LAYOUT.BLOG_DIR, postSlug, OUTPUT_LAYOUT.INDEX_FILE);
}

/**
 * Output location of a file under assets/
 */
export function assetOutputPath(...segments: string[]): string {
  return posix.join(OUTPUT_LAYOUT.ASSETS_DIR, ...segments);
}

/**
 * Relative path from the directory containing `fromOutputPath` to `toOutputPath`
 */
export function relativeLink(fromOutputPath: string, toOutputPath: string): string {
  return posix.relative(posix.dirname(fromOutputPath), toOutputPath);
}

/**
 * Resolve a call-to-action target as written in the content files.
 * Absolute URLs, mailto: and #fragments pass through; known slugs become relative links;
 * anything else is returned as written.
 */
export function resolveCtaUrl(raw: string, knownSlugs: SlugTable, fromOutputPath: string): string {
  if (!raw) {
    return '';
  }
  if (raw.startsWith('http') || raw.startsWith('mailto:') || raw.startsWith('#')) {
    return raw;
  }
  const slug = normalizeSlug(raw);
  if (knownSlugs.has(slug)) {
    return relativeLink(fromOutputPath, outputPathFor(slug));
  }
  return raw;
}

/**
 * Slug for a blog post file stem
 * - Drop everything except ASCII letters, digits, whitespace and hyphens
 * - Whitespace runs become a single hyphen
 * - Lowercase, "post" when nothing is left
 */
export function slugifyName(text: string): string {
  const cleaned = (text ?? '')
    .replace(/[^a-zA-Z0-9\s-]/g, '')
    .trim()
    .replace(/\s+/g, '-');
  return cleaned.toLowerCase() || 'post';
}

/**
 * Deterministic 6-character hash suffix for collision handling
 */
function generateHashSuffix(input: string): string {
  const hash = createHash('sha256').update(input).digest('hex');
  return hash.substring(0, 6);
}

/**
 * Claim a collision-free slug.
 * The first claimant keeps the base slug; a different id asking for a taken slug
 * gets a hash suffix of its id, then a numeric suffix if that is taken too.
 * Claiming again with the same id is idempotent.
 *
 * @param registry - Map of claimed slugs to the id that claimed them
 */
export function claimSlug(baseSlug: string, id: string, registry: Map<string, string>): string {
  const owner = registry.get(baseSlug);
  if (owner === undefined) {
    registry.set(baseSlug, id);
    return baseSlug;
  }
  if (owner === id) {
    return baseSlug;
  }

  const hashed = `${baseSlug}-${generateHashSuffix(id)}`;
  const hashedOwner = registry.get(hashed);
  if (hashedOwner === undefined || hashedOwner === id) {
    registry.set(hashed, id);
    return hashed;
  }

  let counter = 2;
  while (registry.has(`${baseSlug}-${counter}`)) {
    counter++;
  }
  const numbered = `${baseSlug}-${counter}`;
  registry.set(numbered, id);
  return numbered;
}
