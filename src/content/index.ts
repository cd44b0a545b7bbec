/**
 * Content loading: page table, site config, links and blog posts
 */

export { loadContent, readPages, readSiteConfig, readLinks, buildPages, CONTENT_LAYOUT } from './loader.js';
export { readBlogPosts, parseBlogPost, sortPostsByDate } from './blog.js';
export { DEFAULT_SITE_CONFIG, normalizeLayoutVariant } from './schema.js';
export type {
  BlogPost,
  LayoutVariant,
  LinkEntry,
  LinkKind,
  NewsletterMode,
  Page,
  Section,
  SiteConfig,
  SiteContent,
} from './types.js';
