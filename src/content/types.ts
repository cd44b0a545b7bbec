/**
 * Content model types
 * Everything is built once from the content directory and read-only during rendering
 */

export const LAYOUT_VARIANTS = ['standard', 'linkhub', 'profile'] as const;

/** Homepage composition strategy */
export type LayoutVariant = (typeof LAYOUT_VARIANTS)[number];

/** Where newsletter submissions go: the bundled endpoint or a provider URL */
export type NewsletterMode = 'local' | 'provider';

/**
 * Site-wide configuration, loaded from site.json
 */
export interface SiteConfig {
  readonly name: string;
  readonly tagline: string;
  readonly metaDescription: string;
  readonly contactBlurb: string;
  /** Public domain shown in the footer */
  readonly domain: string;
  readonly newsletterMode: NewsletterMode;
  readonly newsletterProviderUrl: string;
  readonly layoutVariant: LayoutVariant;
  readonly footerNote: string;
  readonly address: string;
}

/**
 * One row of the page table
 */
export interface Section {
  /** Anchor id (may be empty) */
  readonly id: string;
  readonly order: number;
  readonly heading: string;
  /** Multi-paragraph body, see splitParagraphs */
  readonly body: string;
  readonly ctaText: string;
  /** Absolute URL, mailto:, #fragment, or another page's slug */
  readonly ctaUrl: string;
  /** File name under assets/img (may be empty) */
  readonly image: string;
  readonly bullets: readonly string[];
}

export interface Page {
  /** Normalized slug, "" for the root page */
  readonly slug: string;
  readonly title: string;
  /** Sorted by order; the first one is the hero */
  readonly sections: readonly Section[];
}

export type LinkKind = 'normal' | 'placeholder';

export interface LinkEntry {
  readonly label: string;
  readonly url: string;
  readonly kind: LinkKind;
  readonly order: number;
}

export interface BlogPost {
  readonly slug: string;
  readonly title: string;
  /** YYYY-MM-DD when taken from the file's mtime, otherwise as written */
  readonly date: string;
  readonly body: string;
  /** Source file name, used as the collision id for slugs */
  readonly sourceFile: string;
}

/**
 * Everything a build renders from
 */
export interface SiteContent {
  /** Keyed by normalized slug, in page-table order */
  readonly pages: ReadonlyMap<string, Page>;
  readonly site: SiteConfig;
  readonly links: readonly LinkEntry[];
  /** Newest first */
  readonly posts: readonly BlogPost[];
}
