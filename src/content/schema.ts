/**
 * zod schemas for the content files
 * site.json uses snake_case keys; CSV rows arrive as string records
 */

import { z } from 'zod';
import { LAYOUT_VARIANTS } from './types.js';
import type { LayoutVariant, LinkKind, NewsletterMode, SiteConfig } from './types.js';

const cell = z.string().default('');

function isLayoutVariant(value: string): value is LayoutVariant {
  return LAYOUT_VARIANTS.some((variant) => variant === value);
}

/**
 * Unknown or missing variants fall back to "standard"
 */
export function normalizeLayoutVariant(value: string | undefined): LayoutVariant {
  const normalized = (value ?? '').trim().toLowerCase();
  return isLayoutVariant(normalized) ? normalized : 'standard';
}

export function normalizeNewsletterMode(value: string | undefined): NewsletterMode {
  const normalized = (value ?? '').trim().toLowerCase();
  return normalized === '' || normalized === 'local' ? 'local' : 'provider';
}

export const siteConfigFileSchema = z
  .object({
    site_name: z.string().default('Untitled Site'),
    site_tagline: cell,
    meta_description: cell,
    contact_blurb: cell,
    domain: cell,
    newsletter_mode: z.string().optional(),
    newsletter_provider_url: cell,
    layout_variant: z.string().optional(),
    footer_note: cell,
    address: cell,
  })
  .transform(
    (raw): SiteConfig => ({
      name: raw.site_name.trim(),
      tagline: raw.site_tagline.trim(),
      metaDescription: raw.meta_description.trim(),
      contactBlurb: raw.contact_blurb,
      domain: raw.domain.trim(),
      newsletterMode: normalizeNewsletterMode(raw.newsletter_mode),
      newsletterProviderUrl: raw.newsletter_provider_url.trim(),
      layoutVariant: normalizeLayoutVariant(raw.layout_variant),
      footerNote: raw.footer_note.trim(),
      address: raw.address.trim(),
    })
  );

/** Defaults used when site.json is absent */
export const DEFAULT_SITE_CONFIG: SiteConfig = siteConfigFileSchema.parse({});

export const pageRowSchema = z.object({
  page_slug: cell,
  order: cell,
  page_title: cell,
  heading: cell,
  body: cell,
  cta_text: cell,
  cta_url: cell,
  hero_image: cell,
  section_id: cell,
  bullets: cell,
});

export type PageRow = z.infer<typeof pageRowSchema>;

export const linkRowSchema = z.object({
  label: cell,
  url: cell,
  kind: z
    .string()
    .default('')
    .transform((kind): LinkKind => (kind.trim().toLowerCase() === 'placeholder' ? 'placeholder' : 'normal')),
  order: cell,
});

export type LinkRow = z.infer<typeof linkRowSchema>;

/**
 * Integer order column; blank or non-numeric counts as 0
 */
export function parseOrder(value: string): number {
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}
