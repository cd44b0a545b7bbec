/**
 * Tests for the content loader
 * Covers page grouping, site config validation and the optional files
 */

import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { buildPages, loadContent, parseCsv, readLinks, readPages, readSiteConfig } from './loader.js';
import { DEFAULT_SITE_CONFIG, pageRowSchema } from './schema.js';
import type { PageRow } from './schema.js';
import { ContentMissingError, InvalidContentError } from '../utils/errors.js';
import { resetLogger } from '../utils/logger.js';

const PAGES_HEADER = 'page_slug,order,page_title,heading,body,cta_text,cta_url,hero_image,section_id,bullets';

function row(overrides: Partial<PageRow>): PageRow {
  return {
    page_slug: '',
    order: '',
    page_title: '',
    heading: '',
    body: '',
    cta_text: '',
    cta_url: '',
    hero_image: '',
    section_id: '',
    bullets: '',
    ...overrides,
  };
}

describe('content loader', () => {
  let contentDir: string;

  beforeEach(async () => {
    resetLogger();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    contentDir = await mkdtemp(join(tmpdir(), 'sitekiln-content-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(contentDir, { recursive: true, force: true });
  });

  describe('parseCsv', () => {
    it('should trim headers and cells and fill missing columns', () => {
      const rows = parseCsv(' page_slug , heading \n about , Hello \n', pageRowSchema, 'pages.csv');
      expect(rows).toEqual([row({ page_slug: 'about', heading: 'Hello' })]);
    });

    it('should keep quoted commas and newlines inside a cell', () => {
      const rows = parseCsv('page_slug,body\nabout,"One, two\nthree"\n', pageRowSchema, 'pages.csv');
      expect(rows[0]?.body).toBe('One, two\nthree');
    });

    it('should reject an unterminated quote', () => {
      expect(() => parseCsv('page_slug,body\nabout,"broken\n', pageRowSchema, 'pages.csv')).toThrow(
        InvalidContentError
      );
    });
  });

  describe('buildPages', () => {
    it('should group rows by normalized slug in first-seen order', () => {
      const pages = buildPages([
        row({ page_slug: 'about', heading: 'A1' }),
        row({ page_slug: 'home', heading: 'H1' }),
        row({ page_slug: '/about/', heading: 'A2' }),
        row({ page_slug: 'index', heading: 'H2' }),
      ]);

      expect([...pages.keys()]).toEqual(['about', '']);
      expect(pages.get('about')?.sections.map((s) => s.heading)).toEqual(['A1', 'A2']);
      expect(pages.get('')?.sections.map((s) => s.heading)).toEqual(['H1', 'H2']);
    });

    it('should take the last non-empty page title', () => {
      const pages = buildPages([
        row({ page_slug: 'about', page_title: 'First' }),
        row({ page_slug: 'about', page_title: 'Second' }),
        row({ page_slug: 'about', page_title: '' }),
      ]);
      expect(pages.get('about')?.title).toBe('Second');
    });

    it('should derive a title from the slug when none is given', () => {
      const pages = buildPages([row({ page_slug: 'about-us' }), row({ page_slug: '' })]);
      expect(pages.get('about-us')?.title).toBe('About-Us');
      expect(pages.get('')?.title).toBe('Home');
    });

    it('should sort sections by order with ties in row order and non-numeric as 0', () => {
      const pages = buildPages([
        row({ page_slug: 'p', order: '2', heading: 'two' }),
        row({ page_slug: 'p', order: 'x', heading: 'zero-a' }),
        row({ page_slug: 'p', order: '1', heading: 'one' }),
        row({ page_slug: 'p', order: '', heading: 'zero-b' }),
      ]);
      expect(pages.get('p')?.sections.map((s) => s.heading)).toEqual(['zero-a', 'zero-b', 'one', 'two']);
    });

    it('should split bullets and keep section fields', () => {
      const pages = buildPages([
        row({
          page_slug: 'contact',
          order: '3',
          heading: 'Email',
          body: 'Write to us',
          cta_text: 'Go',
          cta_url: 'about',
          hero_image: 'team.jpg',
          section_id: 'email',
          bullets: 'hello@example.org | Thursdays',
        }),
      ]);
      expect(pages.get('contact')?.sections[0]).toEqual({
        id: 'email',
        order: 3,
        heading: 'Email',
        body: 'Write to us',
        ctaText: 'Go',
        ctaUrl: 'about',
        image: 'team.jpg',
        bullets: ['hello@example.org', 'Thursdays'],
      });
    });

    it('should accept nested slugs', () => {
      const pages = buildPages([row({ page_slug: 'docs/setup' })]);
      expect([...pages.keys()]).toEqual(['docs/setup']);
    });

    it.each(['../x', './about', 'x/../about', 'docs//setup', 'docs\\setup'])(
      'should reject the unsafe slug %s',
      (slug) => {
        expect(() => buildPages([row({ page_slug: 'about' }), row({ page_slug: slug })])).toThrow(
          InvalidContentError
        );
      }
    );

    it('should name the page table and the slug in the error', () => {
      expect(() => buildPages([row({ page_slug: '../x' })], 'content/pages.csv')).toThrow(
        'Invalid page slug "../x" in content/pages.csv'
      );
    });
  });

  describe('readPages', () => {
    it('should fail with exit code 2 when pages.csv is missing', async () => {
      const error = await readPages(contentDir).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ContentMissingError);
      expect(error).toHaveProperty('code', 2);
    });

    it('should read pages from pages.csv', async () => {
      await writeFile(join(contentDir, 'pages.csv'), `${PAGES_HEADER}\nhome,1,Home,Welcome,Hi,,,,,\n`);
      const pages = await readPages(contentDir);
      expect(pages.get('')?.title).toBe('Home');
      expect(pages.get('')?.sections[0]?.heading).toBe('Welcome');
    });
  });

  describe('readSiteConfig', () => {
    it('should use defaults when site.json is missing', async () => {
      await expect(readSiteConfig(contentDir)).resolves.toEqual(DEFAULT_SITE_CONFIG);
      expect(DEFAULT_SITE_CONFIG.name).toBe('Untitled Site');
      expect(DEFAULT_SITE_CONFIG.layoutVariant).toBe('standard');
      expect(DEFAULT_SITE_CONFIG.newsletterMode).toBe('local');
    });

    it('should map snake_case keys and normalize the variant and mode', async () => {
      await writeFile(
        join(contentDir, 'site.json'),
        JSON.stringify({
          site_name: ' Test Lab ',
          site_tagline: 'Tagline',
          meta_description: 'Meta',
          contact_blurb: 'Blurb',
          domain: 'example.org',
          newsletter_mode: 'Provider',
          newsletter_provider_url: 'https://example.org/signup',
          layout_variant: 'LinkHub',
          footer_note: 'Note',
          address: 'Street 1',
          unrelated_key: true,
        })
      );

      await expect(readSiteConfig(contentDir)).resolves.toEqual({
        name: 'Test Lab',
        tagline: 'Tagline',
        metaDescription: 'Meta',
        contactBlurb: 'Blurb',
        domain: 'example.org',
        newsletterMode: 'provider',
        newsletterProviderUrl: 'https://example.org/signup',
        layoutVariant: 'linkhub',
        footerNote: 'Note',
        address: 'Street 1',
      });
    });

    it('should fall back to the standard layout for unknown variants', async () => {
      await writeFile(join(contentDir, 'site.json'), JSON.stringify({ layout_variant: 'magazine' }));
      const site = await readSiteConfig(contentDir);
      expect(site.layoutVariant).toBe('standard');
    });

    it('should fail with exit code 3 on malformed JSON', async () => {
      await writeFile(join(contentDir, 'site.json'), '{ "site_name": ');
      const error = await readSiteConfig(contentDir).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(InvalidContentError);
      expect(error).toHaveProperty('code', 3);
    });

    it('should fail with exit code 3 on wrongly typed values', async () => {
      await writeFile(join(contentDir, 'site.json'), JSON.stringify({ site_name: 42 }));
      await expect(readSiteConfig(contentDir)).rejects.toBeInstanceOf(InvalidContentError);
    });
  });

  describe('readLinks', () => {
    it('should return an empty list when links.csv is missing', async () => {
      await expect(readLinks(contentDir)).resolves.toEqual([]);
    });

    it('should skip unlabeled rows and sort by order', async () => {
      await writeFile(
        join(contentDir, 'links.csv'),
        'label,url,kind,order\nSecond,https://example.org/2,,2\n,https://example.org/none,,0\nFirst,#,Placeholder,1\n'
      );
      await expect(readLinks(contentDir)).resolves.toEqual([
        { label: 'First', url: '#', kind: 'placeholder', order: 1 },
        { label: 'Second', url: 'https://example.org/2', kind: 'normal', order: 2 },
      ]);
    });
  });

  describe('loadContent', () => {
    it('should load every content file', async () => {
      await writeFile(join(contentDir, 'pages.csv'), `${PAGES_HEADER}\nhome,1,Home,Welcome,Hi,,,,,\nblog,1,Blog,Blog,,,,,,\n`);
      await writeFile(join(contentDir, 'site.json'), JSON.stringify({ site_name: 'Test Lab' }));
      await writeFile(join(contentDir, 'links.csv'), 'label,url,kind,order\nCode,https://example.org,,1\n');
      await mkdir(join(contentDir, 'blog'));
      await writeFile(join(contentDir, 'blog', 'hello.txt'), 'Title: Hello\nDate: 2024-01-01\n\nFirst post.');

      const content = await loadContent(contentDir);

      expect([...content.pages.keys()]).toEqual(['', 'blog']);
      expect(content.site.name).toBe('Test Lab');
      expect(content.links.map((l) => l.label)).toEqual(['Code']);
      expect(content.posts.map((p) => p.slug)).toEqual(['hello']);
    });
  });
});
