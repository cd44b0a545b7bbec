import { mkdir, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { SiteContent } from '../content/types.js';
import { getLogger } from '../utils/logger.js';
import { OutputError } from '../utils/errors.js';
import { copyMedia, writePlaceholderImages, writeThemeAssets } from './assets.js';
import type { RenderContext } from './fragments.js';
import { renderBlogPost, renderPage } from './page.js';
import type { RenderedDocument } from './page.js';
import type { Theme } from './theme.js';

export interface GeneratorOptions {
  /** Output root; removed and recreated by generate() */
  outDir: string;
  /** Media files copied into assets/img (optional) */
  mediaDir?: string;
}

export interface BuildReport {
  outDir: string;
  /** Output paths of pages, relative to outDir */
  pages: string[];
  /** Output paths of blog posts, relative to outDir */
  posts: string[];
  assetCount: number;
}

export class SiteGenerator {
  private readonly ctx: RenderContext;
  private readonly theme: Theme;
  private readonly options: GeneratorOptions;

  constructor(content: SiteContent, theme: Theme, options: GeneratorOptions) {
    this.ctx = {
      site: content.site,
      pages: content.pages,
      links: content.links,
      posts: content.posts,
    };
    this.theme = theme;
    this.options = options;
  }

  public async generate(): Promise<BuildReport> {
    const logger = getLogger();
    logger.info('Starting site generation...');

    await this.cleanOutput();
    const assetCount = await this.writeAssets();
    const pages = await this.generatePages();
    const posts = await this.generateBlogPosts();

    logger.info('Site generation complete.');
    return { outDir: this.options.outDir, pages, posts, assetCount };
  }

  private async cleanOutput(): Promise<void> {
    const { outDir } = this.options;
    getLogger().debug(`Clearing output directory ${outDir}`);
    await rm(outDir, { recursive: true, force: true });
    await mkdir(outDir, { recursive: true });
  }

  private async writeAssets(): Promise<number> {
    const logger = getLogger();
    logger.phaseStart('assets');
    const { outDir, mediaDir } = this.options;

    let count = await writeThemeAssets(this.theme, outDir);
    count += await writePlaceholderImages(outDir);
    if (mediaDir) {
      count += await copyMedia(mediaDir, outDir);
    }

    logger.phaseComplete('Assets', `${count} files`);
    return count;
  }

  private async generatePages(): Promise<string[]> {
    const logger = getLogger();
    const pages = [...this.ctx.pages.values()];
    const written: string[] = [];

    for (const page of pages) {
      logger.progress({ phase: 'Pages', current: written.length, total: pages.length });
      written.push(await this.writeDocument(renderPage(this.ctx, this.theme, page)));
    }
    logger.progress({ phase: 'Pages', current: written.length, total: pages.length });

    return written;
  }

  private async generateBlogPosts(): Promise<string[]> {
    const written: string[] = [];
    for (const post of this.ctx.posts) {
      written.push(await this.writeDocument(renderBlogPost(this.ctx, this.theme, post)));
    }
    if (written.length > 0) {
      getLogger().phaseComplete('Blog posts', `${written.length} written`);
    }
    return written;
  }

  private async writeDocument(doc: RenderedDocument): Promise<string> {
    const target = join(this.options.outDir, doc.path);
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, doc.html, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw OutputError.fromWriteFailure(target, reason);
    }
    getLogger().debug(`Wrote ${doc.path}`);
    return doc.path;
  }
}
