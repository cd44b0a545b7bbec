/**
 * Static HTML generation module
 */

import { join, relative, resolve, isAbsolute } from 'path';
import { CONTENT_LAYOUT, loadContent } from '../content/index.js';
import { getLogger } from '../utils/logger.js';
import { InvalidInputError } from '../utils/errors.js';
import { SiteGenerator } from './generator.js';
import type { BuildReport } from './generator.js';
import { DEFAULT_THEME_DIR, loadTheme } from './theme.js';

export type { BuildReport } from './generator.js';
export { DEFAULT_THEME_DIR } from './theme.js';

export interface BuildOptions {
  contentDir: string;
  outDir: string;
  /** Defaults to the bundled theme */
  themeDir?: string;
}

/**
 * True when `child` is `parent` or lies inside it
 */
function isWithin(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/**
 * Load content, then rebuild the output directory from scratch
 */
export async function buildSite(options: BuildOptions): Promise<BuildReport> {
  const logger = getLogger();
  const contentDir = resolve(options.contentDir);
  const outDir = resolve(options.outDir);
  const themeDir = resolve(options.themeDir ?? DEFAULT_THEME_DIR);

  if (isWithin(outDir, contentDir)) {
    throw InvalidInputError.fromUnsafeOutputDir(options.outDir, options.contentDir);
  }
  if (isWithin(outDir, themeDir)) {
    throw InvalidInputError.fromUnsafeOutputDir(options.outDir, themeDir, 'theme');
  }

  logger.info(`Generating static site in ${outDir}`);

  try {
    const content = await loadContent(contentDir);
    const theme = await loadTheme(themeDir);
    const generator = new SiteGenerator(content, theme, {
      outDir,
      mediaDir: join(contentDir, CONTENT_LAYOUT.MEDIA_DIR),
    });
    const report = await generator.generate();
    logger.summary({
      pages: report.pages.length,
      posts: report.posts.length,
      assets: report.assetCount,
      outDir,
    });
    return report;
  } catch (error) {
    logger.error(`Failed to generate site: ${error instanceof Error ? error.message : String(error)}`);
    throw error;
  }
}
