/**
 * Shared assets: theme CSS/JS, generated placeholder SVGs, and copied media files
 */

import { copyFile, mkdir, readdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { OUTPUT_LAYOUT } from '../utils/paths.js';
import { escapeHtml } from '../utils/text.js';
import { getLogger } from '../utils/logger.js';
import { OutputError } from '../utils/errors.js';
import { PLACEHOLDER_IMAGES } from './placeholders.js';
import { THEME_LAYOUT } from './theme.js';
import type { Theme } from './theme.js';

async function writeAsset(path: string, data: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw OutputError.fromWriteFailure(path, reason);
  }
}

async function copyAsset(source: string, target: string): Promise<void> {
  try {
    await mkdir(dirname(target), { recursive: true });
    await copyFile(source, target);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw OutputError.fromWriteFailure(target, reason);
  }
}

export function renderPlaceholderSvg(label: string): string {
  const safeLabel = escapeHtml(label);
  return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 600 400" role="img" aria-label="${safeLabel}">
  <defs>
    <linearGradient id="g" x1="0" y1="0" x2="1" y2="1">
      <stop offset="0%" stop-color="#6b0f1a" stop-opacity="0.2" />
      <stop offset="100%" stop-color="#e0b15a" stop-opacity="0.3" />
    </linearGradient>
  </defs>
  <rect width="600" height="400" fill="#f4ecea" />
  <rect x="40" y="40" width="520" height="320" fill="url(#g)" rx="26" />
  <circle cx="470" cy="130" r="70" fill="#6b0f1a" fill-opacity="0.16" />
  <rect x="120" y="230" width="240" height="18" rx="9" fill="#6b0f1a" fill-opacity="0.25" />
  <text x="120" y="205" fill="#3e0a11" font-family="Georgia, serif" font-size="22">${safeLabel}</text>
</svg>
`;
}

/**
 * Copy the theme stylesheet and client script into assets/
 * @returns Number of files written
 */
export async function writeThemeAssets(theme: Theme, outDir: string): Promise<number> {
  await copyAsset(join(theme.dir, THEME_LAYOUT.CSS_FILE), join(outDir, OUTPUT_LAYOUT.CSS_FILE));
  await copyAsset(join(theme.dir, THEME_LAYOUT.JS_FILE), join(outDir, OUTPUT_LAYOUT.JS_FILE));
  return 2;
}

/**
 * @returns Number of files written
 */
export async function writePlaceholderImages(outDir: string): Promise<number> {
  const entries = Object.entries(PLACEHOLDER_IMAGES);
  for (const [fileName, label] of entries) {
    await writeAsset(join(outDir, OUTPUT_LAYOUT.IMG_DIR, fileName), renderPlaceholderSvg(label));
  }
  return entries.length;
}

/**
 * Relative paths of every file under dir, depth first
 */
async function listFiles(dir: string, prefix: string = ''): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(join(dir, prefix), { withFileTypes: true });
  for (const entry of entries) {
    const relative = prefix ? join(prefix, entry.name) : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(dir, relative)));
    } else if (entry.isFile()) {
      files.push(relative);
    }
  }
  return files;
}

/**
 * Copy every file under mediaDir into assets/img, keeping subdirectories.
 * A missing media directory is not an error.
 * @returns Number of files copied
 */
export async function copyMedia(mediaDir: string, outDir: string): Promise<number> {
  const logger = getLogger();

  let files: string[];
  try {
    files = await listFiles(mediaDir);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      logger.debug(`Media directory not found at ${mediaDir}. Skipping media copy.`);
      return 0;
    }
    throw error;
  }

  for (const file of files) {
    await copyAsset(join(mediaDir, file), join(outDir, OUTPUT_LAYOUT.IMG_DIR, file));
  }

  logger.debug(`Copied ${files.length} media files from ${mediaDir}`);
  return files.length;
}
