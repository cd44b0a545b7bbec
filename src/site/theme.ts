/**
 * Theme files: the document shell template plus the CSS and client script copied into assets/
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { ContentMissingError } from '../utils/errors.js';

/** Bundled theme at the package root (works from both src/site and dist/site) */
export const DEFAULT_THEME_DIR = join(__dirname, '..', '..', 'theme');

export const THEME_LAYOUT = {
  PAGE_TEMPLATE: 'templates/page.html',
  CSS_FILE: 'css/style.css',
  JS_FILE: 'js/main.js',
} as const;

export interface Theme {
  dir: string;
  /** Document shell with {{title}}, {{description}}, {{cssHref}}, {{jsHref}},
   * {{newsletterMode}}, {{newsletterUrl}}, {{header}}, {{main}}, {{footer}} */
  pageTemplate: string;
}

export async function loadTheme(dir: string = DEFAULT_THEME_DIR): Promise<Theme> {
  const templatePath = join(dir, THEME_LAYOUT.PAGE_TEMPLATE);
  try {
    const pageTemplate = await readFile(templatePath, 'utf-8');
    return { dir, pageTemplate };
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw ContentMissingError.fromMissingTheme(templatePath);
    }
    throw error;
  }
}
