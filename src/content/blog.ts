/**
 * Flat-file blog posts
 *
 * A post file starts with optional header lines, then a blank line, then the body:
 *
 *   Title: Field notes
 *   Date: 2024-05-01
 *
 *   First paragraph...
 *
 * A "Body:" header line also starts the body. Other header lines are ignored.
 */

import { readdir, readFile, stat } from 'fs/promises';
import { basename, extname, join } from 'path';
import type { BlogPost } from './types.js';
import { claimSlug, slugifyName } from '../utils/paths.js';
import { formatIsoDate } from '../utils/text.js';
import { getLogger } from '../utils/logger.js';

export const BLOG_POST_EXTENSION = '.txt';

export interface ParsedPostFile {
  title: string;
  date: string;
  body: string;
}

/**
 * Parse a post file's text. Fallbacks: title from the file stem, date from mtime.
 */
export function parseBlogPost(raw: string, fileStem: string, modifiedAt: Date): ParsedPostFile {
  let title = '';
  let date = '';
  const bodyLines: string[] = [];
  let inBody = false;

  for (const line of raw.split(/\r?\n/)) {
    if (inBody) {
      bodyLines.push(line);
      continue;
    }
    if (line.trim() === '') {
      inBody = true;
    } else if (line.startsWith('Title:')) {
      title = line.slice('Title:'.length).trim();
    } else if (line.startsWith('Date:')) {
      date = line.slice('Date:'.length).trim();
    } else if (line.startsWith('Body:')) {
      inBody = true;
      const rest = line.slice('Body:'.length).trim();
      if (rest) {
        bodyLines.push(rest);
      }
    }
  }

  return {
    title: title || fileStem,
    date: date || formatIsoDate(modifiedAt),
    body: bodyLines.join('\n').trim(),
  };
}

/**
 * Newest first; equal dates keep their input order
 */
export function sortPostsByDate(posts: readonly BlogPost[]): BlogPost[] {
  return [...posts].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
}

/**
 * Read every *.txt post in a directory, in file-name order, then sort by date.
 * A missing directory means no posts.
 */
export async function readBlogPosts(blogDir: string): Promise<BlogPost[]> {
  const logger = getLogger();

  let entries: string[];
  try {
    entries = await readdir(blogDir);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      logger.debug(`No blog directory at ${blogDir}`);
      return [];
    }
    throw error;
  }

  const files = entries.filter((name) => extname(name) === BLOG_POST_EXTENSION).sort();
  const registry = new Map<string, string>();
  const posts: BlogPost[] = [];

  for (const file of files) {
    const path = join(blogDir, file);
    const [raw, stats] = await Promise.all([readFile(path, 'utf-8'), stat(path)]);
    const stem = basename(file, BLOG_POST_EXTENSION);
    const parsed = parseBlogPost(raw, stem, stats.mtime);

    const baseSlug = slugifyName(stem);
    const slug = claimSlug(baseSlug, file, registry);
    if (slug !== baseSlug) {
      logger.warn(`Blog post ${file} collides with slug "${baseSlug}"; publishing it as "${slug}"`);
    }

    posts.push({ ...parsed, slug, sourceFile: file });
  }

  return sortPostsByDate(posts);
}
