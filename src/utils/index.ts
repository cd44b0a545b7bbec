/**
 * Utility functions for logging, errors, paths and text
 */

export { getLogger, resetLogger, Logger } from './logger.js';
export type { LoggerConfig, ProgressStats, SummaryStats } from './logger.js';

export {
  SiteKilnError,
  InvalidInputError,
  ContentMissingError,
  InvalidContentError,
  OutputError,
  getExitCode,
  handleError,
} from './errors.js';

export {
  OUTPUT_LAYOUT,
  ROOT_SLUG,
  normalizeSlug,
  isValidPageSlug,
  outputPathFor,
  blogPostOutputPath,
  assetOutputPath,
  relativeLink,
  resolveCtaUrl,
  slugifyName,
  claimSlug,
} from './paths.js';
export type { SlugTable } from './paths.js';

export { escapeHtml, splitParagraphs, splitBullets, formatIsoDate, fillTemplate } from './text.js';
