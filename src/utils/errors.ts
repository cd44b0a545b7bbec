/**
 * Standardized error taxonomy with stable exit codes
 * Each error class extends Error and provides:
 * - code: stable exit code (1-4)
 * - message: user-facing message
 * - details: optional verbose details
 */

import { getLogger } from './logger.js';

/**
 * Base error class with exit code
 */
export abstract class SiteKilnError extends Error {
  abstract readonly code: number;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, SiteKilnError.prototype);
  }

  getExitCode(): number {
    return this.code;
  }

  /**
   * Log error with appropriate level
   */
  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input error (exit code 1)
 * Triggered by: bad CLI arguments, unsafe output directory
 */
export class InvalidInputError extends SiteKilnError {
  readonly code = 1;

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }

  static fromInvalidPort(value: string): InvalidInputError {
    return new InvalidInputError(
      `--port must be an integer between 1 and 65535, got: ${value}`,
      'Example: sitekiln serve --port 8080'
    );
  }

  static fromUnsafeOutputDir(
    outDir: string,
    protectedDir: string,
    kind: 'content' | 'theme' = 'content'
  ): InvalidInputError {
    return new InvalidInputError(
      `Refusing to build into "${outDir}": it would delete the ${kind} directory "${protectedDir}".`,
      `The output directory is removed before every build; choose a directory outside the ${kind} tree`
    );
  }
}

/**
 * Missing content error (exit code 2)
 * Triggered by: missing pages table, missing theme files
 */
export class ContentMissingError extends SiteKilnError {
  readonly code = 2;

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, ContentMissingError.prototype);
  }

  static fromMissingPages(path: string): ContentMissingError {
    return new ContentMissingError(
      `Missing pages file: ${path}`,
      'The page table is required; create it with the columns page_slug,order,page_title,heading,body,cta_text,cta_url,hero_image,section_id'
    );
  }

  static fromMissingTheme(path: string): ContentMissingError {
    return new ContentMissingError(
      `Missing theme file: ${path}`,
      'Pass --theme <dir> pointing at a directory with templates/page.html, css/style.css and js/main.js'
    );
  }
}

/**
 * Invalid content error (exit code 3)
 * Triggered by: malformed site.json, unreadable CSV rows, unsafe page slugs
 */
export class InvalidContentError extends SiteKilnError {
  readonly code = 3;

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, InvalidContentError.prototype);
  }

  static fromMalformedJson(path: string, reason: string): InvalidContentError {
    return new InvalidContentError(`Could not parse ${path}`, `JSON error: ${reason}`);
  }

  static fromInvalidShape(path: string, reason: string): InvalidContentError {
    return new InvalidContentError(`Unexpected content in ${path}`, reason);
  }

  static fromUnsafeSlug(path: string, slug: string): InvalidContentError {
    return new InvalidContentError(
      `Invalid page slug "${slug}" in ${path}`,
      'Slugs are "/"-separated names; empty, "." and ".." segments and backslashes are not allowed'
    );
  }
}

/**
 * Output error (exit code 4)
 * Triggered by: failed writes into the output directory
 */
export class OutputError extends SiteKilnError {
  readonly code = 4;

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, OutputError.prototype);
  }

  static fromWriteFailure(path: string, reason: string): OutputError {
    return new OutputError(
      `Failed to write ${path}`,
      `Write error: ${reason}. Check directory permissions and free disk space`
    );
  }
}

/**
 * Map error to exit code
 */
export function getExitCode(error: unknown): number {
  if (error instanceof SiteKilnError) {
    return error.getExitCode();
  }
  return 1;
}

/**
 * Handle and log error, then exit
 */
export function handleError(error: unknown): never {
  if (error instanceof SiteKilnError) {
    error.log();
    process.exit(error.getExitCode());
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  process.exit(1);
}
