/**
 * Logger utility with verbose mode support
 * - info(): always prints (concise mode)
 * - debug(): only prints with --verbose
 * - progress(): rendering progress indicator
 * - summary(): final build statistics
 */

export interface LoggerConfig {
  verbose?: boolean;
}

export interface ProgressStats {
  phase: string;
  current: number;
  total: number;
}

export interface SummaryStats {
  pages?: number;
  posts?: number;
  assets?: number;
  outDir?: string;
}

const PREFIX = '[sitekiln]';

class Logger {
  private verbose: boolean = false;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
  }

  /**
   * Set verbose mode
   */
  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  /**
   * Always prints - used for concise summary lines
   */
  info(message: string): void {
    console.log(`${PREFIX} ${message}`);
  }

  /**
   * Only prints in verbose mode - per-file steps and fallbacks
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(`${PREFIX} DEBUG: ${message}`);
    }
  }

  /**
   * Progress indicator for a phase
   * Every step in verbose mode, only first and last step otherwise
   */
  progress(stats: ProgressStats): void {
    const { phase, current, total } = stats;
    const percentage = total > 0 ? Math.round((current / total) * 100) : 0;

    if (this.verbose) {
      console.log(`${PREFIX} PROGRESS: ${phase} - ${current}/${total} (${percentage}%)`);
    } else if (current === 0 || current === total) {
      console.log(`${PREFIX} ${phase}: ${current}/${total} (${percentage}%)`);
    }
  }

  /**
   * Print final build statistics
   */
  summary(stats: SummaryStats): void {
    const { pages = 0, posts = 0, assets = 0, outDir } = stats;
    const target = outDir ? ` into ${outDir}` : '';
    this.info(`Built ${pages} pages, ${posts} blog posts and ${assets} asset files${target}`);
  }

  /**
   * Print a phase completion message
   */
  phaseComplete(phaseName: string, details?: string): void {
    const msg = details ? `${phaseName} complete: ${details}` : `${phaseName} complete`;
    this.info(msg);
  }

  /**
   * Print a phase start message (verbose only)
   */
  phaseStart(phaseName: string): void {
    this.debug(`Starting phase: ${phaseName}`);
  }

  warn(message: string): void {
    console.warn(`${PREFIX} WARNING: ${message}`);
  }

  error(message: string): void {
    console.error(`${PREFIX} ERROR: ${message}`);
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton.
 * A config passed after creation updates the verbose flag.
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config);
  } else if (config?.verbose !== undefined) {
    loggerInstance.setVerbose(config.verbose);
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

export { Logger };
