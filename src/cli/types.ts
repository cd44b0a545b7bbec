/**
 * CLI option types and defaults
 */

export interface BuildCommandOptions {
  content: string;
  out: string;
  theme?: string;
  verbose?: boolean;
}

export interface ServeCommandOptions {
  site: string;
  port: number;
  signups: string;
  verbose?: boolean;
}

export const CLI_DEFAULTS = {
  CONTENT_DIR: 'content',
  OUT_DIR: 'site',
  PORT: 8080,
  SIGNUPS_FILE: 'data/newsletter_signups.csv',
} as const;

/**
 * What each subcommand runs once its options are parsed
 */
export interface CommandHandlers {
  build(options: BuildCommandOptions): Promise<void>;
  serve(options: ServeCommandOptions): Promise<void>;
}
