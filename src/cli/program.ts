import { Command } from 'commander';
import { InvalidInputError } from '../utils/index.js';
import { CLI_DEFAULTS } from './types.js';
import type { BuildCommandOptions, CommandHandlers, ServeCommandOptions } from './types.js';

const MIN_PORT = 1;
const MAX_PORT = 65535;

export function parsePort(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw InvalidInputError.fromInvalidPort(value);
  }

  const parsed = parseInt(trimmed, 10);
  if (parsed < MIN_PORT || parsed > MAX_PORT) {
    throw InvalidInputError.fromInvalidPort(value);
  }

  return parsed;
}

export function createProgram(handlers: CommandHandlers): Command {
  const program = new Command();

  program
    .name('sitekiln')
    .description('Build a static website from CSV, JSON and text content')
    .version('0.1.0');

  program
    .command('build')
    .description('Render the content directory into a static site')
    .option('--content <dir>', 'Content directory', CLI_DEFAULTS.CONTENT_DIR)
    .option('--out <dir>', 'Output directory (removed and rebuilt)', CLI_DEFAULTS.OUT_DIR)
    .option('--theme <dir>', 'Theme directory (default: bundled theme)')
    .option('--verbose', 'Enable verbose logging')
    .action(async (options: BuildCommandOptions) => {
      await handlers.build(options);
    });

  program
    .command('serve')
    .description('Serve a built site and accept newsletter signups')
    .option('--site <dir>', 'Built site directory', CLI_DEFAULTS.OUT_DIR)
    .option('--port <number>', `Port to listen on (${MIN_PORT}-${MAX_PORT})`, parsePort, CLI_DEFAULTS.PORT)
    .option('--signups <file>', 'File that newsletter signups are appended to', CLI_DEFAULTS.SIGNUPS_FILE)
    .option('--verbose', 'Enable verbose logging')
    .action(async (options: ServeCommandOptions) => {
      await handlers.serve(options);
    });

  return program;
}
