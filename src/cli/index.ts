#!/usr/bin/env node
import { stat } from 'fs/promises';
import { resolve } from 'path';
import { buildSite } from '../site/index.js';
import { SignupStore, createServerApp, startServer } from '../subscribe/index.js';
import { getLogger, handleError } from '../utils/index.js';
import { createProgram } from './program.js';
import type { CommandHandlers } from './types.js';

const handlers: CommandHandlers = {
  async build(options) {
    const logger = getLogger({ verbose: options.verbose ?? false });
    logger.debug(`Content: ${resolve(options.content)}`);
    logger.debug(`Output: ${resolve(options.out)}`);
    if (options.theme) {
      logger.debug(`Theme: ${resolve(options.theme)}`);
    }

    await buildSite({
      contentDir: options.content,
      outDir: options.out,
      themeDir: options.theme ? resolve(options.theme) : undefined,
    });
  },

  async serve(options) {
    const logger = getLogger({ verbose: options.verbose ?? false });
    const siteDir = resolve(options.site);
    const signupsFile = resolve(options.signups);

    try {
      await stat(siteDir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
      logger.warn(`Site directory ${siteDir} does not exist yet. Run "sitekiln build" first.`);
    }

    logger.debug(`Signups are appended to ${signupsFile}`);
    const app = createServerApp({ siteDir, store: new SignupStore(signupsFile) });
    await startServer(app, options.port);
  },
};

async function run(): Promise<void> {
  const program = createProgram(handlers);

  if (!process.argv.slice(2).length) {
    program.outputHelp();
    return;
  }

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error);
  }
}

void run();
