/**
 * Tests for the console logger and its verbose switch
 */

import { getLogger, resetLogger } from './logger.js';

describe('logger', () => {
  let log: jest.SpyInstance;

  beforeEach(() => {
    resetLogger();
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should hide debug output unless verbose', () => {
    getLogger().debug('quiet');
    expect(log).not.toHaveBeenCalled();

    getLogger({ verbose: true }).debug('loud');
    expect(log).toHaveBeenCalledWith('[sitekiln] DEBUG: loud');
  });

  it('should update the verbose flag of the existing instance', () => {
    const logger = getLogger({ verbose: true });
    expect(getLogger({ verbose: false })).toBe(logger);

    logger.debug('hidden');
    expect(log).not.toHaveBeenCalled();
  });

  it('should report only the first and last progress step when not verbose', () => {
    const logger = getLogger();
    logger.progress({ phase: 'Pages', current: 0, total: 4 });
    logger.progress({ phase: 'Pages', current: 2, total: 4 });
    logger.progress({ phase: 'Pages', current: 4, total: 4 });

    expect(log.mock.calls).toEqual([['[sitekiln] Pages: 0/4 (0%)'], ['[sitekiln] Pages: 4/4 (100%)']]);
  });

  it('should report every progress step when verbose', () => {
    const logger = getLogger({ verbose: true });
    logger.progress({ phase: 'Posts', current: 1, total: 2 });

    expect(log).toHaveBeenCalledWith('[sitekiln] PROGRESS: Posts - 1/2 (50%)');
  });

  it('should print the build summary', () => {
    getLogger().summary({ pages: 3, posts: 1, assets: 7, outDir: 'site' });
    expect(log).toHaveBeenCalledWith('[sitekiln] Built 3 pages, 1 blog posts and 7 asset files into site');
  });
});
