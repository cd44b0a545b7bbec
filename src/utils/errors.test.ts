import {
  ContentMissingError,
  InvalidContentError,
  InvalidInputError,
  OutputError,
  SiteKilnError,
  getExitCode,
} from './errors.js';
import { resetLogger, getLogger } from './logger.js';

describe('errors', () => {
  beforeEach(() => {
    resetLogger();
  });

  it('should carry stable exit codes', () => {
    expect(getExitCode(InvalidInputError.fromInvalidPort('x'))).toBe(1);
    expect(getExitCode(ContentMissingError.fromMissingPages('content/pages.csv'))).toBe(2);
    expect(getExitCode(InvalidContentError.fromMalformedJson('content/site.json', 'bad'))).toBe(3);
    expect(getExitCode(OutputError.fromWriteFailure('site/index.html', 'EACCES'))).toBe(4);
  });

  it('should map unknown errors to 1', () => {
    expect(getExitCode(new Error('boom'))).toBe(1);
    expect(getExitCode('boom')).toBe(1);
  });

  it('should keep the prototype chain for instanceof checks', () => {
    const error = ContentMissingError.fromMissingTheme('theme/templates/page.html');
    expect(error).toBeInstanceOf(ContentMissingError);
    expect(error).toBeInstanceOf(SiteKilnError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ContentMissingError');
    expect(error.message).toBe('Missing theme file: theme/templates/page.html');
  });

  it('should log details only in verbose mode', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = InvalidContentError.fromMalformedJson('site.json', 'Unexpected end of JSON input');

    error.log();
    expect(errorSpy).toHaveBeenCalledWith('[sitekiln] ERROR: Could not parse site.json');
    expect(logSpy).not.toHaveBeenCalled();

    getLogger({ verbose: true });
    error.log();
    expect(logSpy).toHaveBeenCalledWith('[sitekiln] DEBUG: Details: JSON error: Unexpected end of JSON input');

    errorSpy.mockRestore();
    logSpy.mockRestore();
  });
});
