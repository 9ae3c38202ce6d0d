import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCliArgs } from '../../src/cli/args.js';

describe('parseCliArgs', () => {
  it('defaults to running everything quietly', () => {
    expect(parseCliArgs([])).toEqual({
      help: false,
      verbose: false,
      headed: false,
      report: undefined,
      suite: undefined,
      only: [],
      frontendUrl: undefined,
      backendUrl: undefined,
    });
  });

  it('reads every option', () => {
    const options = parseCliArgs([
      '--suite',
      'ui',
      '--only',
      'ui.homepage',
      '--only',
      'ui.footer',
      '--frontend',
      'http://staging.test',
      '--backend',
      'http://api.staging.test',
      '--headed',
      '--report',
      'out/report.md',
      '-v',
    ]);

    expect(options).toEqual({
      help: false,
      verbose: true,
      headed: true,
      report: 'out/report.md',
      suite: 'ui',
      only: ['ui.homepage', 'ui.footer'],
      frontendUrl: 'http://staging.test',
      backendUrl: 'http://api.staging.test',
    });
  });

  it('accepts -h', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
  });

  it('rejects an unknown suite', () => {
    expect(() => parseCliArgs(['--suite', 'api'])).toThrow('Unknown suite "api" (expected http or ui)');
  });

  it('rejects unknown flags and positionals', () => {
    expect(() => parseCliArgs(['--parallel'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['homepage'])).toThrow(CliUsageError);
  });
});
