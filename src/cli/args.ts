import { parseArgs } from 'node:util';
import { z } from 'zod';
import type { Suite } from '../types/index.js';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export interface CliOptions {
  help: boolean;
  verbose: boolean;
  headed: boolean;
  report?: string;
  suite?: Suite;
  only: string[];
  frontendUrl?: string;
  backendUrl?: string;
}

export const USAGE = `Usage: liveqa-smoke [options]

Runs the HTTP probes and UI scenarios against a running Live Q&A deployment.
Exits 1 when any scenario fails; skipped scenarios do not affect the exit code.

Options:
  --suite <http|ui>    Run only one suite
  --only <id>          Run only the named scenario (repeatable)
  --frontend <url>     Frontend base URL (env SMOKE_FRONTEND_URL)
  --backend <url>      Backend base URL (env SMOKE_BACKEND_URL)
  --headed             Show the browser window
  --report <file>      Write a markdown report to <file>
  -v, --verbose        Print scenario notes and debug logs
  -h, --help           Show this help
`;

const SuiteSchema = z.enum(['http', 'ui']);

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h' },
      verbose: { type: 'boolean', short: 'v' },
      headed: { type: 'boolean' },
      report: { type: 'string' },
      suite: { type: 'string' },
      only: { type: 'string', multiple: true },
      frontend: { type: 'string' },
      backend: { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  });
}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsedArgs: ReturnType<typeof readArgs>;
  try {
    parsedArgs = readArgs(argv);
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
  const { values } = parsedArgs;

  let suite: Suite | undefined;
  if (values.suite !== undefined) {
    const parsed = SuiteSchema.safeParse(values.suite);
    if (!parsed.success) {
      throw new CliUsageError(`Unknown suite "${values.suite}" (expected http or ui)`);
    }
    suite = parsed.data;
  }

  return {
    help: values.help ?? false,
    verbose: values.verbose ?? false,
    headed: values.headed ?? false,
    report: values.report,
    suite,
    only: values.only ?? [],
    frontendUrl: values.frontend,
    backendUrl: values.backend,
  };
}
