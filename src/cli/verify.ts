#!/usr/bin/env node
/**
 * CLI: run the smoke battery against a live deployment.
 *
 * Usage: npx tsx src/cli/verify.ts [--suite http|ui] [--report report.md] [--verbose]
 *
 * Prints one PASS/FAIL/SKIP line per scenario on stdout; structured logs go
 * to stderr. Exit code 1 means at least one scenario failed, 2 a usage or
 * configuration error.
 */

import { acquireBrowserSession, playwrightDeps } from '../acquisition/chromium-strategies.js';
import { ConfigError, loadConfig } from '../config/load-config.js';
import { makeLogger } from '../logging/logger.js';
import { writeReport } from '../logging/report-writer.js';
import { ProbeClient } from '../probes/probe-client.js';
import type { HarnessConfig } from '../schemas/index.js';
import { exitCodeFor, runScenarios } from '../runner/orchestrator.js';
import { allScenarios, selectScenarios, unknownScenarioIds } from '../scenarios/index.js';
import { CliUsageError, USAGE, parseCliArgs } from './args.js';
import type { CliOptions } from './args.js';
import { formatResult, formatSummary } from './format.js';

function print(line: string): void {
  process.stdout.write(line + '\n');
}

async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof CliUsageError)) throw error;
    process.stderr.write(`${error.message}\n\n${USAGE}`);
    return 2;
  }

  if (options.help) {
    print(USAGE);
    return 0;
  }

  let config: HarnessConfig;
  try {
    config = loadConfig({
      frontendUrl: options.frontendUrl,
      backendUrl: options.backendUrl,
      headless: options.headed ? false : undefined,
    });
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    process.stderr.write(`${error.message}\n`);
    return 2;
  }

  const unknown = unknownScenarioIds(allScenarios, options.only);
  if (unknown.length > 0) {
    process.stderr.write(`Unknown scenario id: ${unknown.join(', ')}\n\n${USAGE}`);
    return 2;
  }

  const scenarios = selectScenarios(allScenarios, { suite: options.suite, only: options.only });
  if (scenarios.length === 0) {
    process.stderr.write('No scenarios match the given --suite/--only filters\n');
    return 2;
  }

  const logger = makeLogger({ level: options.verbose ? 'debug' : undefined });
  const http = new ProbeClient({ timeoutMs: config.requestTimeoutMs });

  print(`\nLive Q&A smoke tests: ${scenarios.length} scenarios`);
  print(`Frontend: ${config.frontendUrl}  Backend: ${config.backendUrl}\n`);

  const report = await runScenarios(scenarios, {
    config,
    logger,
    http,
    acquireSession: () => acquireBrowserSession(config, playwrightDeps, logger),
    onResult: (result) => formatResult(result, options.verbose).forEach(print),
  });

  print(formatSummary(report));

  if (options.report) {
    await writeReport(options.report, report, config);
    print(`Report written to ${options.report}`);
  }

  return exitCodeFor(report);
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
    process.exitCode = 1;
  },
);
