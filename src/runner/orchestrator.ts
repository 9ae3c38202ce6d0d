import type { BrowserSession } from '../engines/browser-session.js';
import { toOutcome } from '../exception/classifier.js';
import type { Logger } from '../logging/logger.js';
import type { ProbeClient } from '../probes/probe-client.js';
import type { HarnessConfig } from '../schemas/index.js';
import type { RunReport, ScenarioOutcome, ScenarioResult } from '../types/index.js';
import type { Scenario, ScenarioContext } from './scenario.js';

export interface OrchestratorDeps {
  config: HarnessConfig;
  logger: Logger;
  http: ProbeClient;
  acquireSession(): Promise<BrowserSession>;
  onResult?: (result: ScenarioResult) => void;
}

/**
 * Run one scenario in isolation. Never throws: whatever the body raises is
 * folded into the outcome.
 */
export async function runScenario(scenario: Scenario, deps: OrchestratorDeps): Promise<ScenarioResult> {
  const logger = deps.logger.child({ scenario: scenario.id });
  const notes: string[] = [];
  const context: ScenarioContext = {
    config: deps.config,
    logger,
    http: deps.http,
    acquireSession: deps.acquireSession,
    note: (message) => {
      notes.push(message);
      logger.info({ note: message }, 'scenario note');
    },
  };

  const start = performance.now();
  let outcome: ScenarioOutcome;
  try {
    await scenario.run(context);
    outcome = { status: 'passed', notes };
  } catch (error) {
    outcome = toOutcome(error, notes);
  }
  const durationMs = Math.round(performance.now() - start);

  logger.info({ status: outcome.status, durationMs }, 'scenario finished');
  return { id: scenario.id, title: scenario.title, suite: scenario.suite, outcome, durationMs };
}

/**
 * Execute scenarios one after another. A failing scenario never stops the
 * rest of the queue.
 */
export async function runScenarios(scenarios: Scenario[], deps: OrchestratorDeps): Promise<RunReport> {
  const startedAt = new Date().toISOString();
  const start = performance.now();
  const results: ScenarioResult[] = [];

  for (const scenario of scenarios) {
    const result = await runScenario(scenario, deps);
    results.push(result);
    deps.onResult?.(result);
  }

  return {
    startedAt,
    durationMs: Math.round(performance.now() - start),
    total: results.length,
    passed: results.filter((r) => r.outcome.status === 'passed').length,
    failed: results.filter((r) => r.outcome.status === 'failed').length,
    skipped: results.filter((r) => r.outcome.status === 'skipped').length,
    results,
  };
}

export function exitCodeFor(report: RunReport): number {
  return report.failed > 0 ? 1 : 0;
}
