import type { RunReport, ScenarioResult } from '../types/index.js';

const MARKERS = { passed: 'PASS', failed: 'FAIL', skipped: 'SKIP' } as const;

export function formatResult(result: ScenarioResult, verbose: boolean): string[] {
  const { outcome } = result;
  const lines = [`  ${MARKERS[outcome.status]}  ${result.id} (${result.durationMs}ms)`];

  if (outcome.status !== 'passed') {
    lines.push(`        ${outcome.reason}`);
  }
  if (verbose) {
    for (const note of outcome.notes) {
      lines.push(`        note: ${note}`);
    }
  }
  return lines;
}

export function formatSummary(report: RunReport): string {
  return `\n${report.passed} passed, ${report.failed} failed, ${report.skipped} skipped (${report.total} total) in ${(report.durationMs / 1000).toFixed(1)}s`;
}
