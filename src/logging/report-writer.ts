import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { RunReport, ScenarioResult } from '../types/index.js';

export interface ReportTarget {
  frontendUrl: string;
  backendUrl: string;
}

/**
 * Write the human-readable markdown report for one run.
 */
export async function writeReport(filePath: string, report: RunReport, target: ReportTarget): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, buildReportMarkdown(report, target), 'utf-8');
}

export function buildReportMarkdown(report: RunReport, target: ReportTarget): string {
  const overall = report.failed > 0 ? 'Failed' : 'Passed';

  const lines: string[] = [
    '# Smoke Test Report',
    `- Frontend: ${target.frontendUrl}`,
    `- Backend: ${target.backendUrl}`,
    `- Result: ${overall}`,
    `- Scenarios: ${report.passed} passed, ${report.failed} failed, ${report.skipped} skipped (${report.total} total)`,
    `- Started at: ${report.startedAt}`,
    `- Duration: ${formatDuration(report.durationMs)}`,
    '',
    '## Scenarios',
    '',
    '| Scenario | Suite | Result | Time |',
    '|----------|-------|--------|------|',
  ];

  for (const result of report.results) {
    lines.push(`| ${result.id} | ${result.suite} | ${label(result)} | ${result.durationMs}ms |`);
  }

  const problems = report.results.filter((r) => r.outcome.status !== 'passed');
  if (problems.length > 0) {
    lines.push('', '## Failures & Skips');
    for (const result of problems) {
      if (result.outcome.status === 'passed') continue;
      lines.push('', `### ${result.id}: ${result.title}`, `- ${label(result)}: ${result.outcome.reason}`);
    }
  }

  const noted = report.results.filter((r) => r.outcome.notes.length > 0);
  if (noted.length > 0) {
    lines.push('', '## Notes', '');
    for (const result of noted) {
      for (const note of result.outcome.notes) {
        lines.push(`- ${result.id}: ${note}`);
      }
    }
  }

  return lines.join('\n') + '\n';
}

function label(result: ScenarioResult): string {
  const { outcome } = result;
  switch (outcome.status) {
    case 'passed':
      return 'PASS';
    case 'failed':
      return `FAIL (${outcome.kind})`;
    case 'skipped':
      return 'SKIP';
  }
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
