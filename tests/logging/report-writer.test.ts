import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { buildReportMarkdown, writeReport } from '../../src/logging/report-writer.js';
import type { RunReport } from '../../src/types/index.js';

const target = { frontendUrl: 'http://localhost:3001', backendUrl: 'http://localhost:3000' };

function makeReport(overrides?: Partial<RunReport>): RunReport {
  return {
    startedAt: '2026-03-02T09:30:00.000Z',
    durationMs: 74_200,
    total: 3,
    passed: 1,
    failed: 1,
    skipped: 1,
    results: [
      {
        id: 'http.frontend-liveness',
        title: 'Frontend serves HTML',
        suite: 'http',
        outcome: { status: 'passed', notes: [] },
        durationMs: 120,
      },
      {
        id: 'http.backend-liveness',
        title: 'Backend answers GraphQL',
        suite: 'http',
        outcome: {
          status: 'failed',
          kind: 'transport',
          reason: 'Backend server is not accessible: fetch failed (connect ECONNREFUSED 127.0.0.1:3000)',
          notes: [],
        },
        durationMs: 15,
      },
      {
        id: 'ui.footer',
        title: 'Footer is present',
        suite: 'ui',
        outcome: { status: 'skipped', reason: 'Could not acquire a browser session', notes: ['Footer element not found'] },
        durationMs: 3,
      },
    ],
    ...overrides,
  };
}

describe('buildReportMarkdown', () => {
  it('renders header, table, problems and notes', () => {
    const markdown = buildReportMarkdown(makeReport(), target);

    expect(markdown).toBe(
      [
        '# Smoke Test Report',
        '- Frontend: http://localhost:3001',
        '- Backend: http://localhost:3000',
        '- Result: Failed',
        '- Scenarios: 1 passed, 1 failed, 1 skipped (3 total)',
        '- Started at: 2026-03-02T09:30:00.000Z',
        '- Duration: 01m 14s',
        '',
        '## Scenarios',
        '',
        '| Scenario | Suite | Result | Time |',
        '|----------|-------|--------|------|',
        '| http.frontend-liveness | http | PASS | 120ms |',
        '| http.backend-liveness | http | FAIL (transport) | 15ms |',
        '| ui.footer | ui | SKIP | 3ms |',
        '',
        '## Failures & Skips',
        '',
        '### http.backend-liveness: Backend answers GraphQL',
        '- FAIL (transport): Backend server is not accessible: fetch failed (connect ECONNREFUSED 127.0.0.1:3000)',
        '',
        '### ui.footer: Footer is present',
        '- SKIP: Could not acquire a browser session',
        '',
        '## Notes',
        '',
        '- ui.footer: Footer element not found',
        '',
      ].join('\n'),
    );
  });

  it('omits empty sections on a clean run', () => {
    const report = makeReport({
      total: 1,
      passed: 1,
      failed: 0,
      skipped: 0,
      results: [makeReport().results[0]],
    });

    const markdown = buildReportMarkdown(report, target);

    expect(markdown).toContain('- Result: Passed');
    expect(markdown).not.toContain('## Failures & Skips');
    expect(markdown).not.toContain('## Notes');
  });

  it('counts a skip-only run as passed', () => {
    const report = makeReport({ failed: 0, passed: 0, total: 1, results: [makeReport().results[2]] });

    expect(buildReportMarkdown(report, target)).toContain('- Result: Passed');
  });
});

describe('writeReport', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'smoke-report-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates missing directories and writes the markdown', async () => {
    const file = join(dir, 'nested', 'report.md');

    await writeReport(file, makeReport(), target);

    expect(await readFile(file, 'utf-8')).toBe(buildReportMarkdown(makeReport(), target));
  });
});
