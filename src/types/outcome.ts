export type Suite = 'http' | 'ui';

export type FailureKind = 'assertion' | 'transport' | 'timeout' | 'unexpected';

export type ScenarioOutcome =
  | { status: 'passed'; notes: string[] }
  | { status: 'failed'; kind: FailureKind; reason: string; notes: string[] }
  | { status: 'skipped'; reason: string; notes: string[] };

export type OutcomeStatus = ScenarioOutcome['status'];

export interface ScenarioResult {
  id: string;
  title: string;
  suite: Suite;
  outcome: ScenarioOutcome;
  durationMs: number;
}

export interface RunReport {
  startedAt: string;
  durationMs: number;
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  results: ScenarioResult[];
}
