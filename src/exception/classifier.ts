import { AllStrategiesExhaustedError, AcquisitionError } from '../acquisition/strategy-chain.js';
import { WaitTimeoutError } from '../engines/browser-session.js';
import { ScenarioSkippedError } from '../lifecycle/session-scope.js';
import { TransportError } from '../probes/probe-client.js';
import { AssertionFailure } from '../runner/assertions.js';
import type { FailureKind, ScenarioOutcome } from '../types/index.js';

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof AssertionFailure) return 'assertion';
  if (error instanceof TransportError) return 'transport';
  if (error instanceof WaitTimeoutError) return 'timeout';

  const text = extractMessage(error).toLowerCase();

  if (isTimeout(text)) {
    return 'timeout';
  }

  if (isTransport(text)) {
    return 'transport';
  }

  return 'unexpected';
}

/**
 * Turn whatever a scenario threw into its outcome. Environment problems
 * (no browser could be acquired) are skips; everything else is a failure.
 */
export function toOutcome(error: unknown, notes: string[]): ScenarioOutcome {
  if (
    error instanceof ScenarioSkippedError ||
    error instanceof AllStrategiesExhaustedError ||
    error instanceof AcquisitionError
  ) {
    return { status: 'skipped', reason: error.message, notes };
  }

  return {
    status: 'failed',
    kind: classifyFailure(error),
    reason: extractMessage(error),
    notes,
  };
}

function extractMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

function isTimeout(text: string): boolean {
  const patterns = ['timeout', 'timed out', 'exceeded while waiting'];
  return patterns.some((p) => text.includes(p));
}

function isTransport(text: string): boolean {
  const patterns = [
    'econnrefused',
    'econnreset',
    'enotfound',
    'eai_again',
    'fetch failed',
    'net::err_',
    'socket hang up',
  ];
  return patterns.some((p) => text.includes(p));
}
