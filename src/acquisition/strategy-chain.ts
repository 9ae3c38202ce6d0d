import type { Logger } from '../logging/logger.js';

export class AcquisitionError extends Error {
  constructor(
    message: string,
    public strategy: string,
  ) {
    super(message);
    this.name = 'AcquisitionError';
  }
}

export interface StrategyFailure {
  strategy: string;
  message: string;
}

export class AllStrategiesExhaustedError extends Error {
  constructor(public failures: StrategyFailure[]) {
    const last = failures.at(-1);
    super(
      last
        ? `All ${failures.length} acquisition strategies failed. Last error (${last.strategy}): ${last.message}`
        : 'No acquisition strategies configured',
    );
    this.name = 'AllStrategiesExhaustedError';
  }

  get lastFailure(): StrategyFailure | undefined {
    return this.failures.at(-1);
  }
}

export interface AcquisitionStrategy<T> {
  name: string;
  acquire(): Promise<T>;
}

export interface Acquired<T> {
  value: T;
  strategy: string;
  failures: StrategyFailure[];
}

/**
 * Try each strategy in order and return the first value produced. A throwing
 * strategy is recorded and skipped; strategies after the first success are
 * never invoked.
 */
export async function acquireFirst<T>(
  strategies: AcquisitionStrategy<T>[],
  logger?: Logger,
): Promise<Acquired<T>> {
  const failures: StrategyFailure[] = [];

  for (const strategy of strategies) {
    try {
      const value = await strategy.acquire();
      logger?.debug({ strategy: strategy.name, failedBefore: failures.length }, 'acquisition strategy succeeded');
      return { value, strategy: strategy.name, failures };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      failures.push({ strategy: strategy.name, message });
      logger?.debug({ strategy: strategy.name, err: message }, 'acquisition strategy failed');
    }
  }

  throw new AllStrategiesExhaustedError(failures);
}
