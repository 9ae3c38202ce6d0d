import type { BrowserSession } from '../engines/browser-session.js';
import type { Logger } from '../logging/logger.js';
import type { SessionSettings } from '../types/index.js';

export class ScenarioSkippedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScenarioSkippedError';
  }
}

/**
 * Scope one browser session to one body execution.
 *
 * Acquisition failure is an environment problem, so it surfaces as
 * `ScenarioSkippedError` rather than a failure. Once a session exists it is
 * closed exactly once on every exit path; a failing close is logged and
 * dropped so it never replaces the body's own result or error.
 */
export async function withSession<T>(
  acquire: () => Promise<BrowserSession>,
  settings: SessionSettings,
  body: (session: BrowserSession) => Promise<T>,
  logger?: Logger,
): Promise<T> {
  let session: BrowserSession;
  try {
    session = await acquire();
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ScenarioSkippedError(`Could not acquire a browser session. Last error: ${detail}`);
  }

  logger?.debug({ strategy: session.strategy }, 'browser session acquired');
  try {
    await session.configure(settings);
    return await body(session);
  } finally {
    await release(session, logger);
  }
}

async function release(session: BrowserSession, logger?: Logger): Promise<void> {
  try {
    await session.close();
    logger?.debug({ strategy: session.strategy }, 'browser session released');
  } catch (error) {
    logger?.warn({ strategy: session.strategy, err: error }, 'browser session release failed');
  }
}
