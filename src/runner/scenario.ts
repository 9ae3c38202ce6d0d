import type { BrowserSession } from '../engines/browser-session.js';
import type { Logger } from '../logging/logger.js';
import type { ProbeClient } from '../probes/probe-client.js';
import type { HarnessConfig } from '../schemas/index.js';
import type { Suite } from '../types/index.js';

export interface ScenarioContext {
  config: HarnessConfig;
  logger: Logger;
  http: ProbeClient;
  acquireSession(): Promise<BrowserSession>;
  /** Record an inconclusive observation; it never changes the outcome. */
  note(message: string): void;
}

export interface Scenario {
  id: string;
  title: string;
  suite: Suite;
  run(context: ScenarioContext): Promise<void>;
}
