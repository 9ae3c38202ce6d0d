import type { LayoutMetrics, SessionSettings, Viewport } from '../types/index.js';

export class WaitTimeoutError extends Error {
  constructor(
    public condition: string,
    public timeoutMs: number,
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for ${condition}`);
    this.name = 'WaitTimeoutError';
  }
}

/**
 * One controllable browser page. Selector arguments use Playwright selector
 * syntax and always address the first matching element.
 */
export interface BrowserSession {
  readonly strategy: string;
  configure(settings: SessionSettings): Promise<void>;
  resize(viewport: Viewport): Promise<void>;
  goto(url: string): Promise<void>;
  waitForLoad(): Promise<void>;
  /** Wait for the network to go quiet; throws `WaitTimeoutError` if it never does. */
  settle(): Promise<void>;
  currentUrl(): Promise<string>;
  currentTitle(): Promise<string>;
  /** Throws `WaitTimeoutError` when nothing visible matches within the timeout. */
  waitForVisible(selector: string): Promise<void>;
  isVisible(selector: string): Promise<boolean>;
  count(selector: string): Promise<number>;
  click(selector: string): Promise<void>;
  attribute(selector: string, name: string): Promise<string | null>;
  property(selector: string, name: string): Promise<unknown>;
  scrollToBottom(): Promise<void>;
  layoutMetrics(): Promise<LayoutMetrics>;
  navigationTiming(): Promise<unknown>;
  close(): Promise<void>;
}
