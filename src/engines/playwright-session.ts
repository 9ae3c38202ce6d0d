import { chromium, errors } from 'playwright';
import type { Browser, Page } from 'playwright';
import { LayoutMetricsSchema } from '../schemas/index.js';
import type { ChromiumLaunchOptions, LayoutMetrics, SessionSettings, Viewport } from '../types/index.js';
import { WaitTimeoutError } from './browser-session.js';
import type { BrowserSession } from './browser-session.js';

export class PlaywrightSession implements BrowserSession {
  private timeoutMs = 10_000;

  constructor(
    readonly strategy: string,
    private browser: Browser,
    private page: Page,
  ) {}

  async configure(settings: SessionSettings): Promise<void> {
    this.timeoutMs = settings.timeoutMs;
    this.page.setDefaultTimeout(settings.timeoutMs);
    this.page.setDefaultNavigationTimeout(settings.timeoutMs);
    await this.page.setViewportSize(settings.viewport);
  }

  async resize(viewport: Viewport): Promise<void> {
    await this.page.setViewportSize(viewport);
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  async waitForLoad(): Promise<void> {
    await this.page.waitForLoadState('load');
    await this.page.waitForFunction(() => document.readyState === 'complete');
  }

  async settle(): Promise<void> {
    try {
      await this.page.waitForLoadState('networkidle', { timeout: this.timeoutMs });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new WaitTimeoutError('network idle', this.timeoutMs);
      }
      throw error;
    }
  }

  async currentUrl(): Promise<string> {
    return this.page.url();
  }

  async currentTitle(): Promise<string> {
    return this.page.title();
  }

  async waitForVisible(selector: string): Promise<void> {
    try {
      await this.page.locator(selector).first().waitFor({ state: 'visible', timeout: this.timeoutMs });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new WaitTimeoutError(`"${selector}" to be visible`, this.timeoutMs);
      }
      throw error;
    }
  }

  async isVisible(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isVisible();
  }

  async count(selector: string): Promise<number> {
    return this.page.locator(selector).count();
  }

  async click(selector: string): Promise<void> {
    await this.page.locator(selector).first().click();
  }

  async attribute(selector: string, name: string): Promise<string | null> {
    return this.page.locator(selector).first().getAttribute(name);
  }

  async property(selector: string, name: string): Promise<unknown> {
    return this.page
      .locator(selector)
      .first()
      .evaluate((element, key): unknown => Reflect.get(element, key), name);
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
  }

  async layoutMetrics(): Promise<LayoutMetrics> {
    const raw = await this.page.evaluate(() => ({
      documentWidth: document.body.scrollWidth,
      viewportWidth: window.innerWidth,
    }));
    return LayoutMetricsSchema.parse(raw);
  }

  async navigationTiming(): Promise<unknown> {
    return this.page.evaluate(() => {
      const [entry] = performance.getEntriesByType('navigation');
      if (entry && 'loadEventEnd' in entry && typeof entry.loadEventEnd === 'number') {
        return { kind: 'entry', loadEventEnd: entry.loadEventEnd };
      }
      const legacy = performance.timing;
      if (legacy) {
        return { kind: 'legacy', navigationStart: legacy.navigationStart, loadEventEnd: legacy.loadEventEnd };
      }
      return null;
    });
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

/** Launch Chromium with the given options and open a fresh page on it. */
export async function launchPlaywrightSession(
  strategy: string,
  options: ChromiumLaunchOptions,
): Promise<BrowserSession> {
  const browser = await chromium.launch({
    channel: options.channel,
    executablePath: options.executablePath,
    headless: options.headless,
    args: options.args,
  });

  try {
    const page = await browser.newPage();
    return new PlaywrightSession(strategy, browser, page);
  } catch (error) {
    await browser.close().catch(() => undefined);
    throw error;
  }
}
