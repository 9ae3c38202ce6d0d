import type { BrowserSession } from '../engines/browser-session.js';
import { launchPlaywrightSession } from '../engines/playwright-session.js';
import type { Logger } from '../logging/logger.js';
import type { HarnessConfig } from '../schemas/index.js';
import type { ChromiumLaunchOptions } from '../types/index.js';
import { installChromium, isBrowserInstalled, managedExecutablePath, pinnedBuildPath } from './installer.js';
import type { InstallRequest } from './installer.js';
import { AcquisitionError, acquireFirst } from './strategy-chain.js';
import type { AcquisitionStrategy } from './strategy-chain.js';

export const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-extensions',
  '--disable-blink-features=AutomationControlled',
];

export type StrategyName = 'system-chrome' | 'managed-latest' | 'pinned-build' | 'builtin';

export interface ChromiumDeps {
  open(strategy: StrategyName, options: ChromiumLaunchOptions): Promise<BrowserSession>;
  managedExecutablePath(): string;
  isInstalled(executablePath: string): boolean;
  install(request: InstallRequest): Promise<void>;
}

export const playwrightDeps: ChromiumDeps = {
  open: launchPlaywrightSession,
  managedExecutablePath,
  isInstalled: isBrowserInstalled,
  install: installChromium,
};

type BrowserConfig = Pick<
  HarnessConfig,
  'headless' | 'browserChannel' | 'pinnedExecutablePath' | 'pinnedBrowsersPath' | 'installTimeoutMs'
>;

export function createChromiumStrategies(
  config: BrowserConfig,
  deps: ChromiumDeps = playwrightDeps,
  logger?: Logger,
): AcquisitionStrategy<BrowserSession>[] {
  const base = { headless: config.headless, args: LAUNCH_ARGS };

  const ensureInstalled = async (strategy: StrategyName, executablePath: string, browsersPath?: string) => {
    if (deps.isInstalled(executablePath)) return;
    logger?.info({ strategy, executablePath }, 'Chromium build not found, installing');
    await deps.install({
      strategy,
      timeoutMs: config.installTimeoutMs,
      browsersPath,
      onProgress: (line) => logger?.debug({ installer: line }, 'playwright install'),
    });
    if (!deps.isInstalled(executablePath)) {
      throw new AcquisitionError(`Install finished but ${executablePath} is still missing`, strategy);
    }
  };

  return [
    {
      name: 'system-chrome',
      acquire: () => deps.open('system-chrome', { ...base, channel: config.browserChannel }),
    },
    {
      name: 'managed-latest',
      acquire: async () => {
        await ensureInstalled('managed-latest', deps.managedExecutablePath());
        return deps.open('managed-latest', base);
      },
    },
    {
      name: 'pinned-build',
      acquire: async () => {
        if (config.pinnedExecutablePath) {
          return deps.open('pinned-build', { ...base, executablePath: config.pinnedExecutablePath });
        }
        const executablePath = pinnedBuildPath(config.pinnedBrowsersPath, deps.managedExecutablePath());
        await ensureInstalled('pinned-build', executablePath, config.pinnedBrowsersPath);
        return deps.open('pinned-build', { ...base, executablePath });
      },
    },
    {
      name: 'builtin',
      acquire: () => deps.open('builtin', base),
    },
  ];
}

/** Acquire one browser session from the default strategy order. */
export async function acquireBrowserSession(
  config: BrowserConfig,
  deps: ChromiumDeps = playwrightDeps,
  logger?: Logger,
): Promise<BrowserSession> {
  const { value } = await acquireFirst(createChromiumStrategies(config, deps, logger), logger);
  return value;
}
