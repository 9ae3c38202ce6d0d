import { spawn } from 'node:child_process';
import type { ChildProcess, SpawnOptions } from 'node:child_process';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { chromium } from 'playwright';
import { AcquisitionError } from './strategy-chain.js';

export type SpawnProcess = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export interface InstallRequest {
  /** Strategy the install runs for; named in the errors it raises. */
  strategy: string;
  timeoutMs: number;
  /** Install into this directory instead of Playwright's shared cache. */
  browsersPath?: string;
  onProgress?: (message: string) => void;
}

/**
 * Path of the Chromium build the installed Playwright release expects in its
 * shared cache. It may not exist yet.
 */
export function managedExecutablePath(): string {
  return chromium.executablePath();
}

export function isBrowserInstalled(executablePath: string): boolean {
  return existsSync(executablePath);
}

/**
 * Where the pinned copy of the managed Chromium revision lives inside
 * `browsersDir`. Playwright lays every cache out as
 * `chromium-<revision>/<platform dir>/<binary>`, so the part of the managed
 * path from the revision directory on is reused.
 */
export function pinnedBuildPath(browsersDir: string, managedPath: string): string {
  const parts = managedPath.split(/[\\/]/);
  const index = parts.findIndex((part) => /^chromium-\d+$/.test(part));
  if (index === -1) {
    throw new AcquisitionError(`Cannot find a Chromium revision directory in ${managedPath}`, 'pinned-build');
  }
  return join(resolve(browsersDir), ...parts.slice(index));
}

/**
 * Build an installer that runs `playwright install chromium` at most once per
 * target directory for the life of the process. A failed or timed-out install
 * is reported again to later callers instead of being retried.
 */
export function createChromiumInstaller(spawnProcess: SpawnProcess = spawn): (request: InstallRequest) => Promise<void> {
  const attempts = new Map<string, Promise<void>>();

  return (request) => {
    const key = request.browsersPath ?? '(shared)';
    const previous = attempts.get(key);
    if (previous) return previous;

    const attempt = runInstall(spawnProcess, request);
    attempts.set(key, attempt);
    return attempt;
  };
}

function runInstall(spawnProcess: SpawnProcess, request: InstallRequest): Promise<void> {
  const { strategy, timeoutMs, browsersPath, onProgress } = request;
  const command = process.platform === 'win32' ? 'npx.cmd' : 'npx';
  const env = browsersPath ? { ...process.env, PLAYWRIGHT_BROWSERS_PATH: resolve(browsersPath) } : process.env;

  return new Promise((resolvePromise, reject) => {
    const proc = spawnProcess(command, ['playwright', 'install', 'chromium'], {
      stdio: ['ignore', 'pipe', 'pipe'],
      shell: process.platform === 'win32',
      env,
    });

    const timer = setTimeout(() => {
      proc.kill();
      reject(new AcquisitionError(`playwright install chromium timed out after ${timeoutMs}ms`, strategy));
    }, timeoutMs);

    const forward = (data: Buffer) => {
      const line = data.toString().trim();
      if (line) onProgress?.(line);
    };
    proc.stdout?.on('data', forward);
    proc.stderr?.on('data', forward);

    proc.on('close', (code) => {
      clearTimeout(timer);
      if (code === 0) {
        resolvePromise();
      } else {
        reject(new AcquisitionError(`playwright install chromium exited with code ${code}`, strategy));
      }
    });

    proc.on('error', (error) => {
      clearTimeout(timer);
      reject(new AcquisitionError(`playwright install chromium could not start: ${error.message}`, strategy));
    });
  });
}

export const installChromium = createChromiumInstaller();
