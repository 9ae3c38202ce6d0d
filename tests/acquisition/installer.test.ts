import { ChildProcess } from 'node:child_process';
import type { SpawnOptions } from 'node:child_process';
import { resolve } from 'node:path';
import { PassThrough } from 'node:stream';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { createChromiumInstaller, pinnedBuildPath } from '../../src/acquisition/installer.js';
import type { InstallRequest } from '../../src/acquisition/installer.js';
import { AcquisitionError } from '../../src/acquisition/strategy-chain.js';

function fakeProcess() {
  const proc = new ChildProcess();
  const stdout = new PassThrough();
  proc.stdout = stdout;
  proc.stderr = new PassThrough();
  const kill = vi.spyOn(proc, 'kill').mockReturnValue(true);
  return { proc, stdout, kill };
}

function fakeSpawn(proc: ChildProcess) {
  return vi.fn((_command: string, _args: readonly string[], _options: SpawnOptions) => proc);
}

const REQUEST: InstallRequest = { strategy: 'pinned-build', timeoutMs: 1_000, browsersPath: '/opt/smoke-browsers' };

describe('createChromiumInstaller', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs playwright install into the requested directory and forwards progress', async () => {
    const { proc, stdout } = fakeProcess();
    const spawn = fakeSpawn(proc);
    const progress: string[] = [];
    const install = createChromiumInstaller(spawn);

    const pending = install({ ...REQUEST, onProgress: (line) => progress.push(line) });
    stdout.write('Downloading Chromium 120.0.6099.28\n');
    await new Promise((done) => setImmediate(done));
    proc.emit('close', 0, null);
    await pending;

    expect(progress).toEqual(['Downloading Chromium 120.0.6099.28']);
    const [command, args, options] = spawn.mock.calls[0];
    expect(command).toBe(process.platform === 'win32' ? 'npx.cmd' : 'npx');
    expect(args).toEqual(['playwright', 'install', 'chromium']);
    expect(options.shell).toBe(process.platform === 'win32');
    expect(options.env?.PLAYWRIGHT_BROWSERS_PATH).toBe(resolve('/opt/smoke-browsers'));
  });

  it('rejects with an acquisition error on a non-zero exit', async () => {
    const { proc } = fakeProcess();
    const install = createChromiumInstaller(fakeSpawn(proc));

    const pending = install(REQUEST).catch((e: unknown) => e);
    proc.emit('close', 1, null);
    const error = await pending;

    expect(error).toBeInstanceOf(AcquisitionError);
    expect(error).toHaveProperty('message', 'playwright install chromium exited with code 1');
    expect(error).toHaveProperty('strategy', 'pinned-build');
  });

  it('kills a stalled install once the timeout passes', async () => {
    vi.useFakeTimers();
    const { proc, kill } = fakeProcess();
    const install = createChromiumInstaller(fakeSpawn(proc));

    const pending = install(REQUEST).catch((e: unknown) => e);
    vi.advanceTimersByTime(1_000);
    const error = await pending;

    expect(kill).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(AcquisitionError);
    expect(error).toHaveProperty('message', 'playwright install chromium timed out after 1000ms');
  });

  it('reports a spawn failure', async () => {
    const { proc } = fakeProcess();
    const install = createChromiumInstaller(fakeSpawn(proc));

    const pending = install(REQUEST).catch((e: unknown) => e);
    proc.emit('error', new Error('spawn npx ENOENT'));

    expect(await pending).toHaveProperty('message', 'playwright install chromium could not start: spawn npx ENOENT');
  });

  it('does not retry a failed install for the same directory', async () => {
    const { proc } = fakeProcess();
    const spawn = fakeSpawn(proc);
    const install = createChromiumInstaller(spawn);

    const first = install(REQUEST).catch((e: unknown) => e);
    proc.emit('close', 1, null);
    await first;
    const second = await install(REQUEST).catch((e: unknown) => e);

    expect(spawn).toHaveBeenCalledTimes(1);
    expect(second).toHaveProperty('message', 'playwright install chromium exited with code 1');
  });

  it('installs separately for a different directory', async () => {
    const { proc } = fakeProcess();
    const spawn = fakeSpawn(proc);
    const install = createChromiumInstaller(spawn);

    const pinned = install(REQUEST);
    const shared = install({ ...REQUEST, strategy: 'managed-latest', browsersPath: undefined });
    proc.emit('close', 0, null);
    await Promise.all([pinned, shared]);

    expect(spawn).toHaveBeenCalledTimes(2);
    expect(spawn.mock.calls[1][2].env?.PLAYWRIGHT_BROWSERS_PATH).toBe(process.env.PLAYWRIGHT_BROWSERS_PATH);
  });
});

describe('pinnedBuildPath', () => {
  it('keeps the revision layout of the managed build under the pinned directory', () => {
    expect(pinnedBuildPath('/opt/smoke-browsers', '/home/ci/.cache/ms-playwright/chromium-1134/chrome-linux/chrome')).toBe(
      resolve('/opt/smoke-browsers', 'chromium-1134', 'chrome-linux', 'chrome'),
    );
  });

  it('rejects a path without a revision directory', () => {
    expect(() => pinnedBuildPath('/opt/smoke-browsers', '/usr/bin/chromium')).toThrow(AcquisitionError);
  });
});
