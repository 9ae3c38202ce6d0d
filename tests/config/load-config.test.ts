import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig, readEnvConfig } from '../../src/config/load-config.js';

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = loadConfig({}, {});

    expect(config).toEqual({
      frontendUrl: 'http://localhost:3001',
      backendUrl: 'http://localhost:3000',
      graphqlPath: '/graphql',
      requestTimeoutMs: 10_000,
      waitTimeoutMs: 10_000,
      headless: true,
      browserChannel: 'chrome',
      pinnedBrowsersPath: '.cache/liveqa-smoke/browsers',
      installTimeoutMs: 300_000,
      strictFormValidation: false,
      desktopViewport: { width: 1920, height: 1080 },
      mobileViewport: { width: 390, height: 844 },
      overflowTolerancePx: 20,
      loadTimeCeilingMs: 10_000,
      routes: ['/', '/about', '/rooms/create', '/rooms/join'],
    });
  });

  it('reads and coerces environment variables', () => {
    const config = loadConfig(
      {},
      {
        SMOKE_FRONTEND_URL: 'http://staging.test:8080/',
        SMOKE_REQUEST_TIMEOUT_MS: '2500',
        SMOKE_HEADLESS: 'false',
        SMOKE_STRICT_VALIDATION: '1',
        SMOKE_PINNED_BROWSER_PATH: '/opt/chromium/chrome',
        SMOKE_INSTALL_TIMEOUT_MS: '60000',
      },
    );

    expect(config.frontendUrl).toBe('http://staging.test:8080');
    expect(config.requestTimeoutMs).toBe(2500);
    expect(config.headless).toBe(false);
    expect(config.strictFormValidation).toBe(true);
    expect(config.pinnedExecutablePath).toBe('/opt/chromium/chrome');
    expect(config.installTimeoutMs).toBe(60_000);
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadConfig(
      { backendUrl: 'http://api.test', headless: undefined },
      { SMOKE_BACKEND_URL: 'http://other.test', SMOKE_HEADLESS: 'false' },
    );

    expect(config.backendUrl).toBe('http://api.test');
    expect(config.headless).toBe(false);
  });

  it('ignores empty environment values', () => {
    expect(loadConfig({}, { SMOKE_BROWSER_CHANNEL: '' }).browserChannel).toBe('chrome');
  });

  it('throws ConfigError naming the offending field', () => {
    const error = (() => {
      try {
        loadConfig({}, { SMOKE_FRONTEND_URL: 'not a url' });
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty('message', 'Invalid configuration: frontendUrl: Invalid url');
  });

  it('rejects unrecognised booleans', () => {
    expect(() => loadConfig({}, { SMOKE_HEADLESS: 'yes' })).toThrow(ConfigError);
  });
});

describe('readEnvConfig', () => {
  it('maps only the known variables', () => {
    expect(readEnvConfig({ SMOKE_GRAPHQL_PATH: '/api/graphql', PATH: '/usr/bin' })).toEqual({
      graphqlPath: '/api/graphql',
    });
  });
});
