import type { ZodIssue } from 'zod';
import { HarnessConfigSchema } from '../schemas/index.js';
import type { HarnessConfig, HarnessConfigInput } from '../schemas/index.js';

export class ConfigError extends Error {
  constructor(public issues: ZodIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'ConfigError';
  }
}

const ENV_KEYS = {
  frontendUrl: 'SMOKE_FRONTEND_URL',
  backendUrl: 'SMOKE_BACKEND_URL',
  graphqlPath: 'SMOKE_GRAPHQL_PATH',
  requestTimeoutMs: 'SMOKE_REQUEST_TIMEOUT_MS',
  waitTimeoutMs: 'SMOKE_WAIT_TIMEOUT_MS',
  headless: 'SMOKE_HEADLESS',
  browserChannel: 'SMOKE_BROWSER_CHANNEL',
  pinnedExecutablePath: 'SMOKE_PINNED_BROWSER_PATH',
  pinnedBrowsersPath: 'SMOKE_PINNED_BROWSERS_DIR',
  installTimeoutMs: 'SMOKE_INSTALL_TIMEOUT_MS',
  strictFormValidation: 'SMOKE_STRICT_VALIDATION',
} as const satisfies Partial<Record<keyof HarnessConfigInput, string>>;

export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const input: Record<string, string> = {};
  for (const [field, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      input[field] = value;
    }
  }
  return input;
}

/**
 * Resolve the harness configuration. Explicit overrides win over the
 * environment, which wins over the schema defaults.
 */
export function loadConfig(
  overrides: HarnessConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): HarnessConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  const parsed = HarnessConfigSchema.safeParse({ ...readEnvConfig(env), ...defined });
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }

  const config = parsed.data;
  return {
    ...config,
    frontendUrl: config.frontendUrl.replace(/\/$/, ''),
    backendUrl: config.backendUrl.replace(/\/$/, ''),
  };
}
