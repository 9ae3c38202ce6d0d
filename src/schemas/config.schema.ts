import { z } from 'zod';

const booleanish = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

export const ViewportSchema = z.object({
  width: z.coerce.number().int().positive(),
  height: z.coerce.number().int().positive(),
});

export const HarnessConfigSchema = z.object({
  frontendUrl: z.string().url().default('http://localhost:3001'),
  backendUrl: z.string().url().default('http://localhost:3000'),
  graphqlPath: z.string().startsWith('/').default('/graphql'),
  requestTimeoutMs: z.coerce.number().int().positive().default(10_000),
  waitTimeoutMs: z.coerce.number().int().positive().default(10_000),
  headless: booleanish.default(true),
  browserChannel: z.string().min(1).default('chrome'),
  pinnedExecutablePath: z.string().min(1).optional(),
  pinnedBrowsersPath: z.string().min(1).default('.cache/liveqa-smoke/browsers'),
  installTimeoutMs: z.coerce.number().int().positive().default(300_000),
  strictFormValidation: booleanish.default(false),
  desktopViewport: ViewportSchema.default({ width: 1920, height: 1080 }),
  mobileViewport: ViewportSchema.default({ width: 390, height: 844 }),
  overflowTolerancePx: z.coerce.number().int().nonnegative().default(20),
  loadTimeCeilingMs: z.coerce.number().int().positive().default(10_000),
  routes: z.array(z.string().startsWith('/')).min(1).default(['/', '/about', '/rooms/create', '/rooms/join']),
});

export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;
export type HarnessConfig = z.output<typeof HarnessConfigSchema>;
