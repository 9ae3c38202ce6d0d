export { HarnessConfigSchema, ViewportSchema } from './config.schema.js';
export type { HarnessConfig, HarnessConfigInput } from './config.schema.js';
export {
  LayoutMetricsSchema,
  NavigationTimingSchema,
  StructuredBodySchema,
} from './page.schema.js';
export type { NavigationTiming } from './page.schema.js';
