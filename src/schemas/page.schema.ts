import { z } from 'zod';

export const LayoutMetricsSchema = z.object({
  documentWidth: z.number().nonnegative(),
  viewportWidth: z.number().nonnegative(),
});

/** Level 2 `PerformanceNavigationTiming` entry; times are relative to navigation start. */
export const NavigationEntrySchema = z.object({
  kind: z.literal('entry'),
  loadEventEnd: z.number(),
});

/** Deprecated `performance.timing`; times are epoch milliseconds. */
export const LegacyTimingSchema = z.object({
  kind: z.literal('legacy'),
  navigationStart: z.number(),
  loadEventEnd: z.number(),
});

export const NavigationTimingSchema = z.discriminatedUnion('kind', [
  NavigationEntrySchema,
  LegacyTimingSchema,
]);

export type NavigationTiming = z.infer<typeof NavigationTimingSchema>;

export const StructuredBodySchema = z.union([z.record(z.unknown()), z.array(z.unknown())]);
