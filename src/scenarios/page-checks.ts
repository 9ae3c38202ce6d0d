import { NavigationTimingSchema } from '../schemas/index.js';
import type { LayoutMetrics } from '../types/index.js';

export const PRODUCT_TERMS = ['Live', 'Q&A', 'QnA'];

export function mentionsProduct(text: string): boolean {
  return PRODUCT_TERMS.some((term) => text.includes(term));
}

export function looksLikeHtml(body: string): boolean {
  const lower = body.toLowerCase();
  return lower.includes('<html') || lower.includes('<!doctype html');
}

export function fitsViewport(metrics: LayoutMetrics, tolerancePx: number): boolean {
  return metrics.documentWidth <= metrics.viewportWidth + tolerancePx;
}

export type Landing = 'target' | 'signin' | 'elsewhere';

/**
 * Where a direct visit to an authenticated-only route ended up. Query strings
 * are ignored and relative URLs are accepted, so `/auth/signin?callbackUrl=/rooms/create` is a sign-in landing.
 * The target matches as a whole path segment: `/rooms/joined` is not `/rooms/join`.
 */
export function classifyLanding(currentUrl: string, targetPath: string): Landing {
  const path = new URL(currentUrl, 'http://localhost').pathname;
  if (path.includes('signin')) return 'signin';
  if (path === targetPath || path.startsWith(`${targetPath}/`)) return 'target';
  return 'elsewhere';
}

export interface ValidationState {
  required: string | null;
  className: string | null;
  validationMessage: unknown;
}

export function hasValidationSignal(state: ValidationState): boolean {
  if (state.required !== null) return true;
  if (state.className && /invalid|error/.test(state.className)) return true;
  return typeof state.validationMessage === 'string' && state.validationMessage.length > 0;
}

export type LoadTimeSource = 'navigation-entry' | 'legacy-timing' | 'wall-clock';

export interface LoadTime {
  ms: number;
  source: LoadTimeSource;
}

/**
 * Prefer the browser's own navigation timing over the wall clock measured
 * around `goto`. A zero `loadEventEnd` means the load event has not finished
 * being recorded, and the wall clock is used instead.
 */
export function resolveLoadTime(timing: unknown, wallClockMs: number): LoadTime {
  const parsed = NavigationTimingSchema.safeParse(timing);
  if (parsed.success) {
    const data = parsed.data;
    if (data.kind === 'entry' && data.loadEventEnd > 0) {
      return { ms: Math.round(data.loadEventEnd), source: 'navigation-entry' };
    }
    if (data.kind === 'legacy' && data.navigationStart > 0 && data.loadEventEnd > data.navigationStart) {
      return { ms: data.loadEventEnd - data.navigationStart, source: 'legacy-timing' };
    }
  }
  return { ms: Math.round(wallClockMs), source: 'wall-clock' };
}
