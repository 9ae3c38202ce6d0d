import { StructuredBodySchema } from '../schemas/index.js';
import { assert, assertStatusIn } from '../runner/assertions.js';
import type { Scenario } from '../runner/scenario.js';
import { looksLikeHtml } from '../scenarios/page-checks.js';
import { TransportError } from './probe-client.js';
import type { ProbeResult } from '../types/index.js';

export const TYPENAME_QUERY = '{ __typename }';
export const SCHEMA_QUERY = '{ __schema { queryType { name } } }';

export const BACKEND_ACCEPTED = [200, 400] as const;
export const ROUTE_ACCEPTED = [200, 301, 302, 307, 308] as const;
export const SCHEMA_ACCEPTED = [200, 400, 401] as const;

/** Prefix the transport text with what was being reached; other errors pass through. */
async function reach(subject: string, request: () => Promise<ProbeResult>): Promise<ProbeResult> {
  try {
    return await request();
  } catch (error) {
    if (error instanceof TransportError) {
      throw new TransportError(`${subject} is not accessible: ${error.message}`, error.url);
    }
    throw error;
  }
}

export function parseStructuredBody(body: string): boolean {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return false;
  }
  return StructuredBodySchema.safeParse(parsed).success;
}

export const frontendLiveness: Scenario = {
  id: 'http.frontend-liveness',
  title: 'Frontend server serves an HTML document',
  suite: 'http',
  run: async ({ config, http, logger }) => {
    const res = await reach('Frontend server', () => http.get(config.frontendUrl));
    assertStatusIn(res.status, [200], 'Frontend');
    assert(res.body.length > 0, 'Frontend returned empty content');
    assert(looksLikeHtml(res.body), 'Frontend response is not HTML (no <html or doctype marker)');
    logger.debug({ elapsedMs: res.elapsedMs }, 'frontend responded');
  },
};

export const backendLiveness: Scenario = {
  id: 'http.backend-liveness',
  title: 'Backend API accepts a minimal query',
  suite: 'http',
  run: async ({ config, http, logger }) => {
    const url = `${config.backendUrl}${config.graphqlPath}`;
    const res = await reach('Backend server', () => http.postJson(url, { query: TYPENAME_QUERY }));
    assertStatusIn(res.status, BACKEND_ACCEPTED, 'Backend');
    logger.debug({ elapsedMs: res.elapsedMs, status: res.status }, 'backend responded');
  },
};

export const routeReachability: Scenario = {
  id: 'http.route-reachability',
  title: 'Key frontend routes respond or redirect',
  suite: 'http',
  run: async ({ config, http, logger }) => {
    for (const route of config.routes) {
      const res = await reach(`Route ${route}`, () => http.get(`${config.frontendUrl}${route}`));
      assertStatusIn(res.status, ROUTE_ACCEPTED, `Route ${route}`);
      logger.debug({ route, status: res.status, finalUrl: res.finalUrl }, 'route reachable');
    }
  },
};

export const apiSchema: Scenario = {
  id: 'http.api-schema',
  title: 'API endpoint speaks JSON to an introspection query',
  suite: 'http',
  run: async ({ config, http }) => {
    const url = `${config.backendUrl}${config.graphqlPath}`;
    const res = await reach('GraphQL endpoint', () => http.postJson(url, { query: SCHEMA_QUERY }));
    assertStatusIn(res.status, SCHEMA_ACCEPTED, 'GraphQL endpoint');
    assert(parseStructuredBody(res.body), 'GraphQL endpoint did not return valid JSON');
  },
};

export const httpProbes: Scenario[] = [frontendLiveness, backendLiveness, routeReachability, apiSchema];
