import type { ProbeResult } from '../types/index.js';

export interface ProbeClientOptions {
  timeoutMs?: number;
}

export interface ProbeRequest {
  method: 'GET' | 'POST';
  url: string;
  body?: unknown;
}

export class TransportError extends Error {
  constructor(
    message: string,
    public url: string,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * Node's fetch rejects with a bare "fetch failed" and keeps the socket error
 * on `cause`, so both are reported.
 */
export function describeTransportError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const cause = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}

/**
 * Session-free HTTP client for liveness probes. Every HTTP status comes back
 * as a `ProbeResult`; only network-level failures throw.
 */
export class ProbeClient {
  private timeoutMs: number;

  constructor(options: ProbeClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async request(options: ProbeRequest): Promise<ProbeResult> {
    const { method, url, body } = options;
    const headers: Record<string, string> = { Accept: 'text/html,application/json;q=0.9,*/*;q=0.8' };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const start = performance.now();

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        redirect: 'follow',
        signal: controller.signal,
      });
      const text = await response.text();

      return {
        status: response.status,
        body: text,
        finalUrl: response.url || url,
        elapsedMs: Math.round(performance.now() - start),
      };
    } catch (error) {
      if (error instanceof DOMException && error.name === 'AbortError') {
        throw new TransportError(`Request timed out after ${this.timeoutMs}ms`, url);
      }
      throw new TransportError(describeTransportError(error), url);
    } finally {
      clearTimeout(timeout);
    }
  }

  async get(url: string): Promise<ProbeResult> {
    return this.request({ method: 'GET', url });
  }

  async postJson(url: string, body: unknown): Promise<ProbeResult> {
    return this.request({ method: 'POST', url, body });
  }
}
