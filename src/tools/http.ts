/**
 * HTTP client for tool adapters.
 *
 * Failures come back as values, not exceptions, so adapters can turn them
 * into text for the model. The one exception is cancellation of the caller's
 * signal, which rethrows its reason so the whole query stops.
 */

import { deadline, linkSignals } from '../core/abort.js';

export interface HttpRequest {
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Serialized as JSON */
  body?: unknown;
  signal?: AbortSignal;
}

export type HttpResult =
  | { ok: true; status: number; data: unknown }
  | { ok: false; status?: number; reason: string };

export type HttpClient = (request: HttpRequest) => Promise<HttpResult>;

export interface HttpClientOptions {
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

class HttpTimeout {
  constructor(readonly ms: number) {}
}

export function createHttpClient(options: HttpClientOptions): HttpClient {
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (request) => {
    const timeout = deadline(options.timeoutMs, () => new HttpTimeout(options.timeoutMs));
    const linked = linkSignals(request.signal, timeout.signal);

    try {
      const headers: Record<string, string> = { accept: 'application/json', ...request.headers };
      if (request.body !== undefined) {
        headers['content-type'] = 'application/json';
      }

      const response = await fetchImpl(request.url, {
        method: request.method ?? 'GET',
        headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: linked.signal,
      });

      if (!response.ok) {
        return { ok: false, status: response.status, reason: `HTTP ${response.status}` };
      }

      try {
        const data: unknown = await response.json();
        return { ok: true, status: response.status, data };
      } catch {
        return { ok: false, status: response.status, reason: 'invalid JSON response' };
      }
    } catch (error) {
      if (request.signal?.aborted) {
        throw request.signal.reason;
      }
      if (linked.signal.reason instanceof HttpTimeout) {
        return { ok: false, reason: `timed out after ${options.timeoutMs}ms` };
      }
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    } finally {
      linked.dispose();
      timeout.dispose();
    }
  };
}
