import { NetworkError, UpstreamError, describeError } from './errors.js';
import { Logger } from './log.js';

export type QueryValue = string | number | undefined;

export interface JsonRequest {
  service: string;
  url: string;
  method?: 'GET' | 'POST';
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface JsonResponse {
  status: number;
  ok: boolean;
  body: unknown;
}

const LOGGED_BODY_LIMIT = 500;

export function buildUrl(service: string, base: string, query: Record<string, QueryValue> = {}): string {
  let url: URL;
  try {
    url = new URL(base);
  } catch (error) {
    throw new UpstreamError(service, `Invalid endpoint URL '${base}'`, { cause: error });
  }
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

function cancellationError(service: string, signal: AbortSignal): Error {
  return signal.reason instanceof Error
    ? signal.reason
    : new NetworkError(service, 'Request cancelled', { cause: signal.reason });
}

/**
 * Performs one JSON request bounded by `timeoutMs`. Never retries.
 *
 * Transport failures and timeouts become {@link NetworkError}; cancellation through
 * `signal` rethrows the signal's reason. Non-success responses are returned, not thrown,
 * so each caller picks the error kind that fits its contract.
 */
export async function requestJson(request: JsonRequest, log: Logger): Promise<JsonResponse> {
  const { service } = request;
  const url = buildUrl(service, request.url, request.query);
  const timeoutSignal = AbortSignal.timeout(request.timeoutMs);
  const signal = request.signal ? AbortSignal.any([request.signal, timeoutSignal]) : timeoutSignal;

  const headers: Record<string, string> = { ...request.headers };
  let body: string | undefined;
  if (request.body !== undefined) {
    headers['content-type'] = 'application/json';
    body = JSON.stringify(request.body);
  }

  const failure = (error: unknown): Error => {
    if (request.signal?.aborted) {
      return cancellationError(service, request.signal);
    }
    if (timeoutSignal.aborted) {
      return new NetworkError(service, `Request timed out after ${request.timeoutMs}ms`, { cause: error });
    }
    return new NetworkError(service, `Request failed: ${describeError(error)}`, { cause: error });
  };

  let response: Response;
  try {
    response = await fetch(url, { method: request.method ?? 'GET', headers, body, signal });
  } catch (error) {
    throw failure(error);
  }

  if (!response.ok) {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw failure(error);
    }
    log.warn('Upstream returned non-success status', {
      upstream: service,
      status: response.status,
      body: text.slice(0, LOGGED_BODY_LIMIT)
    });
    return { status: response.status, ok: false, body: text };
  }

  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    throw failure(error);
  }

  try {
    return { status: response.status, ok: true, body: JSON.parse(text) };
  } catch (error) {
    throw new UpstreamError(service, 'Malformed JSON response', { cause: error, status: response.status });
  }
}
