import { request as undiciRequest, errors as undiciErrors } from 'undici';
import { STATUS_CODES } from 'node:http';
import { performance } from 'node:perf_hooks';
import { NetworkError, TimeoutError } from '../core/errors.js';

const MAX_REDIRECTIONS = 5;

export type TransportMethod = 'GET' | 'HEAD';

export interface TransportRequest {
  method: TransportMethod;
  url: string;
  headers?: Record<string, string>;
  /** Total budget for connect + headers + body, in milliseconds */
  timeout: number;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  /** Lower-cased keys; repeated headers joined with ", " */
  headers: Record<string, string>;
  bytes: Uint8Array;
  /** Request start to body fully read, in milliseconds */
  elapsed: number;
}

/**
 * Single undici request with one AbortSignal covering the whole exchange.
 * Never retries; any failure surfaces as NetworkError or TimeoutError.
 */
export async function dispatch(req: TransportRequest): Promise<TransportResponse> {
  const start = performance.now();

  try {
    const res = await undiciRequest(req.url, {
      method: req.method,
      headers: req.headers,
      maxRedirections: MAX_REDIRECTIONS,
      signal: AbortSignal.timeout(req.timeout),
    });

    const bytes = new Uint8Array(await res.body.arrayBuffer());

    return {
      status: res.statusCode,
      statusText: STATUS_CODES[res.statusCode] ?? '',
      headers: flattenHeaders(res.headers),
      bytes,
      elapsed: performance.now() - start,
    };
  } catch (error) {
    throw mapTransportError(error, req);
  }
}

export function flattenHeaders(raw: Record<string, string | string[] | undefined>): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    headers[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return headers;
}

function mapTransportError(error: unknown, req: TransportRequest): Error {
  if (error instanceof NetworkError) {
    return error;
  }

  if (
    error instanceof undiciErrors.HeadersTimeoutError ||
    error instanceof undiciErrors.BodyTimeoutError ||
    error instanceof undiciErrors.ConnectTimeoutError ||
    error instanceof undiciErrors.RequestAbortedError ||
    (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError'))
  ) {
    // The only abort source is the timeout signal
    return new TimeoutError(req.timeout, req.url);
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    const network = new NetworkError(`${req.method} ${req.url} failed: ${error.message}`, {
      code,
      url: req.url,
    });
    network.cause = error;
    return network;
  }

  return new NetworkError(`${req.method} ${req.url} failed: ${String(error)}`, { url: req.url });
}
