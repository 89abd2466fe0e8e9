import { setTimeout as sleep } from 'node:timers/promises';
import {
  DEFAULT_USER_AGENT,
  PAGE_FETCH_DELAY_MS,
  PAGE_FETCH_TIMEOUT_MS,
  RESOURCE_FETCH_TIMEOUT_MS,
  RESOURCE_HEAD_TIMEOUT_MS,
} from '../constants.js';
import { dispatch } from '../transport/undici.js';
import type { TransportResponse } from '../transport/undici.js';
import type { DelayFunction, FetchOptions } from '../types/index.js';
import { resolveLogger, formatDuration } from '../utils/logger.js';
import { decodeText, detectCharset } from '../utils/charset.js';
import { tryFn, type TryResult } from '../utils/try-fn.js';
import { HttpError, PagelensError } from './errors.js';
import { PageResponse } from './response.js';

const defaultDelay: DelayFunction = async (ms) => {
  await sleep(ms);
};

function browserHeaders(): Record<string, string> {
  return { 'user-agent': DEFAULT_USER_AGENT };
}

/**
 * Fetch the page under analysis.
 *
 * Waits the fixed politeness delay, then issues exactly one GET with the
 * desktop User-Agent and a 10s budget. Non-2xx answers become HttpError.
 *
 * @example
 * ```typescript
 * const page = await fetchPage('https://example.com');
 * console.log(page.status, page.header('Content-Type'), page.elapsed);
 * ```
 */
export async function fetchPage(url: string, options: FetchOptions = {}): Promise<PageResponse> {
  const logger = resolveLogger(options.logger);
  const delay = options.delay ?? defaultDelay;

  await delay(PAGE_FETCH_DELAY_MS);

  logger.debug(`→ GET ${url}`);

  let raw: TransportResponse;
  try {
    raw = await dispatch({
      method: 'GET',
      url,
      headers: browserHeaders(),
      timeout: PAGE_FETCH_TIMEOUT_MS,
    });
  } catch (error) {
    logger.error(`✖ GET ${url}: ${error instanceof Error ? error.message : String(error)}`);
    throw error;
  }

  logger.debug(`← ${raw.status} GET ${url} (${formatDuration(raw.elapsed)}, ${raw.bytes.byteLength} bytes)`);

  if (raw.status < 200 || raw.status >= 300) {
    const error = new HttpError(raw.status, raw.statusText, url);
    logger.error(`✖ GET ${url}: ${error.message}`);
    throw error;
  }

  return new PageResponse(url, raw);
}

/**
 * Best-effort GET of a sub-resource. Non-2xx counts as a failure.
 */
async function fetchResource(url: string): Promise<TransportResponse> {
  const raw = await dispatch({
    method: 'GET',
    url,
    headers: browserHeaders(),
    timeout: RESOURCE_FETCH_TIMEOUT_MS,
  });
  if (raw.status < 200 || raw.status >= 300) {
    throw new HttpError(raw.status, raw.statusText, url);
  }
  return raw;
}

/**
 * GET a text sub-resource (external stylesheet). Never throws.
 */
export function fetchText(url: string): Promise<TryResult<string>> {
  return tryFn(async () => {
    const raw = await fetchResource(url);
    return decodeText(raw.bytes, detectCharset(raw.bytes, raw.headers['content-type']).charset);
  });
}

/**
 * GET a binary sub-resource (image probe). Never throws.
 */
export function fetchBytes(url: string): Promise<TryResult<Uint8Array>> {
  return tryFn(async () => (await fetchResource(url)).bytes);
}

/**
 * HEAD a resource and read its Content-Length in bytes (0 when absent). Never throws.
 */
export function fetchContentLength(url: string): Promise<TryResult<number>> {
  return tryFn(async () => {
    const raw = await dispatch({ method: 'HEAD', url, timeout: RESOURCE_HEAD_TIMEOUT_MS });
    const header = raw.headers['content-length'];
    if (header === undefined) return 0;

    const length = Number.parseInt(header, 10);
    if (Number.isNaN(length)) {
      throw new PagelensError(`Invalid content-length "${header}" for ${url}`, url);
    }
    return length;
  });
}
