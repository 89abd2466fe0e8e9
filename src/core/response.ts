import type { FetchResult } from '../types/index.js';
import type { TransportResponse } from '../transport/undici.js';
import { decodeText, detectCharset, detectFromContentType } from '../utils/charset.js';

/**
 * Immutable result of the primary page fetch.
 *
 * `encoding` only reports what the server declared; the body is decoded with
 * the declared charset, else a BOM or `<meta charset>`, else UTF-8.
 */
export class PageResponse implements FetchResult {
  readonly url: string;
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
  readonly bytes: Uint8Array;
  readonly byteLength: number;
  readonly encoding: string | null;
  readonly elapsed: number;

  constructor(url: string, raw: TransportResponse) {
    this.url = url;
    this.status = raw.status;
    this.statusText = raw.statusText;
    this.headers = Object.freeze({ ...raw.headers });
    this.bytes = raw.bytes;
    this.byteLength = raw.bytes.byteLength;
    this.elapsed = raw.elapsed;

    const contentType = raw.headers['content-type'];
    this.encoding = detectFromContentType(contentType);
    this.body = decodeText(raw.bytes, detectCharset(raw.bytes, contentType).charset);

    Object.freeze(this);
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  header(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }
}
