/**
 * Charset detection for fetched pages
 *
 * The declared encoding (Content-Type header) is what FetchResult reports;
 * BOM and <meta charset> only help decoding when the header is silent.
 */

export interface CharsetInfo {
  /** Charset name, normalized to lowercase */
  charset: string;
  source: 'header' | 'bom' | 'html-meta' | 'default';
}

const charsetAliases: Record<string, string> = {
  'utf8': 'utf-8',
  'utf_8': 'utf-8',
  'utf16le': 'utf-16le',
  'utf16be': 'utf-16be',
  'latin1': 'iso-8859-1',
  'latin-1': 'iso-8859-1',
  'iso8859-1': 'iso-8859-1',
  'iso_8859-1': 'iso-8859-1',
  'cp1252': 'windows-1252',
  'win1252': 'windows-1252',
  'us-ascii': 'ascii',
  'shift-jis': 'shift_jis',
  'sjis': 'shift_jis',
  'eucjp': 'euc-jp',
  'euckr': 'euc-kr',
};

/**
 * Normalize charset name to standard form
 */
export function normalizeCharset(charset: string): string {
  const lower = charset.toLowerCase().trim();
  return charsetAliases[lower] || lower;
}

/**
 * @example
 * detectFromContentType('text/html; charset=UTF-8') // 'utf-8'
 * detectFromContentType('text/html') // null
 */
export function detectFromContentType(contentType: string | undefined | null): string | null {
  if (!contentType) return null;

  const charsetMatch = contentType.match(/charset=["']?([^"';\s]+)["']?/i);
  return charsetMatch ? normalizeCharset(charsetMatch[1]) : null;
}

/**
 * Detect charset from the Byte Order Mark (UTF-8, UTF-16 LE/BE)
 */
export function detectFromBOM(buffer: Uint8Array): string | null {
  if (buffer.length >= 3 && buffer[0] === 0xEF && buffer[1] === 0xBB && buffer[2] === 0xBF) {
    return 'utf-8';
  }
  if (buffer.length >= 2 && buffer[0] === 0xFE && buffer[1] === 0xFF) {
    return 'utf-16be';
  }
  if (buffer.length >= 2 && buffer[0] === 0xFF && buffer[1] === 0xFE) {
    return 'utf-16le';
  }
  return null;
}

export function stripBOM(buffer: Uint8Array): Uint8Array {
  switch (detectFromBOM(buffer)) {
    case 'utf-8':
      return buffer.subarray(3);
    case 'utf-16le':
    case 'utf-16be':
      return buffer.subarray(2);
    default:
      return buffer;
  }
}

/**
 * Supports `<meta charset="...">` and the http-equiv Content-Type form.
 * Only the first 1024 characters are inspected.
 */
export function detectFromHTMLMeta(html: string): string | null {
  const head = html.slice(0, 1024);

  const charsetMeta = head.match(/<meta[^>]+charset=["']?([^"'>\s/;]+)["']?/i);
  if (charsetMeta) {
    return normalizeCharset(charsetMeta[1]);
  }

  return null;
}

/**
 * Priority: Content-Type header, BOM, HTML meta, UTF-8
 */
export function detectCharset(buffer: Uint8Array, contentType?: string | null): CharsetInfo {
  const headerCharset = detectFromContentType(contentType);
  if (headerCharset) {
    return { charset: headerCharset, source: 'header' };
  }

  const bomCharset = detectFromBOM(buffer);
  if (bomCharset) {
    return { charset: bomCharset, source: 'bom' };
  }

  const sniffed = new TextDecoder('utf-8', { fatal: false }).decode(buffer.subarray(0, 1024));
  const metaCharset = detectFromHTMLMeta(sniffed);
  if (metaCharset) {
    return { charset: metaCharset, source: 'html-meta' };
  }

  return { charset: 'utf-8', source: 'default' };
}

/**
 * Decode with the given charset, falling back to UTF-8 for labels TextDecoder does not know
 */
export function decodeText(buffer: Uint8Array, charset = 'utf-8'): string {
  const clean = stripBOM(buffer);

  try {
    return new TextDecoder(normalizeCharset(charset)).decode(clean);
  } catch {
    return new TextDecoder('utf-8', { fatal: false }).decode(clean);
  }
}
