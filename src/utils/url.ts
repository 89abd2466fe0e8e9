import { ValidationError } from '../core/errors.js';

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * True when the URL parses, uses http or https, and names a host
 */
export function validateUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return SUPPORTED_PROTOCOLS.has(parsed.protocol) && parsed.host !== '';
  } catch {
    return false;
  }
}

/**
 * Throw a ValidationError unless validateUrl() accepts the URL
 */
export function assertValidUrl(url: string, field = 'url'): void {
  if (!validateUrl(url)) {
    throw new ValidationError(`Invalid URL "${url}": expected an http:// or https:// address`, {
      field,
      value: url,
    });
  }
}

/**
 * Host (with port) reduced to word characters, whitespace and hyphens
 */
export function hostSlug(url: string): string {
  let host: string;
  try {
    host = new URL(url).host;
  } catch {
    host = '';
  }
  return host.replace(/[^\w\s-]/g, '');
}

/**
 * Download name for the table at `index` (zero-based), e.g. `examplecom_table_1`
 */
export function formatExportName(url: string, index: number): string {
  return `${hostSlug(url)}_table_${index + 1}`;
}
