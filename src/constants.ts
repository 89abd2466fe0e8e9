/**
 * Global constants for pagelens
 * Centralizes the fixed network budget and display placeholders
 */

// Politeness delay before every primary page fetch (not configurable)
export const PAGE_FETCH_DELAY_MS = 1000;

// Timeouts
export const PAGE_FETCH_TIMEOUT_MS = 10000;
export const RESOURCE_FETCH_TIMEOUT_MS = 10000;
export const RESOURCE_HEAD_TIMEOUT_MS = 2000;

/**
 * Desktop browser User-Agent sent on every GET
 */
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

// Placeholders for absent values
export const NO_LINK_TEXT = 'No text';
export const NO_ALT_TEXT = 'No alt text';
export const NO_TITLE = 'No title';
export const NOT_SPECIFIED = 'Not specified';

// Image type markers
export const DATA_IMAGE_TYPE = 'data:image';
export const UNKNOWN_IMAGE_TYPE = 'unknown';

export const BYTES_PER_KB = 1024;
