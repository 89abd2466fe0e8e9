/**
 * Image inventory with optional dimension probing
 */

import { imageSize } from 'image-size';
import { DATA_IMAGE_TYPE, NO_ALT_TEXT, NO_TITLE, NOT_SPECIFIED, UNKNOWN_IMAGE_TYPE } from '../constants.js';
import { ParseError } from '../core/errors.js';
import { fetchBytes } from '../core/fetcher.js';
import type { ImageDimension, ImageExtractionOptions, ImageRecord } from '../types/index.js';
import { resolveLogger } from '../utils/logger.js';
import { tryFnSync, type TryResult } from '../utils/try-fn.js';
import type { ScrapeDocument } from './document.js';
import { resolveUrl } from './extractors.js';

function isDataUri(src: string): boolean {
  return src.startsWith('data:');
}

function isAbsoluteHttp(src: string): boolean {
  return src.startsWith('http://') || src.startsWith('https://');
}

/**
 * Lower-cased extension of the URL path, "data:image" for data URIs, else "unknown"
 */
export function imageTypeOf(src: string): string {
  if (isDataUri(src)) return DATA_IMAGE_TYPE;

  let pathname: string;
  try {
    pathname = new URL(src).pathname;
  } catch {
    return UNKNOWN_IMAGE_TYPE;
  }

  const lastSegment = pathname.slice(pathname.lastIndexOf('/') + 1);
  const dot = lastSegment.lastIndexOf('.');
  if (dot === -1 || dot === lastSegment.length - 1) return UNKNOWN_IMAGE_TYPE;
  return lastSegment.slice(dot + 1).toLowerCase();
}

/**
 * Declared width/height attribute: digits become a number, anything else stays as written
 */
function declaredDimension(value: string | undefined): ImageDimension | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : trimmed;
}

function measure(bytes: Uint8Array, url: string): TryResult<{ width: number; height: number }> {
  return tryFnSync(() => {
    const size = imageSize(bytes);
    if (size.width === undefined || size.height === undefined) {
      throw new ParseError('Image has no readable dimensions', { format: size.type, url });
    }
    return { width: size.width, height: size.height };
  });
}

/**
 * Every <img> with a non-empty src, in document order.
 *
 * Images without a declared width are downloaded one at a time and measured;
 * a failed probe leaves "Not specified" and moves on.
 */
export async function extractImages(
  doc: ScrapeDocument,
  baseUrl: string,
  options: ImageExtractionOptions = {}
): Promise<ImageRecord[]> {
  const logger = resolveLogger(options.logger);
  const probe = options.probeDimensions ?? true;
  const images: ImageRecord[] = [];
  let probed = 0;

  for (const img of doc.elements('img')) {
    const rawSrc = img.attr('src')?.trim();
    if (!rawSrc) continue;

    const src = isAbsoluteHttp(rawSrc) || isDataUri(rawSrc) ? rawSrc : resolveUrl(rawSrc, baseUrl);
    if (src === null) {
      options.onSkip?.({ extractor: 'images', target: rawSrc, reason: 'Unresolvable URL' });
      continue;
    }

    const declaredWidth = declaredDimension(img.attr('width'));
    const declaredHeight = declaredDimension(img.attr('height'));
    let width: ImageDimension = declaredWidth ?? NOT_SPECIFIED;
    let height: ImageDimension = declaredHeight ?? NOT_SPECIFIED;

    if (probe && declaredWidth === undefined && !isDataUri(src)) {
      probed++;
      const [fetched, fetchErr, bytes] = await fetchBytes(src);
      if (!fetched) {
        options.onSkip?.({ extractor: 'images', target: src, reason: fetchErr.message });
      } else {
        const [ok, err, size] = measure(bytes, src);
        if (!ok) {
          options.onSkip?.({ extractor: 'images', target: src, reason: err.message });
        } else {
          width = size.width;
          if (declaredHeight === undefined) height = size.height;
        }
      }
    }

    images.push({
      src,
      alt: img.attr('alt')?.trim() || NO_ALT_TEXT,
      title: img.attr('title')?.trim() || NO_TITLE,
      width,
      height,
      type: imageTypeOf(src),
    });
  }

  logger.debug(`images: ${images.length} found, ${probed} probed`);
  return images;
}
