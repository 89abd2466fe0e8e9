import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockAgent } from 'undici';
import { parseHtml } from '../../src/scrape/document.js';
import { extractImages, imageTypeOf } from '../../src/scrape/images.js';
import { installGlobalMock, uninstallGlobalMock, mockPage } from '../../src/testing/index.js';
import type { SkippedItem } from '../../src/types/index.js';

/**
 * Minimal GIF header: signature, then width and height as little-endian uint16
 */
function gifBytes(width: number, height: number): Buffer {
  const header = Buffer.alloc(13);
  header.write('GIF89a', 0, 'ascii');
  header.writeUInt16LE(width, 6);
  header.writeUInt16LE(height, 8);
  return header;
}

describe('imageTypeOf', () => {
  it('should use the lower-cased path extension', () => {
    expect(imageTypeOf('https://example.com/img/logo.PNG')).toBe('png');
    expect(imageTypeOf('https://example.com/photo.jpeg?size=large#top')).toBe('jpeg');
    expect(imageTypeOf('https://example.com/v1.2/pixel')).toBe('unknown');
    expect(imageTypeOf('https://example.com/')).toBe('unknown');
  });

  it('should mark data URIs', () => {
    expect(imageTypeOf('data:image/png;base64,AAAA')).toBe('data:image');
  });
});

describe('extractImages', () => {
  let mock: MockAgent;
  const baseUrl = 'https://example.com/gallery/';

  beforeEach(() => {
    mock = installGlobalMock();
  });

  afterEach(async () => {
    uninstallGlobalMock();
    await mock.close();
  });

  it('should read declared attributes and probe the rest', async () => {
    mockPage(mock, 'https://example.com/gallery/photo.jpg?v=2', gifBytes(32, 16));
    mockPage(mock, 'https://cdn.example.com/broken.gif', 'missing', { status: 404 });
    mockPage(mock, 'https://cdn.example.com/pic', gifBytes(32, 16));
    const doc = parseHtml(`
      <img src="/img/logo.PNG" alt=" Logo " width="120" height="40">
      <img src="photo.jpg?v=2" title="Holiday">
      <img src="https://cdn.example.com/broken.gif">
      <img src="data:image/png;base64,iVBORw0KGgo=" width="50%">
      <img src="">
      <img alt="no source">
      <img src="https://cdn.example.com/pic" height="90">
    `);
    const onSkip = vi.fn<(item: SkippedItem) => void>();

    const images = await extractImages(doc, baseUrl, { onSkip });

    expect(images).toEqual([
      {
        src: 'https://example.com/img/logo.PNG',
        alt: 'Logo',
        title: 'No title',
        width: 120,
        height: 40,
        type: 'png',
      },
      {
        src: 'https://example.com/gallery/photo.jpg?v=2',
        alt: 'No alt text',
        title: 'Holiday',
        width: 32,
        height: 16,
        type: 'jpg',
      },
      {
        src: 'https://cdn.example.com/broken.gif',
        alt: 'No alt text',
        title: 'No title',
        width: 'Not specified',
        height: 'Not specified',
        type: 'gif',
      },
      {
        src: 'data:image/png;base64,iVBORw0KGgo=',
        alt: 'No alt text',
        title: 'No title',
        width: '50%',
        height: 'Not specified',
        type: 'data:image',
      },
      {
        src: 'https://cdn.example.com/pic',
        alt: 'No alt text',
        title: 'No title',
        width: 32,
        height: 90,
        type: 'unknown',
      },
    ]);
    expect(onSkip).toHaveBeenCalledTimes(1);
    expect(onSkip).toHaveBeenCalledWith({
      extractor: 'images',
      target: 'https://cdn.example.com/broken.gif',
      reason: 'Request failed with status code 404 Not Found',
    });
  });

  it('should fall back to "Not specified" when the source is unreachable', async () => {
    mock
      .get('https://offline.example.com')
      .intercept({ path: '/a.png', method: 'GET' })
      .replyWithError(new Error('connect ECONNREFUSED'));
    const doc = parseHtml('<img src="https://offline.example.com/a.png">');

    const [image] = await extractImages(doc, baseUrl);

    expect(image?.width).toBe('Not specified');
    expect(image?.height).toBe('Not specified');
  });

  it('should fall back when the bytes are not an image', async () => {
    mockPage(mock, 'https://example.com/fake.png', '<html>not an image</html>');
    const onSkip = vi.fn<(item: SkippedItem) => void>();

    const [image] = await extractImages(parseHtml('<img src="/fake.png">'), baseUrl, { onSkip });

    expect(image?.width).toBe('Not specified');
    expect(onSkip).toHaveBeenCalledTimes(1);
    expect(onSkip.mock.calls[0]?.[0]?.target).toBe('https://example.com/fake.png');
  });

  it('should return the same records when run twice over one document', async () => {
    mockPage(mock, 'https://example.com/gallery/banner.gif', gifBytes(64, 8), { times: 2 });
    const doc = parseHtml('<img src="banner.gif" alt="Banner"><img src="/icon.svg" width="16" height="16">');

    const first = await extractImages(doc, baseUrl);
    const second = await extractImages(doc, baseUrl);

    expect(first).toEqual([
      {
        src: 'https://example.com/gallery/banner.gif',
        alt: 'Banner',
        title: 'No title',
        width: 64,
        height: 8,
        type: 'gif',
      },
      {
        src: 'https://example.com/icon.svg',
        alt: 'No alt text',
        title: 'No title',
        width: 16,
        height: 16,
        type: 'svg',
      },
    ]);
    expect(second).toEqual(first);
  });

  it('should not download anything when probing is disabled', async () => {
    const onSkip = vi.fn<(item: SkippedItem) => void>();

    const images = await extractImages(parseHtml('<img src="photo.jpg">'), baseUrl, {
      probeDimensions: false,
      onSkip,
    });

    expect(images).toEqual([
      {
        src: 'https://example.com/gallery/photo.jpg',
        alt: 'No alt text',
        title: 'No title',
        width: 'Not specified',
        height: 'Not specified',
        type: 'jpg',
      },
    ]);
    expect(onSkip).not.toHaveBeenCalled();
  });
});
