import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { MockAgent } from 'undici';
import { formatRows, handleCommand, type CliIO } from '../../src/cli/handler.js';
import { ValidationError } from '../../src/core/errors.js';
import { installGlobalMock, uninstallGlobalMock, mockPage } from '../../src/testing/index.js';

const url = 'https://example.com/stats';
const statsHtml = '<table><tr><th>Year</th><th>Total</th></tr><tr><td>2024</td><td>1,200</td></tr></table>';

function createIO() {
  const lines: string[] = [];
  const io: CliIO = {
    print: (text) => lines.push(text),
    spinner: false,
    delay: async () => {},
  };
  return { io, lines };
}

describe('CLI handler', () => {
  let mock: MockAgent;
  let outDir: string;

  beforeEach(async () => {
    mock = installGlobalMock();
    outDir = await mkdtemp(join(tmpdir(), 'pagelens-'));
  });

  afterEach(async () => {
    uninstallGlobalMock();
    await mock.close();
    await rm(outDir, { recursive: true, force: true });
  });

  it('should print tables as JSON', async () => {
    mockPage(mock, url, statsHtml);
    const { io, lines } = createIO();

    await handleCommand('tables', url, { json: true }, io);

    expect(lines).toEqual([
      JSON.stringify(
        [
          {
            rows: [
              ['Year', 'Total'],
              ['2024', '1,200'],
            ],
            hasHeader: true,
          },
        ],
        null,
        2
      ),
    ]);
  });

  it('should write one CSV per table under --out', async () => {
    mockPage(mock, url, statsHtml);
    const { io } = createIO();

    const report = await handleCommand('tables', url, { out: outDir, json: true }, io);

    const file = join(outDir, 'examplecom_table_1.csv');
    expect(report.files).toEqual([file]);
    expect(await readFile(file, 'utf-8')).toBe('Year,Total\r\n2024,"1,200"\r\n');
  });

  it('should write the prettified page for html', async () => {
    mockPage(mock, url, '<p>Hi</p>');
    const { io } = createIO();

    const report = await handleCommand('html', url, { out: outDir, json: true }, io);

    expect(report.files).toEqual([join(outDir, 'examplecom_table_1.html')]);
    expect(await readFile(join(outDir, 'examplecom_table_1.html'), 'utf-8')).toBe(
      '<html>\n <head>\n </head>\n <body>\n  <p>\n   Hi\n  </p>\n </body>\n</html>\n'
    );
  });

  it('should collect skipped items', async () => {
    mockPage(mock, url, '<link rel="stylesheet" href="/gone.css"><p style="color:#fff">x</p>');
    mockPage(mock, 'https://example.com/gone.css', '', { status: 404 });
    const { io, lines } = createIO();

    const report = await handleCommand('colors', url, { json: true }, io);

    expect(lines).toEqual([JSON.stringify([{ color: '#fff', format: 'hex', source: 'Inline' }], null, 2)]);
    expect(report.skipped).toEqual([
      {
        extractor: 'colors',
        target: 'https://example.com/gone.css',
        reason: 'Request failed with status code 404 Not Found',
      },
    ]);
  });

  it('should reject invalid URLs before fetching', async () => {
    const { io, lines } = createIO();

    await expect(handleCommand('links', 'example.com', {}, io)).rejects.toBeInstanceOf(ValidationError);
    expect(lines).toEqual([]);
  });
});

describe('formatRows', () => {
  it('should pad every column but the last', () => {
    expect(
      formatRows([
        ['a', 'bbb'],
        ['cc', 'd'],
      ])
    ).toBe('a   bbb\ncc  d');
  });
});
