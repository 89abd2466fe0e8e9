import { describe, it, expect } from 'vitest';
import { ScrapeDocument, parseHtml } from '../../src/scrape/document.js';
import { ScrapeElement } from '../../src/scrape/element.js';

const sampleHtml = `
<!DOCTYPE html>
<html lang="en">
<head>
  <title>  Sample Page </title>
  <style>body { margin: 0; }</style>
  <script type="application/ld+json">{"@type": "Organization"}</script>
</head>
<body>
  <h1 id="main" DATA-Role="title">Main   Title</h1>
  <script>var hidden = true;</script>
  <p class="intro">Welcome to <b>the</b> page.</p>
  <noscript>Enable JavaScript</noscript>
  <ul><li>One</li><li>Two</li></ul>
  <a href="/a">First</a>
  <a name="anchor-only">No href</a>
</body>
</html>
`;

describe('ScrapeDocument', () => {
  const doc = parseHtml(sampleHtml, { baseUrl: 'https://example.com/' });

  it('should expose the base URL', () => {
    expect(doc.baseUrl).toBe('https://example.com/');
    expect(ScrapeDocument.load('<p></p>').baseUrl).toBeUndefined();
  });

  it('should trim the title and return undefined when missing', () => {
    expect(doc.title()).toBe('Sample Page');
    expect(parseHtml('<p>no title</p>').title()).toBeUndefined();
  });

  it('should find elements by tag and attribute filter', () => {
    expect(doc.elements('a')).toHaveLength(2);
    expect(doc.elements('A', { href: true })).toHaveLength(1);
    expect(doc.elements('script', { type: 'application/ld+json' })).toHaveLength(1);
    expect(doc.elements('script')).toHaveLength(2);
  });

  it('should select with CSS selectors', () => {
    expect(doc.select('ul li').map((li) => li.text())).toEqual(['One', 'Two']);
    expect(doc.selectFirst('p.intro')?.normalizedText()).toBe('Welcome to the page.');
    expect(doc.selectFirst('table')).toBeUndefined();
    expect(doc.count('li')).toBe(2);
  });

  it('should collect visible text only', () => {
    expect(doc.visibleText()).toBe('Main Title Welcome to the page. One Two First No href');
  });

  it('should serialize the whole document', () => {
    expect(doc.html().startsWith('<!DOCTYPE html>')).toBe(true);
    expect(doc.html()).toContain('<h1 id="main" data-role="title">Main   Title</h1>');
  });

  it('should never throw on malformed markup', () => {
    const broken = parseHtml('<div><p>unclosed <b>bold</div></span><table><tr><td>x');
    expect(broken.selectFirst('td')?.text()).toBe('x');
  });
});

describe('ScrapeElement', () => {
  const doc = parseHtml('<div id="box" data-Kind="card"><span>Hi</span> there<table><tr><td><em>cell</em></td></tr></table></div>');
  const box = doc.selectFirst('#box');

  it('should read attributes case-insensitively', () => {
    expect(box).toBeInstanceOf(ScrapeElement);
    expect(box?.tagName).toBe('div');
    expect(box?.attr('DATA-KIND')).toBe('card');
    expect(box?.hasAttr('id')).toBe(true);
    expect(box?.hasAttr('title')).toBe(false);
    expect(box?.attr('title')).toBeUndefined();
    expect(box?.attributes()).toEqual({ id: 'box', 'data-kind': 'card' });
  });

  it('should iterate element and text children', () => {
    const kinds = box?.children().map((child) => child.kind);
    expect(kinds).toEqual(['element', 'text', 'element']);
    expect(box?.children()[1]?.text()).toBe(' there');
  });

  it('should walk up with closest() and compare identity with is()', () => {
    const em = doc.selectFirst('em');
    const table = doc.selectFirst('table');
    if (!em || !table) throw new Error('fixture is missing <em> or <table>');

    expect(em.closest('table')?.is(table)).toBe(true);
    expect(em.closest('td')?.is(table)).toBe(false);
    expect(em.closest('section')).toBeUndefined();
  });

  it('should find descendants', () => {
    expect(box?.find('td').map((td) => td.text())).toEqual(['cell']);
  });

  it('should serialize inner and outer HTML', () => {
    const span = doc.selectFirst('span');
    expect(span?.innerHtml()).toBe('Hi');
    expect(span?.outerHtml()).toBe('<span>Hi</span>');
  });
});

describe('prettify', () => {
  it('should print one node per line, indented by depth', () => {
    const doc = parseHtml('<p class="x">A &amp; B</p><br><script>if (a < b) {}</script>');

    expect(doc.prettify()).toBe(
      [
        '<html>',
        ' <head>',
        ' </head>',
        ' <body>',
        '  <p class="x">',
        '   A &amp; B',
        '  </p>',
        '  <br/>',
        '  <script>',
        '   if (a < b) {}',
        '  </script>',
        ' </body>',
        '</html>',
      ].join('\n')
    );
  });

  it('should keep comments and escape attribute quotes', () => {
    const doc = parseHtml('<body><!-- note --><a title="say &quot;hi&quot;">x</a></body>');

    expect(doc.prettify()).toBe(
      [
        '<html>',
        ' <head>',
        ' </head>',
        ' <body>',
        '  <!-- note -->',
        '  <a title="say &quot;hi&quot;">',
        '   x',
        '  </a>',
        ' </body>',
        '</html>',
      ].join('\n')
    );
  });
});
