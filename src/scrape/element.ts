/**
 * Typed nodes over the parsed document
 *
 * A ScrapeNode is either an element or a text node; extractors only ever see
 * this fixed capability set, never raw parser objects.
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode, Element, Text } from 'domhandler';
import { isTag, isText } from 'domhandler';

export type ScrapeNode = ScrapeElement | ScrapeText;

export class ScrapeText {
  readonly kind = 'text' as const;
  private node: Text;

  constructor(node: Text) {
    this.node = node;
  }

  /**
   * Raw text, entities already decoded
   */
  text(): string {
    return this.node.data;
  }

  normalizedText(): string {
    return collapseWhitespace(this.node.data);
  }
}

export class ScrapeElement {
  readonly kind = 'element' as const;
  private el: Element;
  private $: CheerioAPI;

  constructor(el: Element, $: CheerioAPI) {
    this.el = el;
    this.$ = $;
  }

  /**
   * Lower-cased tag name
   */
  get tagName(): string {
    return this.el.name.toLowerCase();
  }

  attr(name: string): string | undefined {
    return this.el.attribs[name.toLowerCase()];
  }

  hasAttr(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.el.attribs, name.toLowerCase());
  }

  attributes(): Readonly<Record<string, string>> {
    return { ...this.el.attribs };
  }

  /**
   * Direct children; comments and processing instructions are dropped
   */
  children(): ScrapeNode[] {
    return wrapNodes(this.el.children, this.$);
  }

  /**
   * Descendant elements matching a CSS selector, in document order
   */
  find(selector: string): ScrapeElement[] {
    return wrapSelection(this.$(this.el).find(selector), this.$);
  }

  /**
   * Closest ancestor (or self) matching a selector
   */
  closest(selector: string): ScrapeElement | undefined {
    const found = this.$(this.el).closest(selector).get(0);
    return found && isTag(found) ? new ScrapeElement(found, this.$) : undefined;
  }

  is(other: ScrapeElement): boolean {
    return this.el === other.el;
  }

  /**
   * Concatenated text of all descendants, untouched
   */
  text(): string {
    return this.$(this.el).text();
  }

  /**
   * Text with runs of whitespace collapsed to one space and trimmed
   */
  normalizedText(): string {
    return collapseWhitespace(this.text());
  }

  /**
   * Raw content of a script/style element
   */
  innerHtml(): string {
    return this.$(this.el).html() ?? '';
  }

  outerHtml(): string {
    return this.$.html(this.el);
  }
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function wrapNodes(nodes: AnyNode[], $: CheerioAPI): ScrapeNode[] {
  const wrapped: ScrapeNode[] = [];
  for (const node of nodes) {
    if (isTag(node)) {
      wrapped.push(new ScrapeElement(node, $));
    } else if (isText(node)) {
      wrapped.push(new ScrapeText(node));
    }
  }
  return wrapped;
}

export function wrapSelection(selection: Cheerio<AnyNode>, $: CheerioAPI): ScrapeElement[] {
  const elements: ScrapeElement[] = [];
  for (const node of selection.toArray()) {
    if (isTag(node)) {
      elements.push(new ScrapeElement(node, $));
    }
  }
  return elements;
}
