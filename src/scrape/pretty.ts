/**
 * Pretty-printer for the raw HTML view
 *
 * One tag or text run per line, indented by one space per nesting level.
 */

import type { AnyNode, Element } from 'domhandler';
import { isComment, isDirective, isTag, isText } from 'domhandler';

const VOID_ELEMENTS = new Set([
  'area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input',
  'link', 'meta', 'param', 'source', 'track', 'wbr',
]);

// Content printed as-is (only trimmed), never re-escaped
const RAW_TEXT_ELEMENTS = new Set(['script', 'style']);

export function prettify(nodes: AnyNode[]): string {
  const lines: string[] = [];
  for (const node of nodes) {
    writeNode(node, 0, lines, false);
  }
  return lines.join('\n');
}

function writeNode(node: AnyNode, depth: number, lines: string[], raw: boolean): void {
  const indent = ' '.repeat(depth);

  if (isDirective(node)) {
    lines.push(`${indent}<${node.data}>`);
    return;
  }

  if (isComment(node)) {
    lines.push(`${indent}<!--${node.data}-->`);
    return;
  }

  if (isText(node)) {
    const text = node.data.trim();
    if (text) {
      lines.push(indent + (raw ? text : escapeText(text)));
    }
    return;
  }

  if (isTag(node)) {
    const name = node.name.toLowerCase();
    if (VOID_ELEMENTS.has(name)) {
      lines.push(`${indent}${openTag(node, true)}`);
      return;
    }

    lines.push(`${indent}${openTag(node, false)}`);
    const rawChildren = RAW_TEXT_ELEMENTS.has(name);
    for (const child of node.children) {
      writeNode(child, depth + 1, lines, rawChildren);
    }
    lines.push(`${indent}</${node.name}>`);
  }
}

function openTag(el: Element, selfClosing: boolean): string {
  const attrs = Object.entries(el.attribs)
    .map(([name, value]) => ` ${name}="${escapeAttribute(value)}"`)
    .join('');
  return `<${el.name}${attrs}${selfClosing ? '/' : ''}>`;
}

function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;');
}
