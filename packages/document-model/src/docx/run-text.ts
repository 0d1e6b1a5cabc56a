import type { Element } from 'xml-js';
import { childElements, createElement, findOoxmlChild, readTextContent } from './ooxml.js';

/**
 * Format token of DOCX fragments: the run's `w:rPr`, or `null` for runs that
 * use the paragraph's default character formatting.
 */
export type DocxRunFormat = {
  properties: Element | null;
};

/** Run children that carry no text of their own but are kept on rewrite. */
const PASSIVE_RUN_CHILDREN = new Set(['w:rPr', 'w:lastRenderedPageBreak']);

/** `w:br` without a type, or with `textWrapping`, is a line break. */
function isLineBreak(element: Element): boolean {
  const type = element.attributes?.['w:type'];
  return type === undefined || type === 'textWrapping';
}

/**
 * Reads the text of a `w:r` element.
 *
 * Returns `null` for runs holding anything besides text, tabs and line breaks
 * (drawings, field codes, symbols, footnote references, page and column
 * breaks). Those runs are left out of the fragment model and survive saving
 * untouched.
 */
export function readRunText(run: Element): string | null {
  let text = '';
  for (const child of childElements(run)) {
    if (child.type !== 'element') continue;
    switch (child.name) {
      case 'w:t':
        text += readTextContent(child);
        break;
      case 'w:tab':
        text += '\t';
        break;
      case 'w:br':
        if (!isLineBreak(child)) return null;
        text += '\n';
        break;
      case 'w:cr':
        text += '\n';
        break;
      default:
        if (!child.name || !PASSIVE_RUN_CHILDREN.has(child.name)) return null;
    }
  }
  return text;
}

export function readRunFormat(run: Element): DocxRunFormat {
  return { properties: findOoxmlChild(run, 'w:rPr') ?? null };
}

function textElements(text: string): Element[] {
  const elements: Element[] = [];
  for (const part of text.split(/(\t|\n)/)) {
    if (part.length === 0) continue;
    if (part === '\t') {
      elements.push(createElement('w:tab'));
    } else if (part === '\n') {
      elements.push(createElement('w:br'));
    } else {
      elements.push(createElement('w:t', [{ type: 'text', text: part }], { 'xml:space': 'preserve' }));
    }
  }
  return elements;
}

/**
 * Replaces the text content of a run in place, keeping its `w:rPr`.
 */
export function writeRunText(run: Element, text: string): void {
  const properties = findOoxmlChild(run, 'w:rPr');
  run.elements = [...(properties ? [properties] : []), ...textElements(text)];
}

/**
 * Creates a new `w:r` with a private copy of the given formatting.
 */
export function createRun(text: string, format: DocxRunFormat): Element {
  const properties = format.properties ? structuredClone(format.properties) : null;
  return createElement('w:r', [...(properties ? [properties] : []), ...textElements(text)]);
}
