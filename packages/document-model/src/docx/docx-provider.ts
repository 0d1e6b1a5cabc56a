import { readFile, writeFile } from 'node:fs/promises';
import JSZip from 'jszip';
import { xml2js, type Element } from 'xml-js';
import { DocumentProviderError } from '../errors.js';
import type { Document, DocumentProvider, Fragment, Paragraph } from '../types.js';
import {
  childElements,
  findOoxmlChild,
  insertAfter,
  insertBefore,
  isOoxmlElement,
  removeChild,
  serializeOoxml,
} from './ooxml.js';
import { createRun, readRunFormat, readRunText, writeRunText, type DocxRunFormat } from './run-text.js';

const DOCUMENT_PART = 'word/document.xml';

/** Block-level wrappers searched for paragraphs, in document order. */
const BLOCK_CONTAINERS = new Set(['w:body', 'w:tbl', 'w:tr', 'w:tc', 'w:sdt', 'w:sdtContent', 'w:customXml']);

/** Inline wrappers whose runs belong to the enclosing paragraph's text. */
const INLINE_CONTAINERS = new Set([
  'w:hyperlink',
  'w:ins',
  'w:smartTag',
  'w:sdt',
  'w:sdtContent',
  'w:fldSimple',
  'w:customXml',
]);

type RunBinding = {
  parent: Element;
  element: Element;
  /** Text last written to (or read from) the element. */
  text: string;
};

type ParagraphBinding = {
  paragraph: Paragraph<DocxRunFormat>;
  element: Element;
  runs: Map<string, RunBinding>;
};

type DocxSource = {
  zip: JSZip;
  root: Element;
  paragraphs: ParagraphBinding[];
};

function collectRuns(container: Element, paragraphIndex: number, binding: ParagraphBinding): void {
  for (const child of childElements(container)) {
    if (child.type !== 'element' || !child.name) continue;

    if (child.name === 'w:r') {
      const text = readRunText(child);
      if (text === null) continue;

      const id = `p${paragraphIndex}r${binding.runs.size}`;
      const fragment: Fragment<DocxRunFormat> = { id, text, format: readRunFormat(child) };
      binding.paragraph.fragments.push(fragment);
      binding.runs.set(id, { parent: container, element: child, text });
      continue;
    }

    if (INLINE_CONTAINERS.has(child.name)) {
      collectRuns(child, paragraphIndex, binding);
    }
  }
}

function collectParagraphs(container: Element, bindings: ParagraphBinding[]): void {
  for (const child of childElements(container)) {
    if (child.type !== 'element' || !child.name) continue;

    if (child.name === 'w:p') {
      const binding: ParagraphBinding = {
        paragraph: { fragments: [] },
        element: child,
        runs: new Map(),
      };
      collectRuns(child, bindings.length, binding);
      bindings.push(binding);
      continue;
    }

    if (BLOCK_CONTAINERS.has(child.name)) {
      collectParagraphs(child, bindings);
    }
  }
}

/**
 * Writes a paragraph's fragments back into its `w:p` element.
 *
 * Existing runs are rewritten only when their text changed. Fragments without
 * a run (created by inserts) become new runs beside the previous fragment's
 * run, or before the next one when they lead the paragraph. Runs whose
 * fragments were tidied away are removed.
 */
function syncParagraph(binding: ParagraphBinding): void {
  const { paragraph, runs } = binding;
  const present = new Set(paragraph.fragments.map((fragment) => fragment.id));

  for (const [id, run] of runs) {
    if (!present.has(id)) {
      removeChild(run.parent, run.element);
      runs.delete(id);
    }
  }

  let anchor: RunBinding | null = null;
  let leading: Array<[string, RunBinding]> = [];

  for (const fragment of paragraph.fragments) {
    const bound = runs.get(fragment.id);

    if (bound) {
      if (bound.text !== fragment.text) {
        writeRunText(bound.element, fragment.text);
        bound.text = fragment.text;
      }
      if (leading.length > 0) {
        insertBefore(bound.parent, bound.element, leading.map(([, run]) => run.element));
        for (const [id, run] of leading) {
          runs.set(id, { ...run, parent: bound.parent });
        }
        leading = [];
      }
      anchor = bound;
      continue;
    }

    const element = createRun(fragment.text, fragment.format);
    if (anchor) {
      insertAfter(anchor.parent, anchor.element, element);
      anchor = { parent: anchor.parent, element, text: fragment.text };
      runs.set(fragment.id, anchor);
    } else {
      leading.push([fragment.id, { parent: binding.element, element, text: fragment.text }]);
    }
  }

  // Nothing to anchor to: the paragraph had no text runs left.
  if (leading.length > 0) {
    binding.element.elements = [...childElements(binding.element), ...leading.map(([, run]) => run.element)];
    for (const [id, run] of leading) {
      runs.set(id, run);
    }
  }
}

/**
 * DOCX-backed document provider.
 *
 * Exposes every paragraph of the main document part, including paragraphs in
 * table cells, as text fragments built from its runs. The run's `w:rPr` is the
 * fragment format. Everything else in the package is written back unchanged.
 */
export class DocxDocumentProvider implements DocumentProvider<DocxRunFormat> {
  private readonly sources = new WeakMap<Document<DocxRunFormat>, DocxSource>();

  async read(bytes: Uint8Array): Promise<Document<DocxRunFormat>> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(bytes);
    } catch (error) {
      throw new DocumentProviderError('INVALID_PACKAGE', 'Document is not a readable DOCX package.', {
        message: error instanceof Error ? error.message : String(error),
      });
    }

    const part = zip.file(DOCUMENT_PART);
    if (!part) {
      throw new DocumentProviderError('INVALID_PACKAGE', `DOCX package has no ${DOCUMENT_PART} part.`);
    }

    let parsed: unknown;
    try {
      parsed = xml2js(await part.async('string'), { compact: false, captureSpacesBetweenElements: true });
    } catch (error) {
      throw new DocumentProviderError('INVALID_PACKAGE', `${DOCUMENT_PART} is not well-formed XML.`, {
        message: error instanceof Error ? error.message : String(error),
      });
    }

    const root = isOoxmlElement(parsed) ? parsed : undefined;
    const body = findOoxmlChild(findOoxmlChild(root, 'w:document'), 'w:body');
    if (!root || !body) {
      throw new DocumentProviderError('INVALID_PACKAGE', `${DOCUMENT_PART} has no w:document/w:body.`);
    }

    const paragraphs: ParagraphBinding[] = [];
    collectParagraphs(body, paragraphs);

    const document: Document<DocxRunFormat> = {
      paragraphs: paragraphs.map((binding) => binding.paragraph),
    };
    this.sources.set(document, { zip, root, paragraphs });
    return document;
  }

  async write(document: Document<DocxRunFormat>): Promise<Uint8Array> {
    const source = this.sources.get(document);
    if (!source) {
      throw new DocumentProviderError('DOCUMENT_NOT_LOADED', 'Document was not loaded by this provider.');
    }

    for (const binding of source.paragraphs) {
      syncParagraph(binding);
    }

    source.zip.file(DOCUMENT_PART, serializeOoxml(source.root));
    return source.zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
  }

  async load(path: string): Promise<Document<DocxRunFormat>> {
    let bytes: Uint8Array;
    try {
      const raw = await readFile(path);
      bytes = new Uint8Array(raw.buffer, raw.byteOffset, raw.byteLength);
    } catch (error) {
      throw new DocumentProviderError('FILE_READ_ERROR', `Unable to read document: ${path}`, {
        message: error instanceof Error ? error.message : String(error),
      });
    }
    return this.read(bytes);
  }

  async save(document: Document<DocxRunFormat>, path: string): Promise<void> {
    const bytes = await this.write(document);
    try {
      await writeFile(path, bytes);
    } catch (error) {
      throw new DocumentProviderError('FILE_WRITE_ERROR', `Unable to write document: ${path}`, {
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
