import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import JSZip from 'jszip';
import { buildDocx, paragraphXml, readDocumentXml } from '../test-utils/docx-fixtures.js';
import { getDocumentText } from '../text.js';
import { DocxDocumentProvider } from './docx-provider.js';

const chapterParagraph = paragraphXml([{ text: 'Chapter ', bold: true }, '1. DEFIN', 'ITIONS']);

describe('DocxDocumentProvider.read', () => {
  it('exposes paragraphs and their text runs as fragments', async () => {
    const provider = new DocxDocumentProvider();
    const document = await provider.read(await buildDocx(chapterParagraph + paragraphXml(['Second'])));

    expect(document.paragraphs).toHaveLength(2);
    const [first] = document.paragraphs;
    expect(first.fragments.map((fragment) => fragment.id)).toEqual(['p0r0', 'p0r1', 'p0r2']);
    expect(first.fragments.map((fragment) => fragment.text)).toEqual(['Chapter ', '1. DEFIN', 'ITIONS']);
    expect(first.fragments[0].format.properties?.name).toBe('w:rPr');
    expect(first.fragments[0].format.properties?.elements?.[0]?.name).toBe('w:b');
    expect(first.fragments[1].format.properties).toBeNull();
    expect(document.paragraphs[1].fragments[0].id).toBe('p1r0');
  });

  it('includes table cell paragraphs in document order', async () => {
    const table =
      '<w:tbl><w:tblPr/><w:tr>' +
      `<w:tc>${paragraphXml(['Cell A'])}</w:tc>` +
      `<w:tc>${paragraphXml(['Cell B'])}</w:tc>` +
      '</w:tr></w:tbl>';
    const provider = new DocxDocumentProvider();
    const document = await provider.read(await buildDocx(paragraphXml(['Before']) + table + paragraphXml(['After'])));

    expect(getDocumentText(document)).toBe('Before\nCell A\nCell B\nAfter');
  });

  it('reads runs inside inline wrappers and skips non-text runs', async () => {
    const body =
      '<w:p>' +
      '<w:r><w:t xml:space="preserve">See </w:t></w:r>' +
      '<w:hyperlink w:history="1"><w:r><w:t>the annex</w:t></w:r></w:hyperlink>' +
      '<w:r><w:drawing/></w:r>' +
      '<w:r><w:t>.</w:t><w:tab/><w:t>x</w:t><w:br/></w:r>' +
      '</w:p>';
    const provider = new DocxDocumentProvider();
    const document = await provider.read(await buildDocx(body));

    expect(document.paragraphs[0].fragments.map((fragment) => [fragment.id, fragment.text])).toEqual([
      ['p0r0', 'See '],
      ['p0r1', 'the annex'],
      ['p0r2', '.\tx\n'],
    ]);
  });

  it('keeps runs with page or column breaks out of the fragments', async () => {
    const body =
      '<w:p>' +
      '<w:r><w:t>Intro</w:t></w:r>' +
      '<w:r><w:t>End.</w:t><w:br w:type="page"/></w:r>' +
      '<w:r><w:t>Next</w:t><w:br w:type="column"/></w:r>' +
      '<w:r><w:t>a</w:t><w:br w:type="textWrapping"/></w:r>' +
      '</w:p>';
    const provider = new DocxDocumentProvider();
    const document = await provider.read(await buildDocx(body));

    expect(document.paragraphs[0].fragments.map((fragment) => [fragment.id, fragment.text])).toEqual([
      ['p0r0', 'Intro'],
      ['p0r1', 'a\n'],
    ]);
  });

  it('rejects bytes that are not a zip package', async () => {
    const provider = new DocxDocumentProvider();

    await expect(provider.read(new Uint8Array([1, 2, 3]))).rejects.toMatchObject({ code: 'INVALID_PACKAGE' });
  });

  it('rejects packages without a main document part', async () => {
    const zip = new JSZip();
    zip.file('word/styles.xml', '<w:styles/>');
    const provider = new DocxDocumentProvider();

    await expect(provider.read(await zip.generateAsync({ type: 'uint8array' }))).rejects.toMatchObject({
      code: 'INVALID_PACKAGE',
    });
  });
});

describe('DocxDocumentProvider.write', () => {
  it('writes changed text, new fragments and emptied fragments back', async () => {
    const provider = new DocxDocumentProvider();
    const document = await provider.read(await buildDocx(chapterParagraph));
    const fragments = document.paragraphs[0].fragments;

    fragments[1].text = '1. DEFINITIONS';
    fragments[2].text = '';
    fragments.splice(1, 0, { id: 'inserted-1', text: 'NEW ', format: fragments[0].format });

    const reread = await new DocxDocumentProvider().read(await provider.write(document));
    const [paragraph] = reread.paragraphs;

    expect(paragraph.fragments.map((fragment) => fragment.text)).toEqual(['Chapter ', 'NEW ', '1. DEFINITIONS', '']);
    expect(paragraph.fragments[1].format.properties?.elements?.[0]?.name).toBe('w:b');
    expect(paragraph.fragments[2].format.properties).toBeNull();
  });

  it('places fragments that lead the paragraph before the first run', async () => {
    const provider = new DocxDocumentProvider();
    const document = await provider.read(await buildDocx(chapterParagraph));
    const fragments = document.paragraphs[0].fragments;
    fragments.unshift({ id: 'lead', text: 'Lead ', format: fragments[1].format });

    const reread = await new DocxDocumentProvider().read(await provider.write(document));

    expect(getDocumentText(reread)).toBe('Lead Chapter 1. DEFINITIONS');
  });

  it('removes runs whose fragments were tidied away', async () => {
    const provider = new DocxDocumentProvider();
    const document = await provider.read(await buildDocx(chapterParagraph));
    document.paragraphs[0].fragments.splice(1, 1);

    const bytes = await provider.write(document);
    const reread = await new DocxDocumentProvider().read(bytes);

    expect(reread.paragraphs[0].fragments.map((fragment) => fragment.text)).toEqual(['Chapter ', 'ITIONS']);
    expect(await readDocumentXml(bytes)).not.toContain('1. DEFIN');
  });

  it('escapes markup characters in rewritten text', async () => {
    const provider = new DocxDocumentProvider();
    const document = await provider.read(await buildDocx(paragraphXml(['plain'])));
    document.paragraphs[0].fragments[0].text = 'A & B <c>';

    const reread = await new DocxDocumentProvider().read(await provider.write(document));

    expect(reread.paragraphs[0].fragments[0].text).toBe('A & B <c>');
  });

  it('writes tabs and line breaks as run content', async () => {
    const provider = new DocxDocumentProvider();
    const document = await provider.read(await buildDocx(paragraphXml(['plain'])));
    document.paragraphs[0].fragments[0].text = 'a\tb\nc';

    const bytes = await provider.write(document);

    expect(await readDocumentXml(bytes)).toContain(
      '<w:r><w:t xml:space="preserve">a</w:t><w:tab/><w:t xml:space="preserve">b</w:t><w:br/><w:t xml:space="preserve">c</w:t></w:r>',
    );
  });

  it('keeps a page break when text beside it changes', async () => {
    const body = '<w:p><w:r><w:t>Intro</w:t></w:r><w:r><w:t>End.</w:t><w:br w:type="page"/></w:r></w:p>';
    const provider = new DocxDocumentProvider();
    const document = await provider.read(await buildDocx(body));
    document.paragraphs[0].fragments[0].text = 'Opening';

    const xml = await readDocumentXml(await provider.write(document));

    expect(xml).toContain(
      '<w:p><w:r><w:t xml:space="preserve">Opening</w:t></w:r><w:r><w:t>End.</w:t><w:br w:type="page"/></w:r></w:p>',
    );
  });

  it('keeps entities in untouched runs when another paragraph changes', async () => {
    const body = '<w:p><w:r><w:t xml:space="preserve">Write &amp;amp; to escape</w:t></w:r></w:p>' + paragraphXml(['plain']);
    const provider = new DocxDocumentProvider();
    const document = await provider.read(await buildDocx(body));
    document.paragraphs[1].fragments[0].text = 'changed';

    const reread = await new DocxDocumentProvider().read(await provider.write(document));

    expect(getDocumentText(reread)).toBe('Write &amp; to escape\nchanged');
  });

  it('saves an unchanged document with the same content and attributes', async () => {
    const body =
      '<w:sdt><w:sdtPr><w:alias w:val="R&amp;D"/><w:tag w:val="a &lt; b &quot;c&quot;"/></w:sdtPr>' +
      `<w:sdtContent>${paragraphXml(['Research ', { text: 'budget', bold: true }])}</w:sdtContent></w:sdt>` +
      '<w:p><w:r><w:t xml:space="preserve">Write &amp;amp; to escape</w:t></w:r></w:p>' +
      '<w:p><w:r><w:t>End.</w:t><w:br w:type="page"/></w:r></w:p>' +
      '<w:p><w:r><w:drawing>' +
      '<wp:inline xmlns:wp="http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing">' +
      '<wp:docPr id="1" name="Logo" descr="Logo &amp; seal"/>' +
      '</wp:inline></w:drawing></w:r></w:p>';
    const provider = new DocxDocumentProvider();
    const document = await provider.read(await buildDocx(body));

    const bytes = await provider.write(document);
    const reread = await new DocxDocumentProvider().read(bytes);
    const xml = await readDocumentXml(bytes);

    expect(reread.paragraphs.map((paragraph) => paragraph.fragments)).toEqual(
      document.paragraphs.map((paragraph) => paragraph.fragments),
    );
    expect(reread.paragraphs.map((paragraph) => paragraph.fragments.map((fragment) => fragment.text))).toEqual([
      ['Research ', 'budget'],
      ['Write &amp; to escape'],
      [],
      [],
    ]);
    expect(xml).toContain('<w:alias w:val="R&amp;D"/>');
    expect(xml).toContain('<w:tag w:val="a &lt; b &quot;c&quot;"/>');
    expect(xml).toContain('<w:t xml:space="preserve">Write &amp;amp; to escape</w:t>');
    expect(xml).toContain('<w:br w:type="page"/>');
    expect(xml).toContain('<wp:docPr id="1" name="Logo" descr="Logo &amp; seal"/>');
  });

  it('refuses documents it did not load', async () => {
    const provider = new DocxDocumentProvider();

    await expect(provider.write({ paragraphs: [] })).rejects.toMatchObject({ code: 'DOCUMENT_NOT_LOADED' });
  });
});

describe('DocxDocumentProvider load/save', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'docpatch-provider-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('saves to and loads from the file system', async () => {
    const provider = new DocxDocumentProvider();
    const document = await provider.read(await buildDocx(chapterParagraph));
    document.paragraphs[0].fragments[2].text = 'ITIONS AND INTERPRETATION';
    const path = join(directory, 'out.docx');

    await provider.save(document, path);
    const loaded = await new DocxDocumentProvider().load(path);

    expect(getDocumentText(loaded)).toBe('Chapter 1. DEFINITIONS AND INTERPRETATION');
  });

  it('reports unreadable paths', async () => {
    const provider = new DocxDocumentProvider();

    await expect(provider.load(join(directory, 'missing.docx'))).rejects.toMatchObject({ code: 'FILE_READ_ERROR' });
  });
});
