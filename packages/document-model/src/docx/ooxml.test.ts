import { describe, expect, it } from 'vitest';
import { xml2js } from 'xml-js';
import { escapeAttributeValue, isOoxmlElement, serializeOoxml } from './ooxml.js';

function parse(xml: string) {
  const parsed = xml2js(xml, { compact: false });
  if (!isOoxmlElement(parsed)) throw new Error('expected a non-compact tree');
  return parsed;
}

describe('escapeAttributeValue', () => {
  it('escapes markup characters, quotes and line breaks', () => {
    expect(escapeAttributeValue('R&D <x> "q"\n')).toBe('R&amp;D &lt;x&gt; &quot;q&quot;&#10;');
  });
});

describe('serializeOoxml', () => {
  it('writes decoded entities back escaped exactly once', () => {
    const xml = '<a t="R&amp;D &lt;x&gt; &quot;q&quot;">Write &amp;amp; &lt;b&gt;</a>';

    expect(serializeOoxml(parse(xml))).toBe(xml);
  });

  it('leaves the parsed tree unchanged', () => {
    const root = parse('<a t="x &amp; y">1 &amp; 2</a>');

    serializeOoxml(root);

    expect(root.elements?.[0]?.attributes).toEqual({ t: 'x & y' });
    expect(root.elements?.[0]?.elements).toEqual([{ type: 'text', text: '1 & 2' }]);
  });
});
