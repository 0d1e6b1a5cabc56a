import { js2xml, type Element } from 'xml-js';

// ============================================================================
// OOXML element utilities over xml-js (non-compact) trees
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value != null && !Array.isArray(value);
}

/**
 * Narrows an xml-js parse result to a non-compact element.
 *
 * A non-compact element has no keys beyond the ones xml-js writes, and its
 * `elements`, when present, is an array.
 *
 * @example
 * ```typescript
 * isOoxmlElement({ name: 'w:p', elements: [] }); // true
 * isOoxmlElement({ elements: 'x' }); // false
 * isOoxmlElement(null); // false
 * ```
 */
export function isOoxmlElement(value: unknown): value is Element {
  if (!isRecord(value)) return false;
  if (value.elements !== undefined && !Array.isArray(value.elements)) return false;
  if (value.name !== undefined && typeof value.name !== 'string') return false;
  return true;
}

export function childElements(parent: Element | undefined): Element[] {
  return parent?.elements ?? [];
}

/**
 * Finds a direct child element by name. Searches only immediate children.
 */
export function findOoxmlChild(parent: Element | undefined, name: string): Element | undefined {
  return parent?.elements?.find((child) => child.name === name);
}

/**
 * Concatenates the text and CDATA nodes directly under an element.
 */
export function readTextContent(element: Element): string {
  let text = '';
  for (const child of childElements(element)) {
    if (child.type === 'text' && child.text !== undefined) {
      text += String(child.text);
    } else if (child.type === 'cdata' && child.cdata !== undefined) {
      text += child.cdata;
    }
  }
  return text;
}

export function createElement(name: string, elements: Element[] = [], attributes?: Element['attributes']): Element {
  return {
    type: 'element',
    name,
    ...(attributes ? { attributes } : {}),
    ...(elements.length > 0 ? { elements } : {}),
  };
}

export function insertBefore(parent: Element, reference: Element, inserted: Element[]): void {
  const siblings = childElements(parent);
  const index = siblings.indexOf(reference);
  const at = index === -1 ? 0 : index;
  parent.elements = [...siblings.slice(0, at), ...inserted, ...siblings.slice(at)];
}

export function insertAfter(parent: Element, reference: Element, inserted: Element): void {
  const siblings = childElements(parent);
  const index = siblings.indexOf(reference);
  const at = index === -1 ? siblings.length : index + 1;
  parent.elements = [...siblings.slice(0, at), inserted, ...siblings.slice(at)];
}

export function removeChild(parent: Element, child: Element): void {
  parent.elements = childElements(parent).filter((element) => element !== child);
}

// ============================================================================
// Serialization
// ============================================================================

const ATTRIBUTE_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  '\t': '&#9;',
  '\n': '&#10;',
  '\r': '&#13;',
};

/**
 * Escapes a decoded attribute value for a double-quoted XML attribute.
 */
export function escapeAttributeValue(value: string): string {
  return value.replace(/[&<>"\t\n\r]/g, (character) => ATTRIBUTE_ESCAPES[character] ?? character);
}

/**
 * xml-js escapes only `"` in attribute values, and turns `&amp;` in a text
 * node back into `&` before escaping it. Attribute values are escaped here
 * instead, and every `&` in text gets a text node of its own so that no text
 * node ever contains `&amp;`.
 */
function prepareForWriting(element: Element): Element {
  const prepared: Element = { ...element };

  if (element.attributes) {
    prepared.attributes = Object.fromEntries(
      Object.entries(element.attributes).map(([name, value]): [string, string | number | undefined] => [
        name,
        typeof value === 'string' ? escapeAttributeValue(value) : value,
      ]),
    );
  }

  if (element.elements) {
    prepared.elements = element.elements.flatMap((child) => {
      if (child.type !== 'text') return [prepareForWriting(child)];

      const text = String(child.text ?? '');
      if (!text.includes('&')) return [child];
      return text
        .split(/(&)/)
        .filter((part) => part.length > 0)
        .map((part): Element => ({ ...child, text: part }));
    });
  }

  return prepared;
}

/**
 * Writes a non-compact xml-js tree back to XML text. Entities decoded on
 * parse are escaped exactly once.
 */
export function serializeOoxml(root: Element): string {
  return js2xml(prepareForWriting(root), { compact: false });
}
