/**
 * XML helpers for article bodies
 * Bodies are well-formed XML documents whose root element is <main>
 */

import { JSDOM } from 'jsdom';

export const BODY_ROOT = 'main';

export interface XmlDocument {
  root: Element;
  document: Document;
  serialize: (node: Node) => string;
}

/**
 * Parse a well-formed XML string.
 * @throws the parser's error when the markup is not well-formed
 */
export function parseXml(xml: string): XmlDocument {
  const dom = new JSDOM(xml, { contentType: 'application/xml' });
  const document = dom.window.document;
  const root = document.documentElement;
  if (!root || root.localName === 'parsererror') {
    throw new Error(root?.textContent?.trim() || 'XML document has no root element');
  }
  const serializer: XMLSerializer = new dom.window.XMLSerializer();
  return {
    root,
    document,
    serialize: node => serializer.serializeToString(node)
  };
}

export function isElement(node: Node): node is Element {
  return node.nodeType === node.ELEMENT_NODE;
}

export function isText(node: Node): node is Text {
  return node.nodeType === node.TEXT_NODE || node.nodeType === node.CDATA_SECTION_NODE;
}

/**
 * Text length of an XML body with every whitespace run removed.
 */
export function characterCount(bodyXml: string): number {
  const { root } = parseXml(bodyXml);
  return collectText(root).replace(/\s+/g, '').length;
}

function collectText(node: Node): string {
  let text = '';
  node.childNodes.forEach(child => {
    if (isText(child)) {
      text += child.data;
    } else if (isElement(child)) {
      text += collectText(child);
    }
  });
  return text;
}
