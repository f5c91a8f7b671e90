import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import * as xpath from 'xpath';
import type { AttributeTarget } from '@trawl/shared';
import { extractionLogger } from '../utils/logger';

const ELEMENT_NODE = 1;
const ATTRIBUTE_NODE = 2;

/**
 * Extract a value with an XPath expression.
 * `markup` must be well-formed XML (cheerio's xml() rendering of the scope).
 */
export function extractWithXPath(
  markup: string,
  selector: string,
  attribute: AttributeTarget
): string | null {
  try {
    // Wrap in a root element so fragments with several top-level nodes parse
    const doc = new DOMParser().parseFromString(`<root>${markup}</root>`, 'text/xml');
    const result: unknown = xpath.select(selector, doc);
    const first: unknown = Array.isArray(result) ? result[0] : result;

    if (typeof first === 'string') {
      return first.trim() !== '' ? first : null;
    }
    if (typeof first === 'number') {
      return Number.isFinite(first) ? String(first) : null;
    }
    if (isDomNode(first)) {
      const value = extractNodeValue(first, attribute);
      return value && value.trim() !== '' ? value : null;
    }
    return null;
  } catch (error) {
    extractionLogger.debug(`XPath evaluation failed for "${selector}"`, {
      reason: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

function isDomNode(value: unknown): value is Node {
  return typeof value === 'object' && value !== null && 'nodeType' in value;
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/**
 * Extract the specified attribute from an XPath result node
 */
function extractNodeValue(node: Node, attribute: AttributeTarget): string | null {
  if (node.nodeType === ATTRIBUTE_NODE) {
    return node.nodeValue;
  }

  if (!isElement(node)) {
    return node.textContent;
  }

  if (attribute === 'text') {
    return node.textContent;
  }

  if (attribute === 'html') {
    const serializer = new XMLSerializer();
    return Array.from(node.childNodes, child => serializer.serializeToString(child)).join('');
  }

  if (attribute === 'value') {
    return node.getAttribute('value');
  }

  return node.getAttribute(attribute.slice('attr:'.length));
}
