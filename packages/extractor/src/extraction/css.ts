import type { Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { AttributeTarget } from '@trawl/shared';
import { extractionLogger } from '../utils/logger';

/**
 * Extract a value with a CSS selector, searched below `root`.
 * An empty selector reads the root element itself.
 */
export function extractWithCSS(
  root: Cheerio<AnyNode>,
  selector: string,
  attribute: AttributeTarget
): string | null {
  try {
    const element = selector === '' ? root.first() : root.find(selector).first();

    if (element.length === 0) {
      return null;
    }

    const value = extractAttribute(element, attribute);

    // Return null for empty strings to be consistent
    return value && value.trim() !== '' ? value : null;
  } catch (error) {
    extractionLogger.debug(`Invalid CSS selector "${selector}"`, {
      reason: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Extract the specified attribute from a cheerio element
 */
function extractAttribute(element: Cheerio<AnyNode>, attribute: AttributeTarget): string | null {
  if (attribute === 'text') {
    return element.text();
  }

  if (attribute === 'html') {
    return element.html();
  }

  if (attribute === 'value') {
    const value = element.val();
    return typeof value === 'string' ? value : null;
  }

  // attr:name format
  const attrName = attribute.slice('attr:'.length);
  return element.attr(attrName) ?? null;
}
