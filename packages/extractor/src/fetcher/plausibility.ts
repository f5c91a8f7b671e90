// Structural sanity checks for response bodies
import type { ContentShape } from '@trawl/shared';

export type BodyAssessment = 'plausible' | 'empty' | 'implausible';

const MARKUP_PATTERN = /<\s*(html|body|head|div|main|section|ul|ol|table|article|span|script)\b/i;

/**
 * Decide whether a 2xx body is worth handing to an extractor.
 * HTML must contain markup; JSON must parse.
 */
export function assessBody(body: string, shape: ContentShape): BodyAssessment {
  const trimmed = body.trim();
  if (trimmed.length === 0) {
    return 'empty';
  }

  if (shape === 'json') {
    return isJson(trimmed) ? 'plausible' : 'implausible';
  }

  return MARKUP_PATTERN.test(trimmed) ? 'plausible' : 'implausible';
}

function isJson(text: string): boolean {
  if (!text.startsWith('{') && !text.startsWith('[')) {
    return false;
  }
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Infer the content shape from a Content-Type header, if it says anything useful.
 */
export function shapeFromContentType(contentType: string | null): ContentShape | null {
  if (!contentType) return null;
  const type = contentType.toLowerCase();
  if (type.includes('json')) return 'json';
  if (type.includes('html') || type.includes('xml')) return 'html';
  return null;
}
