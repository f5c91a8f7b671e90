import type { PostprocessOp } from '@trawl/shared';

export interface PostprocessContext {
  /** Base for absolute_url when the op carries none (usually the page URL) */
  baseUrl?: string;
}

function toAbsoluteUrl(value: string, base: string | undefined): string {
  try {
    return new URL(value.trim(), base).toString();
  } catch {
    return value;
  }
}

/**
 * Apply postprocessing operations to extracted value
 */
export function applyPostprocess(value: string, ops: PostprocessOp[], context: PostprocessContext = {}): string {
  let result = value;

  for (const op of ops) {
    switch (op.op) {
      case 'trim':
        result = result.trim();
        break;

      case 'lowercase':
        result = result.toLowerCase();
        break;

      case 'uppercase':
        result = result.toUpperCase();
        break;

      case 'collapse_whitespace':
        result = result.replace(/\s+/g, ' ').trim();
        break;

      case 'replace':
        result = result.replaceAll(op.from, op.to);
        break;

      case 'regex_extract': {
        // No match keeps the current value
        const group = result.match(new RegExp(op.pattern))?.[op.group];
        if (group !== undefined) {
          result = group;
        }
        break;
      }

      case 'absolute_url':
        result = toAbsoluteUrl(result, op.base ?? context.baseUrl);
        break;
    }
  }

  return result;
}
