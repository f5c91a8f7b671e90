import { extractionLogger } from '../utils/logger';

/**
 * Extract value using regex pattern.
 * Returns the first capturing group if the pattern has one, otherwise the full match.
 */
export function extractWithRegex(
  text: string,
  pattern: string
): string | null {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (error) {
    extractionLogger.debug(`Invalid regex "${pattern}"`, {
      reason: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  const match = text.match(regex);
  if (!match) {
    return null;
  }

  const value = match[1] !== undefined ? match[1] : match[0];
  return value.trim() !== '' ? value : null;
}
