// Dotted path lookup for JSON payloads: "props.pageProps.reviews", "items[0].id", "$.data.total"

type PathSegment = string | number;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parsePath(path: string): PathSegment[] {
  const normalized = path.trim().replace(/^\$\.?/, '');
  const segments: PathSegment[] = [];

  for (const part of normalized.split('.')) {
    if (part === '') continue;
    const match = part.match(/^([^[\]]*)((?:\[\d+\])*)$/);
    if (!match) {
      segments.push(part);
      continue;
    }
    const [, key, indexes] = match;
    if (key) segments.push(key);
    for (const index of indexes?.matchAll(/\[(\d+)\]/g) ?? []) {
      segments.push(Number(index[1]));
    }
  }

  return segments;
}

/**
 * Resolve a path against a parsed JSON value. Missing steps yield undefined.
 */
export function resolvePath(value: unknown, path: string): unknown {
  let current = value;
  for (const segment of parsePath(path)) {
    if (typeof segment === 'number') {
      if (!Array.isArray(current)) return undefined;
      current = current[segment];
    } else {
      if (!isRecord(current)) return undefined;
      current = current[segment];
    }
  }
  return current;
}

/**
 * Read a scalar at `path`. Strings and finite numbers are returned as-is;
 * booleans as "true"/"false"; objects, arrays, null and blanks as null.
 */
export function extractWithJsonPath(value: unknown, path: string): string | number | null {
  const resolved = resolvePath(value, path);

  if (typeof resolved === 'string') {
    return resolved.trim() !== '' ? resolved : null;
  }
  if (typeof resolved === 'number') {
    return Number.isFinite(resolved) ? resolved : null;
  }
  if (typeof resolved === 'boolean') {
    return String(resolved);
  }
  return null;
}
