const arrayPathExpr = /^\d+(\.|$)/;

export const REDACTION = '[redacted]';

function getNestedPaths(paths: string[], prefix: string): string[] {
  return paths
    .filter((path) => path.startsWith(prefix + '.'))
    .map((path) => path.substring(prefix.length + 1));
}

function getGeneralArrayPaths(paths: string[]): string[] {
  return paths.filter((path) => !path.match(arrayPathExpr));
}

/**
 * Redacts values in an object or array by replacing them with a placeholder.
 *
 * Paths use dot notation. A segment that names a key of an array's elements
 * applies to every element (`users.password`), a numeric segment to one
 * element only (`users.0.password`). Primitives, `null` and `undefined` are
 * returned unchanged.
 *
 * @example
 * ```typescript
 * redact({ raw: { access_token: 'abc', token_type: 'bearer' } }, ['raw.access_token']);
 * // { raw: { access_token: '[redacted]', token_type: 'bearer' } }
 * ```
 */
export function redact<T>(obj: T, paths: string[], redaction = REDACTION): T {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (paths.length === 0) {
    return obj;
  }

  const pathSet = new Set(paths);

  if (Array.isArray(obj)) {
    return obj.map((item, index) => {
      const indexStr = index.toString();

      if (pathSet.has(indexStr)) {
        return redaction;
      }

      const nestedPaths = getNestedPaths(paths, indexStr);
      const generalPaths = getGeneralArrayPaths(paths);
      const allNestedPaths = [...nestedPaths, ...generalPaths];

      return redact(item, allNestedPaths, redaction);
    }) as T;
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (pathSet.has(key)) {
      result[key] = redaction;
    } else {
      const nestedPaths = getNestedPaths(paths, key);
      result[key] = redact(value, nestedPaths, redaction);
    }
  }

  return result as T;
}

/**
 * Replace the values of the named query parameters in a URL string, so that
 * authorization and callback URLs can be logged without their `state` or
 * `code`. Strings that do not parse as absolute URLs are returned as-is.
 */
export function redactUrlParams(
  url: string,
  params: string[],
  redaction = REDACTION
): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  let changed = false;
  for (const name of params) {
    if (parsed.searchParams.has(name)) {
      parsed.searchParams.set(name, redaction);
      changed = true;
    }
  }

  return changed ? parsed.toString() : url;
}
