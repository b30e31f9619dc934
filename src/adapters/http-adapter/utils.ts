/**
 * Shared utilities for the HTTP adapter
 */

/**
 * Normalize a scope string from a provider response.
 * Handles both space-delimited and comma-delimited scopes (GitHub uses commas).
 */
export function normalizeScope(
  providerScope: string | undefined | null
): string | undefined {
  if (!providerScope) return undefined;

  const scopes = providerScope
    .split(/[,\s]+/)
    .map((scope) => scope.trim())
    .filter((scope) => scope.length > 0);

  return scopes.length > 0 ? scopes.join(' ') : undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
