/**
 * Optional path accessor
 *
 * Webhook bodies arrive as untyped JSON. These helpers walk them by key path
 * and hand back the MISSING marker whenever a segment is absent or of the
 * wrong shape, so callers never null-propagate through unknown maps.
 */

export const MISSING: unique symbol = Symbol("missing");

export type Missing = typeof MISSING;

export type Lookup<T> = T | Missing;

export type PathKey = string | number;

export type AttributeMap = Record<string, unknown>;

export function isMissing<T>(value: Lookup<T>): value is Missing {
  return value === MISSING;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Resolve `path` inside `tree`. Numeric keys index arrays, string keys index
 * plain objects. `undefined` leaves count as missing; `null` is returned as is.
 */
export function lookup(tree: unknown, path: readonly PathKey[]): Lookup<unknown> {
  let current: unknown = tree;
  for (const key of path) {
    if (typeof key === "number") {
      if (!Array.isArray(current) || key < 0 || key >= current.length) {
        return MISSING;
      }
      current = current[key];
    } else {
      if (!isRecord(current) || !(key in current)) {
        return MISSING;
      }
      current = current[key];
    }
    if (current === undefined) {
      return MISSING;
    }
  }
  return current;
}

export function lookupRecord(tree: unknown, path: readonly PathKey[]): Lookup<Record<string, unknown>> {
  const value = lookup(tree, path);
  return isRecord(value) ? value : MISSING;
}

export function lookupArray(tree: unknown, path: readonly PathKey[]): Lookup<unknown[]> {
  const value = lookup(tree, path);
  return Array.isArray(value) ? value : MISSING;
}

/**
 * Textual value at `path`: strings are trimmed, finite numbers and bigints
 * are stringified. Blank strings and every other type are missing.
 */
export function lookupText(tree: unknown, path: readonly PathKey[]): Lookup<string> {
  const value = lookup(tree, path);
  if (isMissing(value)) {
    return MISSING;
  }
  const text = asText(value);
  return text === undefined ? MISSING : text;
}

export function asText(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  return undefined;
}

export function orElse<T, F>(value: Lookup<T>, fallback: F): T | F {
  return isMissing(value) ? fallback : value;
}
