import type { Named, Positionals } from './types';

/**
 * Concatenates positional values, stored ones first.
 *
 * Always returns a fresh array; callers freeze it.
 */
export function concatPositionals(
  base: Positionals,
  extra: Positionals = []
): unknown[] {
  return [...base, ...extra];
}

/**
 * Merges named values into a fresh record.
 *
 * Collision policy:
 * Last writer wins. A key present in both `base` and `extra` takes the value
 * from `extra`; collisions are never rejected.
 */
export function mergeNamed(base: Named, extra: Named = {}): Named {
  return { ...base, ...extra };
}

/**
 * Freezes a container in place and returns it with its type unchanged.
 *
 * `Object.freeze` returns `Readonly<T>`, which would widen tuple types; this
 * keeps the declared type of the bundle's fields.
 */
export function freeze<T extends object>(value: T): T {
  Object.freeze(value);
  return value;
}
