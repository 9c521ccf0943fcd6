import type { ArgumentsState, Named, Positionals } from './types';

/**
 * Determines whether a value is a "plain object" (a simple POJO / dictionary
 * object).
 *
 * A value is considered plain if all of the following are true:
 * 1. It is not `null`.
 * 2. `typeof value === "object"`.
 * 3. Its prototype is either:
 *    - `Object.prototype` (typical object literals / `JSON.parse` output), or
 *    - `null` (objects created via `Object.create(null)`).
 *
 * As a result, this returns `false` for arrays, dates, maps, sets, class
 * instances and other host/boxed objects.
 *
 * @param value
 *   The value to test.
 * @returns
 *   `true` if `value` is a plain object; otherwise `false`.
 */
export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;

  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Type guard for `ArgumentsState` (type narrowing predicate).
 *
 * Used when a state is obtained from an untyped source (most commonly
 * `JSON.parse` of a serialized bundle) to avoid type assertions.
 *
 * @param value
 *   Unknown value to validate.
 * @returns
 *   `true` if `value` is a two-element array holding an array and a plain
 *   object, in that order.
 */
export function isArgumentsState(value: unknown): value is ArgumentsState {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    Array.isArray(value[0]) &&
    isPlainObject(value[1])
  );
}

/**
 * Determines whether a call supplied any extra arguments.
 *
 * Omitted and empty containers both count as "no extras", which selects the
 * zero-copy path in `apply()` and the identity path in `extend()`.
 * Symbol keys count: the merge copies them.
 */
export function hasExtras(positionals?: Positionals, named?: Named): boolean {
  return (
    (positionals !== undefined && positionals.length > 0) ||
    (named !== undefined && Reflect.ownKeys(named).length > 0)
  );
}

/**
 * Short description of a value's shape for error messages.
 *
 * @example
 * ```ts
 * describeValue([1, 2, 3]); // 'an array of length 3'
 * describeValue(null);      // 'null'
 * ```
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return `an array of length ${value.length}`;
  if (isPlainObject(value)) return 'a plain object';
  return `a value of type ${typeof value}`;
}
