import type { Container, SelfComparable } from './types';

/**
 * `Object.prototype.toString` tags of the built-ins that equality and display
 * treat by value: boxed primitives, `Date`, `RegExp`, plus `Map` and `Set`.
 */
export const Tag = {
  String: '[object String]',
  Number: '[object Number]',
  Boolean: '[object Boolean]',
  BigInt: '[object BigInt]',
  Symbol: '[object Symbol]',
  Date: '[object Date]',
  RegExp: '[object RegExp]',
  Map: '[object Map]',
  Set: '[object Set]'
} as const;

const RICH_TYPES = new Set<string>([
  Tag.String,
  Tag.Number,
  Tag.Boolean,
  Tag.BigInt,
  Tag.Symbol,
  Tag.Date,
  Tag.RegExp
]);

/**
 * Returns the internal type tag of a value.
 */
export function getTypeTag(value: unknown): string {
  return Object.prototype.toString.call(value);
}

/**
 * A stored value compared and rendered as a single value rather than walked:
 * `Date`, `RegExp` or a boxed primitive.
 */
export function isRichType(value: object): boolean {
  return RICH_TYPES.has(getTypeTag(value));
}

/**
 * The primitive behind a `Date` or boxed value. Callers check the tag first.
 */
export function unbox<T>(wrapper: object): T {
  return (wrapper as { valueOf(): T }).valueOf();
}

/**
 * Value equality for rich types: dates by timestamp, regular expressions by
 * source and flags, boxed primitives by the wrapped value.
 */
export function areBoxedPrimitivesEqual(left: object, right: object): boolean {
  const leftTypeTag = getTypeTag(left);
  const rightTypeTag = getTypeTag(right);

  if (leftTypeTag !== rightTypeTag) return false;

  switch (leftTypeTag) {
    case Tag.Number:
    case Tag.Date:
      // Object.is keeps NaN equal to NaN (and an invalid Date to another).
      return Object.is(unbox<number>(left), unbox<number>(right));
    case Tag.String:
      return unbox<string>(left) === unbox<string>(right);
    case Tag.Boolean:
      return unbox<boolean>(left) === unbox<boolean>(right);
    case Tag.BigInt:
      return unbox<bigint>(left) === unbox<bigint>(right);
    case Tag.Symbol:
      return unbox<symbol>(left) === unbox<symbol>(right);
    case Tag.RegExp:
      return left.toString() === right.toString();
    default:
      return false;
  }
}

/**
 * Determines if a value is a non-null object or a function.
 * Acts as a type guard to narrow `unknown` values to `Container`.
 *
 * Functions are included: bundles are callable objects.
 */
export function isContainer(value: unknown): value is Container {
  return (
    (typeof value === 'object' && value !== null) || typeof value === 'function'
  );
}

/**
 * Determines if a value exposes an `equals(other)` method.
 */
export function isSelfComparable(value: unknown): value is SelfComparable {
  return (
    isContainer(value) &&
    'equals' in value &&
    typeof value.equals === 'function'
  );
}
