import type { Container, CycleEntry, SelfComparable } from './types';

import {
  Tag,
  areBoxedPrimitivesEqual,
  getTypeTag,
  isContainer,
  isRichType,
  isSelfComparable
} from './utils';

export type { SelfComparable } from './types';

/**
 * Checks if the current pair of containers is already being compared further
 * up the current recursion path.
 *
 * If both sides match an ancestor pair by reference, the traversal has
 * looped (a "back-edge" in the graph traversal).
 */
function isCycleDetected(
  stack: readonly CycleEntry[],
  left: Container,
  right: Container
): boolean {
  for (const [seenLeft, seenRight] of stack) {
    if (seenLeft === left && seenRight === right) return true;
  }
  return false;
}

/**
 * Returns a **new** stack with the pair appended, so the history stays
 * path-scoped and never leaks into sibling branches.
 */
function pushCycleEntry(
  stack: readonly CycleEntry[],
  left: Container,
  right: Container
): readonly CycleEntry[] {
  const entry: CycleEntry = [left, right];
  return stack.concat([entry]);
}

function areArraysEqual(
  left: readonly unknown[],
  right: readonly unknown[],
  stack: readonly CycleEntry[]
): boolean {
  if (left.length !== right.length) return false;
  return left.every((value, index) => compare(value, right[index], stack));
}

function areMapsEqual(
  left: ReadonlyMap<unknown, unknown>,
  right: ReadonlyMap<unknown, unknown>,
  stack: readonly CycleEntry[]
): boolean {
  if (left.size !== right.size) return false;
  for (const [key, value] of left) {
    if (!right.has(key)) return false;
    if (!compare(value, right.get(key), stack)) return false;
  }
  return true;
}

function areSetsEqual(
  left: ReadonlySet<unknown>,
  right: ReadonlySet<unknown>
): boolean {
  if (left.size !== right.size) return false;
  for (const member of left) {
    if (!right.has(member)) return false;
  }
  return true;
}

/**
 * Compares own enumerable string keys and their values.
 *
 * The key sets must match exactly; key order is irrelevant.
 */
function areRecordsEqual(
  left: Container,
  right: Container,
  stack: readonly CycleEntry[]
): boolean {
  const leftKeys = Object.keys(left);
  const rightKeys = Object.keys(right);
  if (leftKeys.length !== rightKeys.length) return false;

  const leftEntries = new Map(Object.entries(left));
  for (const [key, rightValue] of Object.entries(right)) {
    if (!leftEntries.has(key)) return false;
    if (!compare(leftEntries.get(key), rightValue, stack)) return false;
  }
  return true;
}

/**
 * The comparison path of the `equals()` call in progress.
 *
 * `isDeepEqual` calls made from inside a delegated `equals()` resume from
 * this stack, so a cycle that runs through a bundle is still detected.
 * Restored after every call.
 */
let activeStack: readonly CycleEntry[] = [];

function delegate(
  left: SelfComparable,
  right: Container,
  stack: readonly CycleEntry[]
): boolean {
  const previous = activeStack;
  activeStack = pushCycleEntry(stack, left, right);
  try {
    return left.equals(right);
  } finally {
    activeStack = previous;
  }
}

/**
 * The central recursive dispatch function.
 *
 * Logic:
 * 1. Identity:
 *    `Object.is` short-circuits (NaN equals NaN, +0 differs from -0).
 * 2. Leaves:
 *    Unless both sides are containers, unequal identity means unequal values.
 * 3. Cycle Guard:
 *    A pair already on the current path is treated as equal.
 * 4. Delegation:
 *    A left value exposing `equals(other)` decides for itself; comparisons it
 *    starts through {@link isDeepEqual} continue on the current path.
 * 5. Structure:
 *    Rich types by value, then Maps, Sets, Arrays and records by content.
 *    Functions that reach this point are compared by reference only.
 */
function compare(
  left: unknown,
  right: unknown,
  stack: readonly CycleEntry[]
): boolean {
  // 1. Identity
  if (Object.is(left, right)) return true;

  // 2. Leaves
  if (!isContainer(left) || !isContainer(right)) return false;

  // 3. Cycle Guard
  if (isCycleDetected(stack, left, right)) return true;

  // 4. Delegation
  if (isSelfComparable(left)) return delegate(left, right, stack);

  if (typeof left === 'function' || typeof right === 'function') return false;

  if (Object.getPrototypeOf(left) !== Object.getPrototypeOf(right)) {
    return false;
  }

  // 5. Structure
  if (isRichType(left)) return areBoxedPrimitivesEqual(left, right);

  const nextStack = pushCycleEntry(stack, left, right);

  if (Array.isArray(left) && Array.isArray(right)) {
    return areArraysEqual(left, right, nextStack);
  }

  if (left instanceof Map && right instanceof Map) {
    return areMapsEqual(left, right, nextStack);
  }

  if (left instanceof Set && right instanceof Set) {
    return areSetsEqual(left, right);
  }

  // Same prototype but an opaque built-in (e.g. a cross-realm Map).
  const tag = getTypeTag(left);
  if (tag === Tag.Map || tag === Tag.Set) return false;

  return areRecordsEqual(left, right, nextStack);
}

/**
 * Determines whether two values are structurally equal.
 *
 * Rules:
 * - Primitives and functions: `Object.is`.
 * - Arrays: same length, element-wise deep equality.
 * - Objects: same prototype, same own enumerable keys, values deep equal.
 * - Boxed primitives, `Date`, `RegExp`: by value.
 * - `Map`: same keys by identity, values deep equal. `Set`: same members by
 *   identity.
 * - Values with an `equals(other)` method (bundles included): delegated.
 * - Circular structures: a pair revisited on the current path counts as equal.
 *
 * @param left - The first value.
 * @param right - The second value.
 * @returns `true` if both values are structurally equal.
 */
export function isDeepEqual(left: unknown, right: unknown): boolean {
  return compare(left, right, activeStack);
}
