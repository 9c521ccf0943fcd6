import { type Arguments, argskwargs } from '../../arguments';

/**
 * Equality Input
 * Represents the input payload for an equality test.
 */
export type EqualityInput = {
  /**
   * The first value.
   */
  left: unknown;

  /**
   * The second value.
   */
  right: unknown;
};

/**
 * A class used to check prototype-sensitive comparisons.
 */
export class Point {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}
}

/**
 * Builds two distinct self-referencing objects with the same shape.
 */
export function buildCyclicPair(): EqualityInput {
  const left: Record<string, unknown> = { name: 'node' };
  left.self = left;

  const right: Record<string, unknown> = { name: 'node' };
  right.self = right;

  return { left, right };
}

/**
 * Builds two cyclic arrays whose non-cyclic members differ.
 */
export function buildDivergingCyclicPair(): EqualityInput {
  const left: unknown[] = [1];
  left.push(left);

  const right: unknown[] = [2];
  right.push(right);

  return { left, right };
}

/**
 * Builds two bundles that each hold an array holding the bundle itself, so
 * the cycle runs through `equals()`. `tail` is appended to each array.
 */
function buildBundleCycle(tail: unknown): Arguments {
  const members: unknown[] = [];
  const bundle = argskwargs([members]);
  members.push(bundle, tail);
  return bundle;
}

export function buildBundleCyclePair(): EqualityInput {
  return { left: buildBundleCycle('tail'), right: buildBundleCycle('tail') };
}

export function buildDivergingBundleCyclePair(): EqualityInput {
  return { left: buildBundleCycle(1), right: buildBundleCycle(2) };
}
