/**
 * Any non-null object or function: something compared by structure or by
 * delegation rather than by `Object.is` alone.
 */
export type Container = object;

/**
 * A record of a specific pair of containers being compared at a specific
 * depth in the recursion stack.
 *
 * Used to detect when the traversal loops back to a pair that is already
 * being compared on the current path.
 */
export type CycleEntry = readonly [left: Container, right: Container];

/**
 * A value that defines its own notion of equality.
 *
 * Bundles implement this, so nested bundles compare structurally.
 */
export type SelfComparable = {
  equals(other: unknown): boolean;
};
