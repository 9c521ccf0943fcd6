/**
 * The structural constraint for the positional half of a bundle.
 *
 * Role: Input Constraint.
 * Readonly so that `const` tuple inference (`argskwargs([1, 'a'])` becomes
 * `readonly [1, 'a']`) and plain mutable arrays are both accepted.
 */
export type Positionals = readonly unknown[];

/**
 * The structural constraint for the named half of a bundle.
 *
 * Role: Input Constraint.
 * Aliased to `object` to serve as the generic lower bound, ensuring strict
 * compatibility with both TypeScript Interfaces and Type Aliases: an interface
 * has no implicit index signature and would be rejected by
 * `Record<string, unknown>`.
 */
export type Named = object;

/**
 * The named half of a bundle created without named values.
 *
 * `Record<never, never>` rather than `Record<string, never>`: intersecting the
 * latter with `{ b: number }` would collapse `b` to `never`.
 */
export type NoNamed = Record<never, never>;

/**
 * Any function that can receive a bundle.
 *
 * Calling convention: positional values first, the named record always last.
 *
 * @example
 * ```ts
 * // Target<[1, 2, { a: number }], string>
 * const target = (x: number, y: number, { a }: { a: number }) => `${x + y + a}`;
 * ```
 *
 * @template A - The complete argument list, named record included.
 * @template R - The return type.
 */
export type Target<A extends unknown[], R> = (...args: A) => R;

/**
 * The decomposed form of a bundle used for persistence and transport.
 *
 * Produced by `getState()` / `toJSON()` and consumed by
 * `Arguments.fromState()`.
 */
export type ArgumentsState<
  P extends Positionals = Positionals,
  N extends Named = Named
> = readonly [positionals: P, named: N];
