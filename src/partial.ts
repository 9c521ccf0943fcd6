import type { Arguments } from './arguments';
import { hasExtras } from './guards';
import { freeze } from './merge';
import type { Named, Positionals, Target } from './types';

/**
 * A target pre-bound to a bundle.
 *
 * Calling it with further positional values `(...rest)` calls
 * `target(...bundle.positionals, ...rest, bundle.named)`.
 *
 * It is an ordinary (frozen) function, so `Function.prototype.bind` keeps
 * working on it for further positional currying.
 *
 * Named values at call time go through {@link PartialFunction.with}.
 *
 * @template Rest - Positional values still expected at call time.
 * @template R - The target's return type.
 * @template N - The bound named record.
 */
export interface PartialFunction<
  Rest extends unknown[],
  R,
  N extends Named = Named
> {
  (...rest: Rest): R;

  /**
   * Calls the target with further positional values and named values merged
   * over the bound ones (the call-time value wins on collision).
   *
   * `deferred.with(rest, {})` is `deferred(...rest)`; the target receives the
   * bound record itself. Otherwise it receives a frozen merged record.
   */
  with(rest: Rest, named: Partial<N>): R;

  /**
   * The wrapped target, exposed for introspection.
   */
  readonly target: (...args: never) => R;

  /**
   * The bundle whose values are applied on every call.
   */
  readonly bundle: Arguments;
}

/**
 * Binds `target` to the values of `bundle` without calling it.
 *
 * The bundle is read on every call; since bundles are immutable, the deferred
 * call always sees the values it was created with.
 *
 * @example
 * ```ts
 * const greet = (greeting: string, name: string, { punctuation }: { punctuation: string }) =>
 *   `${greeting}, ${name}${punctuation}`;
 *
 * const hello = partial(greet, argskwargs(['Hello'], { punctuation: '!' }));
 * hello('Ada'); // 'Hello, Ada!'
 * ```
 */
export function partial<
  P extends Positionals,
  N extends Named,
  Rest extends unknown[],
  R
>(
  target: Target<[...P, ...Rest, N], R>,
  bundle: Arguments<P, N>
): PartialFunction<Rest, R, N> {
  const deferred = (...rest: Rest): R =>
    target(...bundle.positionals, ...rest, bundle.named);

  const withNamed = (rest: Rest, named: Partial<N> & Named): R => {
    if (!hasExtras(undefined, named)) return deferred(...rest);

    return target(
      ...bundle.positionals,
      ...rest,
      freeze({ ...bundle.named, ...named })
    );
  };

  return Object.freeze(
    Object.assign(deferred, { target, bundle, with: withNamed })
  );
}
