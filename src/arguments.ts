import { formatValue, represent } from './display';
import { isDeepEqual } from './equality';
import { ArgumentsStateError, ConstructionDeniedError } from './errors';
import { describeValue, hasExtras, isArgumentsState } from './guards';
import { concatPositionals, freeze, mergeNamed } from './merge';
import { type PartialFunction, partial } from './partial';
import type {
  ArgumentsState,
  MergeNamed,
  Named,
  NoNamed,
  Positionals,
  Target
} from './types';

/**
 * Construction gate.
 *
 * Open only while `construct()` runs; the constructor refuses to run when it
 * is closed. Together with the `private` constructor this leaves
 * `argskwargs()`, `extend()` and `Arguments.fromState()` as the only ways to
 * obtain a bundle.
 */
let constructing = false;

function construct<T>(build: () => T): T {
  constructing = true;
  try {
    return build();
  } finally {
    constructing = false;
  }
}

/**
 * Constructor access for the free `argskwargs()` factory, assigned in the
 * class's static block (the only place outside the class body that may reach
 * the private constructor).
 */
let instantiate: (positionals: Positionals, named: Named) => Arguments;

/**
 * Node's `util.inspect` hook, so `console.log(bundle)` prints the display form.
 */
const inspectCustom: unique symbol = Symbol.for('nodejs.util.inspect.custom');

const toCodePoint = (char: string): number => char.codePointAt(0) ?? 0;

/**
 * Orders keys by Unicode code point. `<` compares UTF-16 code units, which puts
 * astral characters before U+E000..U+FFFF.
 */
function compareKeys(left: string, right: string): number {
  const leftPoints = Array.from(left, toCodePoint);
  const rightPoints = Array.from(right, toCodePoint);
  const length = Math.min(leftPoints.length, rightPoints.length);

  for (let index = 0; index < length; index++) {
    const delta = leftPoints[index] - rightPoints[index];
    if (delta !== 0) return delta;
  }
  return leftPoints.length - rightPoints.length;
}

/**
 * Call signature of a bundle: `bundle(target)` is `bundle.apply(target)`.
 */
export interface Arguments<
  P extends Positionals = Positionals,
  N extends Named = Named
> {
  <R>(target: Target<[...P, N], R>): R;
}

/**
 * An immutable set of arguments: ordered positional values plus a record of
 * named values, applied later against any target.
 *
 * Calling convention:
 * A target receives the positional values followed by the named record as its
 * final argument: `target(...positionals, named)`.
 *
 * Immutability:
 * Both containers and the bundle itself are frozen. Operations that "change"
 * a bundle return a new one; copying returns the same instance.
 *
 * Instances are created by {@link argskwargs} only.
 *
 * @template P - Tuple type of the positional values.
 * @template N - Record type of the named values.
 */
export class Arguments<
  P extends Positionals = Positionals,
  N extends Named = Named
> {
  /**
   * The stored positional values, in order.
   */
  declare readonly positionals: P;

  /**
   * The stored named values.
   */
  declare readonly named: N;

  static {
    // Bundles are functions; keep `bind`/`call` (and `instanceof Function`)
    // working on them.
    Object.setPrototypeOf(Arguments.prototype, Function.prototype);

    instantiate = (positionals, named) =>
      construct(() => new Arguments(positionals, named));
  }

  /**
   * Builds the callable instance.
   *
   * The returned object is an arrow function re-parented onto
   * `Arguments.prototype`, carrying the two containers as frozen own
   * properties. The containers are adopted, not copied: callers hand in fresh
   * ones.
   */
  private constructor(positionals: P, named: N) {
    if (!constructing) throw new ConstructionDeniedError();

    const invoke = <R>(target: Target<[...P, N], R>): R =>
      bundle.apply(target);

    const bundle: Arguments<P, N> = Object.setPrototypeOf(
      invoke,
      Arguments.prototype
    );

    Object.defineProperties(bundle, {
      positionals: { value: freeze(positionals), enumerable: true },
      named: { value: freeze(named), enumerable: true }
    });

    return freeze(bundle);
  }

  /**
   * Rebuilds a bundle from the output of {@link Arguments.getState} (or its
   * JSON round trip).
   *
   * This is the reconstruction path: it bypasses the public factory. The
   * state's containers are copied.
   *
   * @throws {ArgumentsStateError} If `state` is not `[array, plain object]`.
   */
  static fromState(state: unknown): Arguments {
    if (!isArgumentsState(state)) {
      throw new ArgumentsStateError(describeValue(state));
    }

    const [positionals, named] = state;
    return construct(() => new Arguments([...positionals], { ...named }));
  }

  /**
   * Invokes `target` with the stored arguments, merged with any extras.
   *
   * Merge rules:
   * - Positional values: stored first, then `positionals`.
   * - Named values: `named` wins on key collision.
   *
   * Zero-copy path:
   * With no extras (omitted, or both empty), the stored named record itself is
   * passed to `target`; no merged containers are built.
   *
   * On every path the named record `target` receives is frozen.
   *
   * Whatever `target` throws propagates unchanged.
   */
  apply<R>(target: Target<[...P, N], R>): R;
  apply<const P2 extends Positionals, R>(
    target: Target<[...P, ...P2, N], R>,
    positionals: P2
  ): R;
  apply<const P2 extends Positionals, N2 extends Named, R>(
    target: Target<[...P, ...P2, MergeNamed<N, N2>], R>,
    positionals: P2,
    named: N2
  ): R;
  apply(
    target: Target<unknown[], unknown>,
    positionals?: Positionals,
    named?: Named
  ): unknown {
    if (!hasExtras(positionals, named)) {
      return target(...this.positionals, this.named);
    }

    return target(
      ...concatPositionals(this.positionals, positionals),
      freeze(mergeNamed(this.named, named))
    );
  }

  /**
   * Like {@link Arguments.apply}, but returns a {@link PartialFunction}
   * instead of calling `target`.
   */
  toPartial<R, Rest extends unknown[] = []>(
    target: Target<[...P, ...Rest, N], R>
  ): PartialFunction<Rest, R, N>;
  toPartial<const P2 extends Positionals, R, Rest extends unknown[] = []>(
    target: Target<[...P, ...P2, ...Rest, N], R>,
    positionals: P2
  ): PartialFunction<Rest, R, N>;
  toPartial<
    const P2 extends Positionals,
    N2 extends Named,
    R,
    Rest extends unknown[] = []
  >(
    target: Target<[...P, ...P2, ...Rest, MergeNamed<N, N2>], R>,
    positionals: P2,
    named: N2
  ): PartialFunction<Rest, R, MergeNamed<N, N2>>;
  toPartial(
    target: Target<unknown[], unknown>,
    positionals?: Positionals,
    named?: Named
  ): PartialFunction<unknown[], unknown> {
    return partial<Positionals, Named, unknown[], unknown>(
      target,
      this.merge(positionals, named)
    );
  }

  /**
   * Returns a bundle with extra arguments merged in (same rules as
   * {@link Arguments.apply}).
   *
   * With no extras, returns this very instance.
   */
  extend(): this;
  extend<const P2 extends Positionals>(
    positionals: P2
  ): Arguments<[...P, ...P2], N>;
  extend<const P2 extends Positionals, N2 extends Named>(
    positionals: P2,
    named: N2
  ): Arguments<[...P, ...P2], MergeNamed<N, N2>>;
  extend(positionals?: Positionals, named?: Named): Arguments {
    return this.merge(positionals, named);
  }

  private merge(positionals?: Positionals, named?: Named): Arguments {
    if (!hasExtras(positionals, named)) return this;

    return instantiate(
      concatPositionals(this.positionals, positionals),
      mergeNamed(this.named, named)
    );
  }

  /**
   * Structural equality: same positional values in the same order and the
   * same named entries, compared with {@link isDeepEqual}.
   * A bundle never equals a non-bundle.
   */
  equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof Arguments)) return false;

    return (
      isDeepEqual(this.positionals, other.positionals) &&
      isDeepEqual(this.named, other.named)
    );
  }

  /**
   * The two stored containers, for destructuring:
   * `const [positionals, named] = bundle.toPair()`.
   */
  toPair(): ArgumentsState<P, N> {
    return [this.positionals, this.named];
  }

  /**
   * Yields the positional values, then the named record. Exactly two items:
   * a bundle is not an iterable of individual arguments.
   */
  *[Symbol.iterator](): Generator<P | N, void, undefined> {
    yield this.positionals;
    yield this.named;
  }

  getState(): ArgumentsState<P, N> {
    return this.toPair();
  }

  /**
   * `JSON.stringify(bundle)` serializes the state:
   * `[[...positionals], {...named}]`.
   */
  toJSON(): ArgumentsState<P, N> {
    return this.getState();
  }

  /**
   * Copying an immutable value is a no-op.
   */
  clone(): this {
    return this;
  }

  /**
   * `argskwargs(<positional reprs>, <key>=<repr>...)`, named entries sorted
   * by key code point. A value that leads back to this bundle renders as
   * `[Circular]`.
   *
   * @example
   * ```ts
   * String(argskwargs([2, 1], { b: 2, a: 1 })); // 'argskwargs(2, 1, a=1, b=2)'
   * ```
   */
  toString(): string {
    return formatValue(this);
  }

  [represent](): string {
    const positionalChunks = this.positionals.map(value => formatValue(value));
    const namedChunks = Object.entries(this.named)
      .sort(([left], [right]) => compareKeys(left, right))
      .map(([key, value]) => `${key}=${formatValue(value)}`);

    return `argskwargs(${[...positionalChunks, ...namedChunks].join(', ')})`;
  }

  [inspectCustom](): string {
    return this.toString();
  }
}

/**
 * Creates a bundle holding the given positional and named values.
 *
 * The given containers are copied; the values themselves are stored as-is,
 * without validation or coercion.
 *
 * @example
 * ```ts
 * const bundle = argskwargs([1, 2], { verbose: true });
 *
 * bundle((a, b, { verbose }) => (verbose ? a + b : 0)); // 3
 * bundle.extend([3], { verbose: false }).toString();
 * // 'argskwargs(1, 2, 3, verbose=false)'
 * ```
 */
export function argskwargs(): Arguments<[], NoNamed>;
export function argskwargs<const P extends Positionals>(
  positionals: P
): Arguments<P, NoNamed>;
export function argskwargs<const P extends Positionals, N extends Named>(
  positionals: P,
  named: N
): Arguments<P, N>;
export function argskwargs(
  positionals: Positionals = [],
  named: Named = {}
): Arguments {
  return instantiate([...positionals], { ...named });
}
