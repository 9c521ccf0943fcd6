/**
 * Target that returns the exact argument list it was called with.
 */
export function collect(...args: unknown[]): unknown[] {
  return args;
}

/**
 * A call observed by a {@link createSpyTarget} target.
 */
export type ObservedCall = {
  /**
   * Every argument except the last.
   */
  positionals: unknown[];

  /**
   * The final argument (the named record under the calling convention).
   */
  named: unknown;
};

/**
 * Creates a target that records each call and returns `result`.
 */
export function createSpyTarget<R>(result: R) {
  const calls: ObservedCall[] = [];

  const target = (...args: unknown[]): R => {
    calls.push({ positionals: args.slice(0, -1), named: args.at(-1) });
    return result;
  };

  return { target, calls };
}
