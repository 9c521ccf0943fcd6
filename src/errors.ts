/**
 * Thrown when the `Arguments` constructor runs outside the factory
 * (`argskwargs()`) and the reconstruction path (`Arguments.fromState()`).
 *
 * Covers `new`, `Reflect.construct` and subclassing from plain JavaScript,
 * where the type-level `private` modifier does not apply.
 */
export class ConstructionDeniedError extends Error {
  constructor() {
    super('Use the argskwargs() function to create instances of Arguments.');
    this.name = 'ConstructionDeniedError';
  }
}

/**
 * Thrown by `Arguments.fromState()` for a value that is not a
 * `[positionals, named]` pair.
 */
export class ArgumentsStateError extends Error {
  constructor(received: string) {
    super(
      `Invalid arguments state. Expected [positionals: array, named: plain object], but received ${received}.`
    );
    this.name = 'ArgumentsStateError';
  }
}
