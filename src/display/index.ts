import {
  Tag,
  getTypeTag,
  isContainer,
  isRichType,
  unbox
} from '../equality/utils';

/**
 * Protocol symbol for values that render themselves.
 *
 * A value with a `[represent](): string` method is rendered by that method
 * instead of the structural rules below. Bundles implement it.
 * Registered with `Symbol.for`, so separate copies of this module agree.
 */
export const represent: unique symbol = Symbol.for('argskwargs.represent');

/**
 * A value that renders itself.
 */
export type Representable = {
  [represent](): string;
};

/**
 * Matches keys that can be printed without quotes.
 */
const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

function isRepresentable(value: object): value is Representable {
  const method: unknown = Reflect.get(value, represent);
  return typeof method === 'function';
}

/**
 * Renders a record key: bare when it is an identifier, JSON-quoted otherwise.
 */
export function formatKey(key: string): string {
  return IDENTIFIER.test(key) ? key : JSON.stringify(key);
}

function formatNumber(value: number): string {
  // String(-0) is "0"; keep the sign visible.
  return Object.is(value, -0) ? '-0' : String(value);
}

function formatPrimitive(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      return formatNumber(value);
    case 'bigint':
      return `${value}n`;
    case 'symbol':
      return value.toString();
    default:
      return String(value);
  }
}

/**
 * Renders Date, RegExp and boxed primitives.
 */
function formatRichType(value: object): string {
  switch (getTypeTag(value)) {
    case Tag.Date: {
      const time = unbox<number>(value);
      return Number.isNaN(time) ? 'Invalid Date' : new Date(time).toISOString();
    }
    case Tag.RegExp:
      return value.toString();
    case Tag.Number:
      return `[Number: ${formatNumber(unbox<number>(value))}]`;
    case Tag.String:
      return `[String: ${JSON.stringify(unbox<string>(value))}]`;
    case Tag.Boolean:
      return `[Boolean: ${String(unbox<boolean>(value))}]`;
    case Tag.BigInt:
      return `[BigInt: ${String(unbox<bigint>(value))}n]`;
    case Tag.Symbol:
      return `[Symbol: ${unbox<symbol>(value).toString()}]`;
    default:
      return String(value);
  }
}

function formatFunction(value: Function): string {
  return value.name ? `[Function ${value.name}]` : '[Function (anonymous)]';
}

/**
 * Returns the class name of a non-plain object, or `undefined` for plain
 * objects and null-prototype objects.
 */
function getClassName(value: object): string | undefined {
  const prototype: unknown = Object.getPrototypeOf(value);
  if (prototype === null || prototype === Object.prototype) return undefined;
  const name = value.constructor?.name;
  return name || undefined;
}

/**
 * Containers on the path of the `[represent]()` call in progress.
 *
 * A self-rendering value calls back into {@link formatValue} for its own
 * members; those calls resume from this path instead of an empty one, so a
 * cycle that runs through a bundle still ends in `[Circular]`.
 * Restored after every call.
 */
let activePath: readonly object[] = [];

function renderSelf(value: Representable, path: readonly object[]): string {
  const previous = activePath;
  activePath = [...path, value];
  try {
    return value[represent]();
  } finally {
    activePath = previous;
  }
}

/**
 * The recursive renderer.
 *
 * `path` holds the containers currently being rendered; a value met again on
 * that path renders as `[Circular]`.
 */
function render(value: unknown, path: readonly object[]): string {
  if (!isContainer(value)) return formatPrimitive(value);

  if (path.includes(value)) return '[Circular]';
  if (isRepresentable(value)) return renderSelf(value, path);
  if (typeof value === 'function') return formatFunction(value);
  if (isRichType(value)) return formatRichType(value);

  const nextPath = [...path, value];
  const renderChild = (child: unknown) => render(child, nextPath);

  if (Array.isArray(value)) {
    return `[${value.map(renderChild).join(', ')}]`;
  }

  if (value instanceof Map) {
    const entries = Array.from(
      value,
      ([key, entry]) => `${renderChild(key)} => ${renderChild(entry)}`
    );
    return `Map(${value.size}) {${entries.join(', ')}}`;
  }

  if (value instanceof Set) {
    const members = Array.from(value, renderChild);
    return `Set(${value.size}) {${members.join(', ')}}`;
  }

  const body = Object.entries(value)
    .map(([key, entry]) => `${formatKey(key)}: ${renderChild(entry)}`)
    .join(', ');
  const className = getClassName(value);

  return className ? `${className} {${body}}` : `{${body}}`;
}

/**
 * Produces the canonical, deterministic rendering of a value.
 *
 * Used for display and logging only; there is no inverse parser.
 *
 * @example
 * ```ts
 * formatValue(['a', 1n, { b: null }]); // '["a", 1n, {b: null}]'
 * ```
 */
export function formatValue(value: unknown): string {
  return render(value, activePath);
}
