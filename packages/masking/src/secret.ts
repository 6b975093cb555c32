/**
 * Secret container
 *
 * Wraps a sensitive value (card number, CVC, API key) so that no generic
 * formatting path can print it: string coercion, JSON serialization (what
 * pino uses) and Node's util.inspect all render the redaction marker.
 * The raw value comes back only through an explicit `expose()` call.
 */

export const REDACTED = '[REDACTED]';

const inspectSymbol = Symbol.for('nodejs.util.inspect.custom');

export class Secret<T> {
  readonly #value: T;

  constructor(value: T) {
    this.#value = value;
    Object.freeze(this);
  }

  /**
   * Return the wrapped value. Every call site is a deliberate disclosure.
   */
  expose(): T {
    return this.#value;
  }

  /**
   * Derive another secret without exposing the value at the call site.
   */
  map<U>(fn: (value: T) => U): Secret<U> {
    return new Secret(fn(this.#value));
  }

  /**
   * Compare wrapped values. Only ever yields a boolean.
   */
  equals(other: Secret<T>): boolean {
    return Object.is(this.#value, other.#value);
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspectSymbol](): string {
    return `Secret(${REDACTED})`;
  }
}

export function secret<T>(value: T): Secret<T> {
  return new Secret(value);
}

export function isSecret(value: unknown): value is Secret<unknown> {
  return value instanceof Secret;
}
