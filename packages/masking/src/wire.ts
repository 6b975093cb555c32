import { Secret } from './secret.js';

/**
 * JSON-encode a connector payload, disclosing secret fields.
 *
 * `JSON.stringify` applies `toJSON` before a replacer sees the value, so
 * the replacer reads the raw field back from its holder. This is the one
 * place secrets leave their container on the way to a connector.
 */
export function encodeWithSecrets(payload: unknown): string {
  return JSON.stringify(payload, function reveal(this: unknown, key: string, value: unknown) {
    if (typeof this !== 'object' || this === null) {
      return value;
    }
    const raw: unknown = Reflect.get(this, key);
    return raw instanceof Secret ? raw.expose() : value;
  });
}

/**
 * Expose a header or field value that may or may not be secret
 */
export function reveal(value: string | Secret<string>): string {
  return value instanceof Secret ? value.expose() : value;
}
