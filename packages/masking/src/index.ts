/**
 * @payroute/masking
 *
 * Secret container for sensitive payment and credential fields.
 *
 * @example
 * ```typescript
 * import { secret } from '@payroute/masking';
 *
 * const cvc = secret('123');
 * logger.info({ cvc }); // {"cvc":"[REDACTED]"}
 * cvc.expose(); // '123'
 * ```
 *
 * @packageDocumentation
 */

export { Secret, secret, isSecret, REDACTED } from './secret.js';

export { encodeWithSecrets, reveal } from './wire.js';
