/**
 * Single-purpose errors raised outside connector integrations
 */

export class ParsingError extends Error {
  readonly layer = 'parsing';
  readonly code = 'parsing_failed';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ParsingError';
  }
}

export type ValidationErrorCode = 'missing_required_field' | 'incorrect_value_provided';

export class ValidationError extends Error {
  readonly layer = 'validation';
  readonly code: ValidationErrorCode;
  readonly fieldName: string;

  constructor(code: ValidationErrorCode, fieldName: string, options?: ErrorOptions) {
    super(
      code === 'missing_required_field'
        ? `Missing required field: ${fieldName}`
        : `Incorrect value provided for field: ${fieldName}`,
      options
    );
    this.name = 'ValidationError';
    this.code = code;
    this.fieldName = fieldName;
  }
}

export class EncryptionError extends Error {
  readonly layer = 'encryption';
  readonly code = 'encryption_failed';

  constructor(message = 'Encryption error', options?: ErrorOptions) {
    super(message, options);
    this.name = 'EncryptionError';
  }
}

export type CryptoErrorCode =
  | 'encoding_failed'
  | 'decoding_failed'
  | 'message_signing_failed'
  | 'signature_verification_failed';

const CRYPTO_MESSAGES: Record<CryptoErrorCode, string> = {
  encoding_failed: 'Failed to encode given message',
  decoding_failed: 'Failed to decode given message',
  message_signing_failed: 'Failed to sign message',
  signature_verification_failed: 'Failed to verify signature',
};

export class CryptoError extends Error {
  readonly layer = 'crypto';
  readonly code: CryptoErrorCode;

  constructor(code: CryptoErrorCode, options?: ErrorOptions) {
    super(CRYPTO_MESSAGES[code], options);
    this.name = 'CryptoError';
    this.code = code;
  }
}

export class AuthenticationError extends Error {
  readonly layer = 'authentication';
  readonly code = 'authentication_failed';

  constructor(message = 'Authentication error', options?: ErrorOptions) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

export class AuthorisationError extends Error {
  readonly layer = 'authorisation';
  readonly code = 'authorisation_failed';

  constructor(message = 'Authorisation error', options?: ErrorOptions) {
    super(message, options);
    this.name = 'AuthorisationError';
  }
}

export class UnexpectedError extends Error {
  readonly layer = 'unexpected';
  readonly code = 'unexpected';

  constructor(message = 'Unexpected error', options?: ErrorOptions) {
    super(message, options);
    this.name = 'UnexpectedError';
  }
}
