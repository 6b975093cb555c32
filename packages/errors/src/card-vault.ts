/**
 * Card vault errors
 *
 * Raised while saving or fetching tokenized card details from the vault
 * that sits beside the router.
 */

export type CardVaultErrorCode =
  | 'save_card_failed'
  | 'fetch_card_failed'
  | 'request_encoding_failed'
  | 'response_deserialization_failed'
  | 'payment_method_creation_failed'
  | 'missing_required_field'
  | 'unexpected_response_error';

export interface CardVaultErrorDetails {
  /** Field the vault request lacked (missing_required_field) */
  fieldName?: string;
  /** Raw vault body (unexpected_response_error) */
  body?: string;
}

function messageFor(code: CardVaultErrorCode, details: CardVaultErrorDetails): string {
  switch (code) {
    case 'save_card_failed':
      return 'Failed to save card in card vault';
    case 'fetch_card_failed':
      return 'Failed to fetch card details from card vault';
    case 'request_encoding_failed':
      return 'Failed to encode card vault request';
    case 'response_deserialization_failed':
      return 'Failed to deserialize card vault response';
    case 'payment_method_creation_failed':
      return 'Failed to create payment method';
    case 'missing_required_field':
      return `Missing required field: ${details.fieldName ?? '<unknown>'}`;
    case 'unexpected_response_error':
      return 'The card vault returned an unexpected response';
  }
}

export class CardVaultError extends Error {
  readonly layer = 'card_vault';
  readonly code: CardVaultErrorCode;
  readonly fieldName?: string;
  readonly body?: string;

  constructor(code: CardVaultErrorCode, details: CardVaultErrorDetails = {}, options?: ErrorOptions) {
    super(messageFor(code, details), options);
    this.name = 'CardVaultError';
    this.code = code;
    this.fieldName = details.fieldName;
    this.body = details.body;
  }
}
