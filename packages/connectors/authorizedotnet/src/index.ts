/**
 * @payroute/connector-authorizedotnet
 *
 * Authorize.net connector (JSON API): every flow over the single
 * transaction endpoint, credentials carried in the request body.
 *
 * @packageDocumentation
 */

export {
  authorizedotnet,
  AuthorizedotnetAuthorize,
  AuthorizedotnetCapture,
  AuthorizedotnetPSync,
  AuthorizedotnetVoid,
  AuthorizedotnetRefundExecute,
  AuthorizedotnetRefundSync,
} from './authorizedotnet.js';

export {
  toMerchantAuthentication,
  createTransactionRequest,
  transactionDetailsRequest,
  majorUnits,
  toAuthorizeTransaction,
  toCaptureTransaction,
  toVoidTransaction,
  toRefundTransaction,
  attemptStatusForResponseCode,
  toErrorResponse,
  RESPONSE_CODES,
  TRANSACTION_STATUSES,
  REFUND_RESPONSE_STATUS_MAP,
  TRANSACTION_STATUS_MAP,
  REFUND_TRANSACTION_STATUS_MAP,
  TransactionResponseSchema,
  CreateTransactionResponseSchema,
  TransactionDetailsResponseSchema,
  ErrorBodySchema,
  type MerchantAuthentication,
  type TransactionType,
  type CreditCard,
  type TransactionRequest,
  type CreateTransactionRequest,
  type TransactionDetailsRequest,
  type AuthorizeInput,
  type CaptureInput,
  type RefundInput,
  type ResponseCode,
  type TransactionResponse,
  type CreateTransactionResponse,
  type TransactionStatus,
  type TransactionDetailsResponse,
  type PaymentResponseFlow,
} from './transformers.js';
