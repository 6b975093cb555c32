/**
 * Authorize.net JSON API wire format
 *
 * Every call is a POST of one named request object to the same endpoint.
 * Amounts travel as major-unit decimal strings, and the gateway answers
 * HTTP 200 for declines and errors alike; the outcome is in the body.
 */
import { z } from 'zod';
import { ok, err, chain, toMajorUnitString, type Currency, type Result } from '@payroute/kernel';
import type { Secret } from '@payroute/masking';
import {
  failedToObtainAuthType,
  notImplemented,
  requestEncodingFailed,
  type ConnectorError,
} from '@payroute/errors';
import { requirePositiveMinorUnits, requireRefundAmount } from '@payroute/connectors-core';
import type {
  AttemptStatus,
  CaptureMethod,
  ConnectorAuthType,
  ErrorResponse,
  PaymentMethodData,
  RefundStatus,
} from '@payroute/domain';

// -----------------------------------------------------------------------------
// Auth
// -----------------------------------------------------------------------------

export interface MerchantAuthentication {
  name: Secret<string>;
  transactionKey: Secret<string>;
}

/**
 * Authorize.net credentials travel in the body: API login ID and
 * transaction key.
 */
export function toMerchantAuthentication(auth: ConnectorAuthType): Result<MerchantAuthentication, ConnectorError> {
  if (auth.type !== 'body_key') {
    return err(failedToObtainAuthType());
  }
  return ok({ name: auth.apiKey, transactionKey: auth.key1 });
}

// -----------------------------------------------------------------------------
// Requests
// -----------------------------------------------------------------------------

export type TransactionType =
  | 'authCaptureTransaction'
  | 'authOnlyTransaction'
  | 'priorAuthCaptureTransaction'
  | 'voidTransaction'
  | 'refundTransaction';

export interface CreditCard {
  cardNumber: Secret<string>;
  /** `YYYY-MM`, or `XXXX` when referencing a settled card for a refund */
  expirationDate: Secret<string> | 'XXXX';
  cardCode?: Secret<string>;
}

export interface TransactionRequest {
  transactionType: TransactionType;
  amount?: string;
  currencyCode?: Currency;
  payment?: { creditCard: CreditCard };
  refTransId?: string;
}

export interface CreateTransactionRequest {
  createTransactionRequest: {
    merchantAuthentication: MerchantAuthentication;
    refId?: string;
    transactionRequest: TransactionRequest;
  };
}

export interface TransactionDetailsRequest {
  getTransactionDetailsRequest: {
    merchantAuthentication: MerchantAuthentication;
    transId: string;
  };
}

/** refId is limited to 20 characters */
const REF_ID_MAX_LENGTH = 20;

export function createTransactionRequest(
  merchantAuthentication: MerchantAuthentication,
  transactionRequest: TransactionRequest,
  refId?: string
): CreateTransactionRequest {
  return {
    createTransactionRequest: {
      merchantAuthentication,
      refId: refId?.slice(0, REF_ID_MAX_LENGTH),
      transactionRequest,
    },
  };
}

export function transactionDetailsRequest(
  merchantAuthentication: MerchantAuthentication,
  transId: string
): TransactionDetailsRequest {
  return { getTransactionDetailsRequest: { merchantAuthentication, transId } };
}

export function majorUnits(amount: number, currency: Currency): Result<string, ConnectorError> {
  try {
    return ok(toMajorUnitString(amount, currency));
  } catch (error) {
    return err(requestEncodingFailed(error));
  }
}

function creditCard(method: PaymentMethodData): Result<CreditCard, ConnectorError> {
  if (method.type !== 'card') {
    return err(notImplemented(`payment method ${method.type}`));
  }
  const { card } = method;
  const month = card.cardExpMonth.expose().padStart(2, '0');
  return ok({
    cardNumber: card.cardNumber,
    expirationDate: card.cardExpYear.map((year) => `${year.length === 2 ? `20${year}` : year}-${month}`),
    cardCode: card.cardCvc,
  });
}

export interface AuthorizeInput {
  paymentMethodData: PaymentMethodData;
  amount: number;
  currency: Currency;
  captureMethod?: CaptureMethod;
}

export function toAuthorizeTransaction(input: AuthorizeInput): Result<TransactionRequest, ConnectorError> {
  const card = creditCard(input.paymentMethodData);
  if (!card.ok) {
    return card;
  }
  const amount = chain(requirePositiveMinorUnits('amount', input.amount), (minor) =>
    majorUnits(minor, input.currency)
  );
  if (!amount.ok) {
    return amount;
  }
  return ok({
    transactionType: input.captureMethod === 'manual' ? 'authOnlyTransaction' : 'authCaptureTransaction',
    amount: amount.value,
    currencyCode: input.currency,
    payment: { creditCard: card.value },
  });
}

export interface CaptureInput {
  refTransId: string;
  /** Partial capture amount; the whole authorization when absent */
  amountToCapture?: number;
  paymentAmount: number;
  currency: Currency;
}

export function toCaptureTransaction(input: CaptureInput): Result<TransactionRequest, ConnectorError> {
  const { refTransId, amountToCapture, currency } = input;
  const amount =
    amountToCapture === undefined
      ? requirePositiveMinorUnits('amount', input.paymentAmount)
      : requirePositiveMinorUnits('amount_to_capture', amountToCapture);
  const major = chain(amount, (minor) => majorUnits(minor, currency));
  if (!major.ok) {
    return major;
  }
  return ok({ transactionType: 'priorAuthCaptureTransaction', amount: major.value, refTransId });
}

export function toVoidTransaction(refTransId: string): TransactionRequest {
  return { transactionType: 'voidTransaction', refTransId };
}

export interface RefundInput {
  paymentMethodData: PaymentMethodData;
  refTransId: string;
  refundAmount: number;
  paymentAmount: number;
  currency: Currency;
}

/**
 * Refunds reference the settled card by its last four digits only.
 */
export function toRefundTransaction(input: RefundInput): Result<TransactionRequest, ConnectorError> {
  const method = input.paymentMethodData;
  if (method.type !== 'card') {
    return err(notImplemented(`payment method ${method.type}`));
  }
  const amount = chain(requireRefundAmount(input), (minor) => majorUnits(minor, input.currency));
  if (!amount.ok) {
    return amount;
  }
  return ok({
    transactionType: 'refundTransaction',
    amount: amount.value,
    currencyCode: input.currency,
    payment: {
      creditCard: {
        cardNumber: method.card.cardNumber.map((number) => number.slice(-4)),
        expirationDate: 'XXXX',
      },
    },
    refTransId: input.refTransId,
  });
}

// -----------------------------------------------------------------------------
// Responses
// -----------------------------------------------------------------------------

const ResponseMessages = z.object({
  resultCode: z.enum(['Ok', 'Error']),
  message: z.array(z.object({ code: z.string(), text: z.string() })),
});

export const RESPONSE_CODES = ['1', '2', '3', '4'] as const;
export type ResponseCode = (typeof RESPONSE_CODES)[number];

export const TransactionResponseSchema = z.object({
  responseCode: z.enum(RESPONSE_CODES),
  transId: z.string(),
  authCode: z.string().optional(),
  accountNumber: z.string().optional(),
  messages: z.array(z.object({ code: z.string(), description: z.string() })).optional(),
  errors: z.array(z.object({ errorCode: z.string(), errorText: z.string() })).optional(),
});
export type TransactionResponse = z.infer<typeof TransactionResponseSchema>;

/**
 * `transactionResponse` is absent when the request itself was refused
 * (bad credentials, malformed request).
 */
export const CreateTransactionResponseSchema = z.object({
  transactionResponse: TransactionResponseSchema.optional(),
  refId: z.string().optional(),
  messages: ResponseMessages,
});
export type CreateTransactionResponse = z.infer<typeof CreateTransactionResponseSchema>;

export const TRANSACTION_STATUSES = [
  'authorizedPendingCapture',
  'capturedPendingSettlement',
  'communicationError',
  'refundSettledSuccessfully',
  'refundPendingSettlement',
  'approvedReview',
  'declined',
  'couldNotVoid',
  'expired',
  'generalError',
  'failedReview',
  'settledSuccessfully',
  'settlementError',
  'underReview',
  'voided',
  'FDSPendingReview',
  'FDSAuthorizedPendingReview',
  'returnedItem',
] as const;
export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];

export const TransactionDetailsResponseSchema = z.object({
  transaction: z
    .object({
      transId: z.string(),
      transactionStatus: z.enum(TRANSACTION_STATUSES),
    })
    .optional(),
  messages: ResponseMessages,
});
export type TransactionDetailsResponse = z.infer<typeof TransactionDetailsResponseSchema>;

export const ErrorBodySchema = z.object({ messages: ResponseMessages });

export type PaymentResponseFlow = 'authorize' | 'capture' | 'void';

/**
 * Attempt status for a createTransaction response code. What "approved"
 * means depends on the flow and, for authorize, on the capture method.
 */
export function attemptStatusForResponseCode(
  code: ResponseCode,
  flow: PaymentResponseFlow,
  captureMethod?: CaptureMethod
): AttemptStatus {
  switch (code) {
    case '1':
      if (flow === 'void') return 'voided';
      if (flow === 'capture') return 'charged';
      return captureMethod === 'manual' ? 'authorized' : 'charged';
    case '2':
    case '3':
      return 'failure';
    case '4':
      return 'pending';
  }
}

export const REFUND_RESPONSE_STATUS_MAP: Record<ResponseCode, RefundStatus> = {
  '1': 'success',
  '2': 'failure',
  '3': 'failure',
  '4': 'pending',
};

export const TRANSACTION_STATUS_MAP: Record<TransactionStatus, AttemptStatus> = {
  authorizedPendingCapture: 'authorized',
  capturedPendingSettlement: 'charged',
  settledSuccessfully: 'charged',
  refundSettledSuccessfully: 'charged',
  refundPendingSettlement: 'charged',
  approvedReview: 'pending',
  underReview: 'pending',
  FDSPendingReview: 'pending',
  FDSAuthorizedPendingReview: 'pending',
  voided: 'voided',
  couldNotVoid: 'void_failed',
  declined: 'failure',
  expired: 'failure',
  generalError: 'failure',
  failedReview: 'failure',
  settlementError: 'failure',
  communicationError: 'failure',
  returnedItem: 'failure',
};

export const REFUND_TRANSACTION_STATUS_MAP: Record<TransactionStatus, RefundStatus> = {
  refundSettledSuccessfully: 'success',
  settledSuccessfully: 'success',
  refundPendingSettlement: 'pending',
  capturedPendingSettlement: 'pending',
  authorizedPendingCapture: 'pending',
  approvedReview: 'manual_review',
  underReview: 'manual_review',
  FDSPendingReview: 'manual_review',
  FDSAuthorizedPendingReview: 'manual_review',
  voided: 'failure',
  couldNotVoid: 'failure',
  declined: 'failure',
  expired: 'failure',
  generalError: 'failure',
  failedReview: 'failure',
  settlementError: 'failure',
  communicationError: 'failure',
  returnedItem: 'failure',
};

/**
 * Structured error for a non-approved transaction or a refused request.
 * Transaction-level errors are more specific than the envelope messages.
 */
export function toErrorResponse(
  messages: z.infer<typeof ResponseMessages>,
  transaction: TransactionResponse | undefined,
  statusCode: number
): ErrorResponse {
  const transactionError = transaction?.errors?.[0];
  if (transactionError) {
    return {
      code: transactionError.errorCode,
      message: transactionError.errorText,
      reason: messages.message[0]?.text,
      statusCode,
    };
  }
  const message = messages.message[0];
  return {
    code: message?.code ?? 'unknown',
    message: message?.text ?? 'Unknown Authorize.net error',
    statusCode,
  };
}
