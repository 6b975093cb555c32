/**
 * Opayo (Pi REST API) wire format
 *
 * Field names and casing follow Opayo's published API; the request shapes
 * below are what Opayo accepts, not a convenience model.
 */
import { z } from 'zod';
import { ok, err, type Currency, type Result } from '@payroute/kernel';
import type { Secret } from '@payroute/masking';
import { failedToObtainAuthType, missingRequiredField, notImplemented, type ConnectorError } from '@payroute/errors';
import { requirePositiveMinorUnits, requireRefundAmount } from '@payroute/connectors-core';
import type {
  AttemptStatus,
  ConnectorAuthType,
  ErrorResponse,
  PaymentsAuthorizeRouterData,
  PaymentsCancelRouterData,
  PaymentsCaptureRouterData,
  RefundExecuteRouterData,
  RefundStatus,
} from '@payroute/domain';

// -----------------------------------------------------------------------------
// Auth
// -----------------------------------------------------------------------------

export interface OpayoAuthType {
  apiKey: Secret<string>;
}

/**
 * Opayo authenticates with a single key in the Authorization header.
 */
export function toOpayoAuthType(auth: ConnectorAuthType): Result<OpayoAuthType, ConnectorError> {
  if (auth.type !== 'header_key') {
    return err(failedToObtainAuthType());
  }
  return ok({ apiKey: auth.apiKey });
}

// -----------------------------------------------------------------------------
// Payments request
// -----------------------------------------------------------------------------

export type OpayoTransactionType = 'Payment' | 'Deferred' | 'Refund';

export type ChallengeWindowSize = 'Small' | 'Medium' | 'Large' | 'ExtraLarge' | 'FullScreen';

export interface OpayoCardSession {
  merchantSessionKey: Secret<string>;
  cardIdentifier: Secret<string>;
  reusable: boolean;
  save: boolean;
}

export interface OpayoBillingAddress {
  address1: Secret<string>;
  city: string;
  country: string;
  postalCode: Secret<string>;
}

export interface OpayoStrongCustomerAuthentication {
  notificationURL: string;
  browserIP: string;
  browserAcceptHeader: string;
  browserJavascriptEnabled: boolean;
  browserLanguage: string;
  browserUserAgent: string;
  challengeWindowSize: ChallengeWindowSize;
  transType: 'GoodsAndServicePurchase';
}

export interface OpayoPaymentsRequest {
  transactionType: OpayoTransactionType;
  paymentMethod: { card: OpayoCardSession };
  vendorTxCode: string;
  /** Minor units */
  amount: number;
  currency: Currency;
  description: string;
  customerFirstName: Secret<string>;
  customerLastName: Secret<string>;
  billingAddress: OpayoBillingAddress;
  apply3DSecure: 'UseMSPSetting';
  strongCustomerAuthentication: OpayoStrongCustomerAuthentication;
}

/**
 * Bucket a browser screen width into Opayo's 3DS challenge window sizes.
 * Upper bounds are inclusive.
 */
export function challengeWindowSize(screenWidth: number): ChallengeWindowSize {
  if (screenWidth <= 250) return 'Small';
  if (screenWidth <= 390) return 'Medium';
  if (screenWidth <= 500) return 'Large';
  if (screenWidth <= 600) return 'ExtraLarge';
  return 'FullScreen';
}

/**
 * Build the Opayo payment request.
 *
 * Required fields are checked in a fixed order and the first absent one is
 * named in the error; nothing is built until all are present. The card is
 * sent as the session key and card identifier issued by Opayo's hosted
 * tokenization, never as the card number.
 */
export function toOpayoPaymentsRequest(
  data: PaymentsAuthorizeRouterData
): Result<OpayoPaymentsRequest, ConnectorError> {
  const { request } = data;

  if (data.description === undefined) {
    return err(missingRequiredField('description'));
  }

  const method = request.paymentMethodData;
  if (method.type !== 'card') {
    return err(notImplemented(`payment method ${method.type}`));
  }
  const { merchantSessionKey, cardIdentifier } = method.card;
  if (!merchantSessionKey) return err(missingRequiredField('merchant_session_key'));
  if (!cardIdentifier) return err(missingRequiredField('card_identifier'));

  const browser = request.browserInfo;
  if (!browser) {
    return err(missingRequiredField('browser_info'));
  }
  if (data.returnUrl === undefined) {
    return err(missingRequiredField('notification_url'));
  }

  const address = data.address.billing?.address;
  if (!address) {
    return err(missingRequiredField('billing_address'));
  }
  if (!address.line1) return err(missingRequiredField('address1'));
  if (address.city === undefined) return err(missingRequiredField('city'));
  if (address.country === undefined) return err(missingRequiredField('country'));
  if (!address.zip) return err(missingRequiredField('zip'));
  if (browser.ipAddress === undefined) return err(missingRequiredField('browserIP'));
  if (!address.firstName) return err(missingRequiredField('first_name'));
  if (!address.lastName) return err(missingRequiredField('last_name'));

  const amount = requirePositiveMinorUnits('amount', request.amount);
  if (!amount.ok) {
    return amount;
  }

  const wire: OpayoPaymentsRequest = {
    transactionType: request.captureMethod === 'manual' ? 'Deferred' : 'Payment',
    paymentMethod: {
      card: {
        merchantSessionKey,
        cardIdentifier,
        reusable: false,
        save: false,
      },
    },
    vendorTxCode: request.idempotencyKey ?? data.paymentId,
    amount: amount.value,
    currency: request.currency,
    description: data.description,
    customerFirstName: address.firstName,
    customerLastName: address.lastName,
    billingAddress: {
      address1: address.line1,
      city: address.city,
      country: address.country,
      postalCode: address.zip,
    },
    apply3DSecure: 'UseMSPSetting',
    strongCustomerAuthentication: {
      notificationURL: data.returnUrl,
      browserIP: browser.ipAddress,
      browserAcceptHeader: browser.acceptHeader,
      browserJavascriptEnabled: browser.javaScriptEnabled,
      browserLanguage: browser.language,
      browserUserAgent: browser.userAgent,
      challengeWindowSize: challengeWindowSize(browser.screenWidth),
      transType: 'GoodsAndServicePurchase',
    },
  };
  return ok(wire);
}

// -----------------------------------------------------------------------------
// Instructions (capture, void)
// -----------------------------------------------------------------------------

export type OpayoInstructionType = 'release' | 'void';

export type OpayoInstructionRequest =
  | { instructionType: 'release'; amount: number }
  | { instructionType: 'void' };

/**
 * Release a deferred transaction, for the requested amount or in full
 */
export function toOpayoCaptureRequest(data: PaymentsCaptureRouterData): Result<OpayoInstructionRequest, ConnectorError> {
  const { amountToCapture } = data.request;
  const amount =
    amountToCapture === undefined
      ? requirePositiveMinorUnits('amount', data.amount)
      : requirePositiveMinorUnits('amount_to_capture', amountToCapture);
  if (!amount.ok) {
    return amount;
  }
  const wire: OpayoInstructionRequest = { instructionType: 'release', amount: amount.value };
  return ok(wire);
}

export function toOpayoVoidRequest(_data: PaymentsCancelRouterData): OpayoInstructionRequest {
  return { instructionType: 'void' };
}

// -----------------------------------------------------------------------------
// Refund request
// -----------------------------------------------------------------------------

export interface OpayoRefundRequest {
  transactionType: 'Refund';
  referenceTransactionId: string;
  vendorTxCode: string;
  amount: number;
  currency: Currency;
  description: string;
}

export function toOpayoRefundRequest(data: RefundExecuteRouterData): Result<OpayoRefundRequest, ConnectorError> {
  const description = data.request.reason ?? data.description;
  if (description === undefined) {
    return err(missingRequiredField('description'));
  }
  const amount = requireRefundAmount(data.request);
  if (!amount.ok) {
    return amount;
  }
  const wire: OpayoRefundRequest = {
    transactionType: 'Refund',
    referenceTransactionId: data.request.connectorTransactionId,
    vendorTxCode: data.request.refundId,
    amount: amount.value,
    currency: data.request.currency,
    description,
  };
  return ok(wire);
}

// -----------------------------------------------------------------------------
// Responses
// -----------------------------------------------------------------------------

export const OPAYO_PAYMENT_STATUSES = ['succeeded', 'failed', 'processing'] as const;
export type OpayoPaymentStatus = (typeof OPAYO_PAYMENT_STATUSES)[number];

export const PAYMENT_STATUS_MAP: Record<OpayoPaymentStatus, AttemptStatus> = {
  succeeded: 'charged',
  failed: 'failure',
  processing: 'authorizing',
};

export const OpayoPaymentsResponseSchema = z.object({
  id: z.string().min(1),
  status: z.enum(OPAYO_PAYMENT_STATUSES),
});
export type OpayoPaymentsResponse = z.infer<typeof OpayoPaymentsResponseSchema>;

export const OPAYO_INSTRUCTION_STATUS_MAP: Record<OpayoInstructionType, AttemptStatus> = {
  release: 'charged',
  void: 'voided',
};

export const OpayoInstructionResponseSchema = z.object({
  instructionType: z.enum(['release', 'void']),
  date: z.string().optional(),
});
export type OpayoInstructionResponse = z.infer<typeof OpayoInstructionResponseSchema>;

export const OPAYO_REFUND_STATUSES = ['Succeeded', 'Failed', 'Processing'] as const;
export type OpayoRefundStatus = (typeof OPAYO_REFUND_STATUSES)[number];

export const REFUND_STATUS_MAP: Record<OpayoRefundStatus, RefundStatus> = {
  Succeeded: 'success',
  Failed: 'failure',
  Processing: 'pending',
};

export const OpayoRefundResponseSchema = z.object({
  id: z.string().min(1),
  status: z.enum(OPAYO_REFUND_STATUSES),
});
export type OpayoRefundResponse = z.infer<typeof OpayoRefundResponseSchema>;

const ErrorCode = z.union([z.string(), z.number()]).transform(String);

const OpayoErrorEntry = z.object({
  code: ErrorCode,
  description: z.string(),
  property: z.string().optional(),
});

/**
 * Validation failures come back as a list; everything else as one entry.
 */
export const OpayoErrorResponseSchema = z.union([
  z.object({ errors: z.array(OpayoErrorEntry).min(1) }),
  OpayoErrorEntry,
]);
export type OpayoErrorResponse = z.infer<typeof OpayoErrorResponseSchema>;

export function toErrorResponse(body: OpayoErrorResponse, statusCode: number): ErrorResponse {
  const entry = 'errors' in body ? body.errors[0] : body;
  if (!entry) {
    return { code: 'unknown', message: 'Unknown Opayo error', statusCode };
  }
  return {
    code: entry.code,
    message: entry.description,
    reason: entry.property,
    statusCode,
  };
}
