import type { Currency, Result } from '@payroute/kernel';
import type { PaymentAddress } from './address.js';
import type { ConnectorAuthType } from './auth.js';
import type { BrowserInformation } from './browser.js';
import type {
  AttemptStatus,
  AuthenticationType,
  CaptureMethod,
  PaymentMethodType,
  RefundStatus,
} from './enums.js';
import type { Flow } from './flows.js';
import type { PaymentMethodData } from './payment-method.js';

// -----------------------------------------------------------------------------
// Request payloads
// -----------------------------------------------------------------------------

export interface PaymentsAuthorizeData {
  paymentMethodData: PaymentMethodData;
  amount: number;
  currency: Currency;
  confirm: boolean;
  captureMethod?: CaptureMethod;
  browserInfo?: BrowserInformation;
  /** Merchant reference sent as the connector's transaction code in place of the payment id */
  idempotencyKey?: string;
}

export interface PaymentsCaptureData {
  connectorTransactionId: string;
  amountToCapture?: number;
  currency: Currency;
}

export interface PaymentsSyncData {
  connectorTransactionId: string;
  captureMethod?: CaptureMethod;
}

export interface PaymentsCancelData {
  connectorTransactionId: string;
  cancellationReason?: string;
}

export interface RefundsData {
  refundId: string;
  connectorTransactionId: string;
  /** Set once the connector has acknowledged the refund (required for RSync) */
  connectorRefundId?: string;
  refundAmount: number;
  paymentAmount: number;
  currency: Currency;
  reason?: string;
  paymentMethodData: PaymentMethodData;
}

// -----------------------------------------------------------------------------
// Response payloads
// -----------------------------------------------------------------------------

/**
 * The connector's reference for a transaction
 */
export type ResponseId =
  | { type: 'connector_transaction_id'; id: string }
  | { type: 'encoded_data'; data: string }
  | { type: 'no_response_id' };

export interface PaymentsResponseData {
  resourceId: ResponseId;
  redirect: boolean;
}

export interface RefundsResponseData {
  connectorRefundId: string;
  refundStatus: RefundStatus;
}

/**
 * Structured failure reported by a connector
 */
export interface ErrorResponse {
  code: string;
  message: string;
  reason?: string;
  statusCode: number;
}

// -----------------------------------------------------------------------------
// Envelope
// -----------------------------------------------------------------------------

/**
 * Canonical envelope for one attempt of one flow against one connector.
 *
 * `response` is `undefined` until a dispatch completes; afterwards it holds
 * either the connector's successful payload or its structured error, never
 * both.
 */
export interface RouterData<F extends Flow, Req, Res> {
  readonly flow: F;
  readonly merchantId: string;
  /** Connector identifier chosen at dispatch time */
  readonly connector: string;
  readonly paymentId: string;
  readonly attemptId: string;
  readonly status: AttemptStatus;
  /** Minor currency units */
  readonly amount: number;
  readonly currency: Currency;
  readonly paymentMethod: PaymentMethodType;
  readonly connectorAuthType: ConnectorAuthType;
  readonly authType: AuthenticationType;
  readonly description?: string;
  readonly returnUrl?: string;
  readonly address: PaymentAddress;
  readonly request: Req;
  readonly response?: Result<Res, ErrorResponse>;
}

/**
 * Request and response payload for each flow
 */
export interface FlowTypes {
  authorize: { request: PaymentsAuthorizeData; response: PaymentsResponseData };
  capture: { request: PaymentsCaptureData; response: PaymentsResponseData };
  psync: { request: PaymentsSyncData; response: PaymentsResponseData };
  void: { request: PaymentsCancelData; response: PaymentsResponseData };
  execute: { request: RefundsData; response: RefundsResponseData };
  rsync: { request: RefundsData; response: RefundsResponseData };
}

export type FlowRequest<F extends Flow> = FlowTypes[F]['request'];
export type FlowResponse<F extends Flow> = FlowTypes[F]['response'];
export type FlowRouterData<F extends Flow> = RouterData<F, FlowRequest<F>, FlowResponse<F>>;

export type PaymentsAuthorizeRouterData = FlowRouterData<'authorize'>;
export type PaymentsCaptureRouterData = FlowRouterData<'capture'>;
export type PaymentsSyncRouterData = FlowRouterData<'psync'>;
export type PaymentsCancelRouterData = FlowRouterData<'void'>;
export type RefundExecuteRouterData = FlowRouterData<'execute'>;
export type RefundSyncRouterData = FlowRouterData<'rsync'>;

/**
 * Whether a dispatch attempt has attached an outcome
 */
export function hasOutcome<F extends Flow, Req, Res>(data: RouterData<F, Req, Res>): boolean {
  return data.response !== undefined;
}
