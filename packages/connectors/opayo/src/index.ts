/**
 * @payroute/connector-opayo
 *
 * Opayo Pi connector: request builders, response reducers and the
 * integration for every flow.
 *
 * @packageDocumentation
 */

export {
  opayo,
  OpayoAuthorize,
  OpayoCapture,
  OpayoPSync,
  OpayoVoid,
  OpayoRefundExecute,
  OpayoRefundSync,
} from './opayo.js';

export {
  toOpayoAuthType,
  toOpayoPaymentsRequest,
  toOpayoCaptureRequest,
  toOpayoVoidRequest,
  toOpayoRefundRequest,
  challengeWindowSize,
  toErrorResponse,
  OPAYO_PAYMENT_STATUSES,
  OPAYO_REFUND_STATUSES,
  PAYMENT_STATUS_MAP,
  REFUND_STATUS_MAP,
  OPAYO_INSTRUCTION_STATUS_MAP,
  OpayoPaymentsResponseSchema,
  OpayoInstructionResponseSchema,
  OpayoRefundResponseSchema,
  OpayoErrorResponseSchema,
  type OpayoAuthType,
  type OpayoTransactionType,
  type ChallengeWindowSize,
  type OpayoCardSession,
  type OpayoBillingAddress,
  type OpayoStrongCustomerAuthentication,
  type OpayoPaymentsRequest,
  type OpayoInstructionType,
  type OpayoInstructionRequest,
  type OpayoRefundRequest,
  type OpayoPaymentStatus,
  type OpayoPaymentsResponse,
  type OpayoInstructionResponse,
  type OpayoRefundStatus,
  type OpayoRefundResponse,
  type OpayoErrorResponse,
} from './transformers.js';
