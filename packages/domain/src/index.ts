/**
 * @payroute/domain
 *
 * The connector-agnostic transaction model. Connector wire shapes never
 * appear here; each connector package converts to and from these types.
 *
 * @packageDocumentation
 */

export {
  FLOWS,
  isFlow,
  type Flow,
  type Authorize,
  type Capture,
  type PSync,
  type Void,
  type Execute,
  type RSync,
  type PaymentFlow,
  type RefundFlow,
} from './flows.js';

export {
  ATTEMPT_STATUSES,
  DEFAULT_ATTEMPT_STATUS,
  REFUND_STATUSES,
  type AttemptStatus,
  type RefundStatus,
  type PaymentMethodType,
  type AuthenticationType,
  type CaptureMethod,
} from './enums.js';

export {
  paymentMethodTypeOf,
  type Card,
  type Wallet,
  type WalletType,
  type BankTransfer,
  type PayLater,
  type PaymentMethodData,
} from './payment-method.js';

export {
  type Address,
  type AddressDetails,
  type PhoneDetails,
  type PaymentAddress,
} from './address.js';

export { CONNECTOR_NAMES, isConnectorName, type ConnectorName } from './connector-name.js';

export type { BrowserInformation } from './browser.js';

export type { ConnectorAuthType, ConnectorAuthKind } from './auth.js';

export {
  hasOutcome,
  type RouterData,
  type FlowTypes,
  type FlowRequest,
  type FlowResponse,
  type FlowRouterData,
  type PaymentsAuthorizeData,
  type PaymentsCaptureData,
  type PaymentsSyncData,
  type PaymentsCancelData,
  type RefundsData,
  type ResponseId,
  type PaymentsResponseData,
  type RefundsResponseData,
  type ErrorResponse,
  type PaymentsAuthorizeRouterData,
  type PaymentsCaptureRouterData,
  type PaymentsSyncRouterData,
  type PaymentsCancelRouterData,
  type RefundExecuteRouterData,
  type RefundSyncRouterData,
} from './router-data.js';
