/**
 * @payroute/connectors-core
 *
 * Connector integration interface, registry, transport contract and the
 * processing-step executor every flow runs through.
 *
 * @packageDocumentation
 */

export type {
  HttpMethod,
  HeaderValue,
  ConnectorHttpRequest,
  HttpResponse,
  SendOptions,
  HttpClient,
} from './http.js';

export { UndiciHttpClient, type UndiciHttpClientOptions } from './undici-client.js';

export { BaseConnectorIntegration, type ConnectorIntegration } from './integration.js';

export type { Connector, ConnectorIntegrations } from './connector.js';

export { ConnectorRegistry, type ConnectorLookup } from './registry.js';

export { InMemoryCredentialStore, type CredentialStore } from './credentials.js';

export {
  executeConnectorProcessingStep,
  type ExecutionContext,
  type ProcessingAction,
  type ProcessingStage,
} from './executor.js';

export { parseJsonBody, encodeJson, joinUrl, requirePositiveMinorUnits, requireRefundAmount } from './utils.js';
