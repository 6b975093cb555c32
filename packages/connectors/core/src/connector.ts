import type { ConnectorName, Flow } from '@payroute/domain';
import type { ConnectorsConfig } from '@payroute/kernel';
import type { ConnectorIntegration } from './integration.js';

/**
 * One integration for every flow. Adding a flow to the domain breaks
 * every connector that does not supply it.
 */
export type ConnectorIntegrations = { readonly [F in Flow]: ConnectorIntegration<F> };

export interface Connector<N extends string = ConnectorName> {
  readonly name: N;
  /** Base URL for this connector, with trailing slash where paths are appended */
  baseUrl(config: ConnectorsConfig): string;
  readonly integrations: ConnectorIntegrations;
}
