import { CONNECTOR_NAMES, type ConnectorName } from '@payroute/domain';
import { ConnectorRegistry, type Connector } from '@payroute/connectors-core';
import { opayo } from '@payroute/connector-opayo';
import { authorizedotnet } from '@payroute/connector-authorizedotnet';

/**
 * Every connector the router can dispatch to. A name added to
 * CONNECTOR_NAMES without an entry here does not compile.
 */
export const CONNECTORS: { readonly [N in ConnectorName]: Connector<N> } = {
  opayo,
  authorizedotnet,
};

export function createConnectorRegistry(): ConnectorRegistry<ConnectorName> {
  return new ConnectorRegistry<ConnectorName>(CONNECTOR_NAMES.map((name) => CONNECTORS[name]));
}
