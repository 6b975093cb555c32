/**
 * Connectors the router can dispatch to. Adding a connector means adding
 * its name here; the registry then refuses to build until an
 * implementation is supplied for it.
 */
export const CONNECTOR_NAMES = ['opayo', 'authorizedotnet'] as const;

export type ConnectorName = (typeof CONNECTOR_NAMES)[number];

export function isConnectorName(value: unknown): value is ConnectorName {
  return CONNECTOR_NAMES.some((name) => name === value);
}
