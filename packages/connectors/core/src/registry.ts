import { ok, err, type Result } from '@payroute/kernel';
import type { ConnectorName, Flow } from '@payroute/domain';
import { invalidConnectorName, type ConnectorError } from '@payroute/errors';
import type { Connector } from './connector.js';
import type { ConnectorIntegration } from './integration.js';

/**
 * Read side of the registry; what the executor depends on
 */
export interface ConnectorLookup<N extends string = ConnectorName> {
  get(name: string): Result<Connector<N>, ConnectorError>;
  getIntegration<F extends Flow>(name: string, flow: F): Result<ConnectorIntegration<F>, ConnectorError>;
}

/**
 * Connector registry, built once at startup and read-only afterwards.
 *
 * Identifiers arrive from outside (merchant configuration, requests), so
 * lookups take plain strings and answer `invalid_connector_name` for
 * anything unknown.
 */
export class ConnectorRegistry<N extends string = ConnectorName> implements ConnectorLookup<N> {
  private readonly connectors: ReadonlyMap<string, Connector<N>>;

  constructor(connectors: Iterable<Connector<N>>) {
    const byName = new Map<string, Connector<N>>();
    for (const connector of connectors) {
      if (byName.has(connector.name)) {
        throw new Error(`Connector ${connector.name} already registered`);
      }
      byName.set(connector.name, connector);
    }
    this.connectors = byName;
    Object.freeze(this);
  }

  get(name: string): Result<Connector<N>, ConnectorError> {
    const connector = this.connectors.get(name);
    return connector ? ok(connector) : err(invalidConnectorName(name));
  }

  getIntegration<F extends Flow>(name: string, flow: F): Result<ConnectorIntegration<F>, ConnectorError> {
    const connector = this.connectors.get(name);
    if (!connector) {
      return err(invalidConnectorName(name));
    }
    return ok(connector.integrations[flow]);
  }

  has(name: string): boolean {
    return this.connectors.has(name);
  }

  list(): N[] {
    return Array.from(this.connectors.values(), (connector) => connector.name);
  }
}
