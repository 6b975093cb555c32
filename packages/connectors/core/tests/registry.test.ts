import { describe, it, expect } from 'vitest';
import { ConnectorRegistry } from '../src/index.js';
import { stubConnector } from './fixtures.js';

describe('ConnectorRegistry', () => {
  const registry = new ConnectorRegistry([stubConnector]);

  it('returns a registered connector', () => {
    const result = registry.get('stub');
    expect(result.ok && result.value).toBe(stubConnector);
  });

  it('returns the integration for a flow', () => {
    const result = registry.getIntegration('stub', 'authorize');
    expect(result.ok && result.value).toBe(stubConnector.integrations.authorize);
  });

  it('rejects unknown identifiers with invalid_connector_name', () => {
    const result = registry.get('stripe');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('invalid_connector_name');
      expect(result.error.connectorName).toBe('stripe');
      expect(result.error.message).toBe('An invalid connector name was provided: stripe');
    }
  });

  it('rejects unknown identifiers on integration lookup', () => {
    const result = registry.getIntegration('', 'psync');
    expect(!result.ok && result.error.code).toBe('invalid_connector_name');
  });

  it('lists and checks names', () => {
    expect(registry.list()).toEqual(['stub']);
    expect(registry.has('stub')).toBe(true);
    expect(registry.has('STUB')).toBe(false);
  });

  it('is frozen after construction', () => {
    expect(Object.isFrozen(registry)).toBe(true);
  });

  it('refuses duplicate names', () => {
    expect(() => new ConnectorRegistry([stubConnector, stubConnector])).toThrow(
      'Connector stub already registered'
    );
  });
});
