import type { Secret } from '@payroute/masking';

/**
 * Credentials a merchant configured for one connector.
 *
 * Opaque to everything except the connector's own auth-type conversion,
 * which accepts the variant it expects and rejects the rest.
 */
export type ConnectorAuthType =
  | { type: 'header_key'; apiKey: Secret<string> }
  | { type: 'body_key'; apiKey: Secret<string>; key1: Secret<string> }
  | { type: 'signature_key'; apiKey: Secret<string>; key1: Secret<string>; apiSecret: Secret<string> }
  | { type: 'no_key' };

export type ConnectorAuthKind = ConnectorAuthType['type'];
