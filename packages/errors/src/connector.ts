/**
 * Connector integration errors
 *
 * Raised while building a connector request or reducing its response.
 * Each carries the structured context needed to act on it (field name,
 * offending feature, raw body) so nothing above has to parse messages.
 */

export type ConnectorErrorCode =
  | 'failed_to_obtain_integration_url'
  | 'request_encoding_failed'
  | 'response_deserialization_failed'
  | 'processing_step_failed'
  | 'unexpected_response_error'
  | 'routing_rules_parsing_error'
  | 'failed_to_obtain_preferred_connector'
  | 'invalid_connector_name'
  | 'response_handling_failed'
  | 'missing_required_field'
  | 'invalid_data_format'
  | 'failed_to_obtain_auth_type'
  | 'not_implemented'
  | 'webhooks_not_implemented'
  | 'webhook_body_decoding_failed'
  | 'webhook_signature_not_found'
  | 'webhook_source_verification_failed'
  | 'webhook_verification_secret_not_found'
  | 'webhook_reference_id_not_found'
  | 'webhook_event_type_not_found'
  | 'webhook_resource_object_not_found';

export interface ConnectorErrorDetails {
  /** Domain field that was absent or malformed (missing_required_field, invalid_data_format) */
  fieldName?: string;
  /** Payment method, flow or feature a connector does not support (not_implemented) */
  feature?: string;
  /** Identifier that failed registry lookup (invalid_connector_name) */
  connectorName?: string;
  /** Raw connector body, kept for diagnostics */
  body?: string;
}

function messageFor(code: ConnectorErrorCode, details: ConnectorErrorDetails): string {
  switch (code) {
    case 'failed_to_obtain_integration_url':
      return 'Error while obtaining URL for the integration';
    case 'request_encoding_failed':
      return 'Failed to encode connector request';
    case 'response_deserialization_failed':
      return 'Failed to deserialize connector response';
    case 'processing_step_failed':
      return 'Failed to execute a processing step';
    case 'unexpected_response_error':
      return 'The connector returned an unexpected response';
    case 'routing_rules_parsing_error':
      return 'Failed to parse custom routing rules from merchant account';
    case 'failed_to_obtain_preferred_connector':
      return 'Failed to obtain preferred connector from merchant account';
    case 'invalid_connector_name':
      return `An invalid connector name was provided: ${details.connectorName ?? '<unknown>'}`;
    case 'response_handling_failed':
      return 'Failed to handle connector response';
    case 'missing_required_field':
      return `Missing required field: ${details.fieldName ?? '<unknown>'}`;
    case 'invalid_data_format':
      return `Invalid data format for field: ${details.fieldName ?? '<unknown>'}`;
    case 'failed_to_obtain_auth_type':
      return 'Failed to obtain authentication type';
    case 'not_implemented':
      return `This step has not been implemented for: ${details.feature ?? '<unknown>'}`;
    case 'webhooks_not_implemented':
      return 'Webhooks not implemented for this connector';
    case 'webhook_body_decoding_failed':
      return 'Failed to decode webhook event body';
    case 'webhook_signature_not_found':
      return 'Signature not found for incoming webhook';
    case 'webhook_source_verification_failed':
      return 'Failed to verify webhook source';
    case 'webhook_verification_secret_not_found':
      return 'Could not find merchant secret for incoming webhook source verification';
    case 'webhook_reference_id_not_found':
      return 'Incoming webhook object reference ID not found';
    case 'webhook_event_type_not_found':
      return 'Incoming webhook event type not found';
    case 'webhook_resource_object_not_found':
      return 'Incoming webhook event resource object not found';
  }
}

export class ConnectorError extends Error {
  readonly layer = 'connector';
  readonly code: ConnectorErrorCode;
  readonly fieldName?: string;
  readonly feature?: string;
  readonly connectorName?: string;
  readonly body?: string;

  constructor(code: ConnectorErrorCode, details: ConnectorErrorDetails = {}, options?: ErrorOptions) {
    super(messageFor(code, details), options);
    this.name = 'ConnectorError';
    this.code = code;
    this.fieldName = details.fieldName;
    this.feature = details.feature;
    this.connectorName = details.connectorName;
    this.body = details.body;
  }
}

/** Create a missing required field error */
export function missingRequiredField(fieldName: string): ConnectorError {
  return new ConnectorError('missing_required_field', { fieldName });
}

/** Create an invalid data format error for a field the connector cannot send as given */
export function invalidDataFormat(fieldName: string): ConnectorError {
  return new ConnectorError('invalid_data_format', { fieldName });
}

/** Create a not implemented error naming the unsupported feature */
export function notImplemented(feature: string): ConnectorError {
  return new ConnectorError('not_implemented', { feature });
}

/** Create an auth type mismatch error */
export function failedToObtainAuthType(): ConnectorError {
  return new ConnectorError('failed_to_obtain_auth_type');
}

/** Create an unknown connector error */
export function invalidConnectorName(connectorName: string): ConnectorError {
  return new ConnectorError('invalid_connector_name', { connectorName });
}

/** Create a request encoding error */
export function requestEncodingFailed(cause?: unknown): ConnectorError {
  return new ConnectorError('request_encoding_failed', {}, { cause });
}

/** Create a response deserialization error keeping the raw body */
export function responseDeserializationFailed(body: string, cause?: unknown): ConnectorError {
  return new ConnectorError('response_deserialization_failed', { body }, { cause });
}

/** Create a response handling error */
export function responseHandlingFailed(cause?: unknown): ConnectorError {
  return new ConnectorError('response_handling_failed', {}, { cause });
}
