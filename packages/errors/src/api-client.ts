/**
 * Transport errors
 *
 * Anything that goes wrong between handing a built request to the HTTP
 * client and getting a 2xx back. Status-derived codes keep the status
 * and raw body, and the connector's parsed error when it had one.
 */
import type { ErrorResponse } from '@payroute/domain';

export type ApiClientErrorCode =
  // construction
  | 'header_map_construction_failed'
  | 'invalid_proxy_configuration'
  | 'client_construction_failed'
  // encoding and I/O
  | 'url_encoding_failed'
  | 'request_not_sent'
  | 'response_decoding_failed'
  // 4xx
  | 'bad_request_received'
  | 'unauthorized_received'
  | 'forbidden_received'
  | 'not_found_received'
  | 'method_not_allowed_received'
  | 'request_timeout_received'
  | 'unprocessable_entity_received'
  | 'too_many_requests_received'
  // 5xx
  | 'internal_server_error_received'
  | 'bad_gateway_received'
  | 'service_unavailable_received'
  | 'gateway_timeout_received'
  | 'unexpected_server_response';

const MESSAGES: Record<ApiClientErrorCode, string> = {
  header_map_construction_failed: 'Header map construction failed',
  invalid_proxy_configuration: 'Invalid proxy configuration',
  client_construction_failed: 'Client construction failed',
  url_encoding_failed: 'URL encoding of request payload failed',
  request_not_sent: 'Failed to send request to connector',
  response_decoding_failed: 'Failed to decode response',
  bad_request_received: 'Server responded with Bad Request',
  unauthorized_received: 'Server responded with Unauthorized',
  forbidden_received: 'Server responded with Forbidden',
  not_found_received: 'Server responded with Not Found',
  method_not_allowed_received: 'Server responded with Method Not Allowed',
  request_timeout_received: 'Server responded with Request Timeout',
  unprocessable_entity_received: 'Server responded with Unprocessable Entity',
  too_many_requests_received: 'Server responded with Too Many Requests',
  internal_server_error_received: 'Server responded with Internal Server Error',
  bad_gateway_received: 'Server responded with Bad Gateway',
  service_unavailable_received: 'Server responded with Service Unavailable',
  gateway_timeout_received: 'Server responded with Gateway Timeout',
  unexpected_server_response: 'Server responded with unexpected response',
};

export interface ApiClientErrorDetails {
  statusCode?: number;
  body?: string;
  /** Connector's own error shape, parsed from `body` */
  connectorError?: ErrorResponse;
}

export class ApiClientError extends Error {
  readonly layer = 'api_client';
  readonly code: ApiClientErrorCode;
  readonly statusCode?: number;
  readonly body?: string;
  readonly connectorError?: ErrorResponse;

  constructor(code: ApiClientErrorCode, details: ApiClientErrorDetails = {}, options?: ErrorOptions) {
    super(MESSAGES[code], options);
    this.name = 'ApiClientError';
    this.code = code;
    this.statusCode = details.statusCode;
    this.body = details.body;
    this.connectorError = details.connectorError;
  }
}

/**
 * Classify a non-2xx status. The only place a status code becomes an
 * error code.
 */
export function apiClientErrorCodeForStatus(statusCode: number): ApiClientErrorCode {
  switch (statusCode) {
    case 400:
      return 'bad_request_received';
    case 401:
      return 'unauthorized_received';
    case 403:
      return 'forbidden_received';
    case 404:
      return 'not_found_received';
    case 405:
      return 'method_not_allowed_received';
    case 408:
      return 'request_timeout_received';
    case 422:
      return 'unprocessable_entity_received';
    case 429:
      return 'too_many_requests_received';
    case 500:
      return 'internal_server_error_received';
    case 502:
      return 'bad_gateway_received';
    case 503:
      return 'service_unavailable_received';
    case 504:
      return 'gateway_timeout_received';
    default:
      return 'unexpected_server_response';
  }
}

export function apiClientErrorFromStatus(
  statusCode: number,
  body: string,
  connectorError?: ErrorResponse
): ApiClientError {
  return new ApiClientError(apiClientErrorCodeForStatus(statusCode), {
    statusCode,
    body,
    connectorError,
  });
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}
