/**
 * Layer-to-layer conversions
 *
 * One function per (lower, upper) pair. Each keeps the lower error as the
 * `cause` of the upper one; none stringifies it away or drops it.
 */
import { ApiClientError } from './api-client.js';
import { CardVaultError } from './card-vault.js';
import {
  AuthenticationError,
  AuthorisationError,
  CryptoError,
  EncryptionError,
  ParsingError,
  UnexpectedError,
  ValidationError,
} from './common.js';
import { ConnectorError } from './connector.js';
import { RouterError, type RouterErrorKind } from './router.js';
import { DatabaseError, RedisError, StorageError } from './storage.js';

/**
 * Errors a single processing step can end with
 */
export type ProcessingStepError = ConnectorError | ApiClientError | ParsingError;

// -----------------------------------------------------------------------------
// Into the storage layer
// -----------------------------------------------------------------------------

export function databaseErrorToStorageError(error: DatabaseError): StorageError {
  return new StorageError('database_error', `DataBaseError: ${error.message}`, { cause: error });
}

export function redisErrorToStorageError(error: RedisError): StorageError {
  return new StorageError('kv_error', 'KV error', { cause: error });
}

// -----------------------------------------------------------------------------
// Into the connector layer
// -----------------------------------------------------------------------------

export function apiClientErrorToConnectorError(error: ApiClientError): ConnectorError {
  return new ConnectorError('processing_step_failed', { body: error.body }, { cause: error });
}

export function parsingErrorToConnectorError(error: ParsingError): ConnectorError {
  return new ConnectorError('response_handling_failed', {}, { cause: error });
}

// -----------------------------------------------------------------------------
// Into the router layer
// -----------------------------------------------------------------------------

export function connectorErrorToRouterError(error: ConnectorError): RouterError {
  let kind: RouterErrorKind;
  switch (error.code) {
    case 'not_implemented':
    case 'webhooks_not_implemented':
      kind = 'not_implemented_by_connector';
      break;
    case 'missing_required_field':
    case 'invalid_data_format':
    case 'failed_to_obtain_auth_type':
    case 'invalid_connector_name':
      kind = 'validation';
      break;
    default:
      kind = 'unexpected';
  }
  return new RouterError(kind, error);
}

export function storageErrorToRouterError(error: StorageError): RouterError {
  return new RouterError('database', error);
}

export function parsingErrorToRouterError(error: ParsingError): RouterError {
  return new RouterError('parsing', error);
}

export function validationErrorToRouterError(error: ValidationError): RouterError {
  return new RouterError('validation', error);
}

export function encryptionErrorToRouterError(error: EncryptionError): RouterError {
  return new RouterError('encryption', error);
}

export function cryptoErrorToRouterError(error: CryptoError): RouterError {
  return new RouterError('encryption', error);
}

/**
 * A vault request the caller left incomplete is a validation failure; any
 * other vault failure is the router's own.
 */
export function cardVaultErrorToRouterError(error: CardVaultError): RouterError {
  return new RouterError(error.code === 'missing_required_field' ? 'validation' : 'unexpected', error);
}

export function authenticationErrorToRouterError(error: AuthenticationError): RouterError {
  return new RouterError('authentication', error);
}

export function authorisationErrorToRouterError(error: AuthorisationError): RouterError {
  return new RouterError('authorisation', error);
}

export function unexpectedErrorToRouterError(error: UnexpectedError): RouterError {
  return new RouterError('unexpected', error);
}

export function configurationErrorToRouterError(error: Error): RouterError {
  return new RouterError('configuration', error);
}

export function metricsErrorToRouterError(error: Error): RouterError {
  return new RouterError('metrics', error);
}

export function ioErrorToRouterError(error: NodeJS.ErrnoException): RouterError {
  return new RouterError('io', error);
}

/**
 * Lift whatever a processing step ended with. Transport and response
 * parsing failures pass through the connector layer first, so the cause
 * chain reads router → connector → transport/parsing.
 */
export function processingStepErrorToRouterError(error: ProcessingStepError): RouterError {
  switch (error.layer) {
    case 'connector':
      return connectorErrorToRouterError(error);
    case 'api_client':
      return connectorErrorToRouterError(apiClientErrorToConnectorError(error));
    case 'parsing':
      return connectorErrorToRouterError(parsingErrorToConnectorError(error));
  }
}

/**
 * Structured summary for log lines
 */
export function errorSummary(error: { layer: string; code?: string; kind?: string; message: string }): {
  layer: string;
  code: string | undefined;
  message: string;
} {
  return { layer: error.layer, code: error.code ?? error.kind, message: error.message };
}
