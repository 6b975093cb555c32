/**
 * @payroute/errors
 *
 * Layered error taxonomy: connector integration, transport, persistence
 * and the top-level router error with its status mapping. Lower layers
 * are lifted into upper ones only through the explicit conversions in
 * `conversions.ts`.
 *
 * @packageDocumentation
 */

export {
  ConnectorError,
  missingRequiredField,
  invalidDataFormat,
  notImplemented,
  failedToObtainAuthType,
  invalidConnectorName,
  requestEncodingFailed,
  responseDeserializationFailed,
  responseHandlingFailed,
  type ConnectorErrorCode,
  type ConnectorErrorDetails,
} from './connector.js';

export {
  ApiClientError,
  apiClientErrorCodeForStatus,
  apiClientErrorFromStatus,
  isSuccessStatus,
  type ApiClientErrorCode,
  type ApiClientErrorDetails,
} from './api-client.js';

export {
  DatabaseError,
  RedisError,
  StorageError,
  valueNotFound,
  type DatabaseErrorCode,
  type RedisErrorCode,
  type StorageErrorCode,
} from './storage.js';

export {
  CardVaultError,
  type CardVaultErrorCode,
  type CardVaultErrorDetails,
} from './card-vault.js';

export {
  ParsingError,
  ValidationError,
  EncryptionError,
  CryptoError,
  AuthenticationError,
  AuthorisationError,
  UnexpectedError,
  type ValidationErrorCode,
  type CryptoErrorCode,
} from './common.js';

export { RouterError, statusCodeForKind, type RouterErrorKind, type ProblemJson } from './router.js';

export {
  databaseErrorToStorageError,
  redisErrorToStorageError,
  apiClientErrorToConnectorError,
  parsingErrorToConnectorError,
  connectorErrorToRouterError,
  storageErrorToRouterError,
  parsingErrorToRouterError,
  validationErrorToRouterError,
  encryptionErrorToRouterError,
  cryptoErrorToRouterError,
  cardVaultErrorToRouterError,
  authenticationErrorToRouterError,
  authorisationErrorToRouterError,
  unexpectedErrorToRouterError,
  configurationErrorToRouterError,
  metricsErrorToRouterError,
  ioErrorToRouterError,
  processingStepErrorToRouterError,
  errorSummary,
  type ProcessingStepError,
} from './conversions.js';
