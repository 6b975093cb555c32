/**
 * @payroute/kernel
 *
 * Shared primitives for the router: the Result type, the currency table,
 * logging and configuration.
 *
 * @packageDocumentation
 */

export {
  ok,
  err,
  map,
  mapErr,
  chain,
  unwrap,
  type Result,
} from './result.js';

export {
  CURRENCY_EXPONENTS,
  CURRENCIES,
  isCurrency,
  toMajorUnitString,
  type Currency,
} from './currency.js';

export { createLogger, silentLogger, type Logger, type LoggerOptions } from './logger.js';

export {
  RouterConfigSchema,
  loadConfig,
  DEFAULT_OPAYO_BASE_URL,
  DEFAULT_AUTHORIZEDOTNET_BASE_URL,
  type RouterConfig,
  type ConnectorsConfig,
} from './config.js';
