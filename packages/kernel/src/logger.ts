import {
  pino,
  type Logger,
  type LevelWithSilent,
  type DestinationStream,
  type LoggerOptions as PinoOptions,
} from 'pino';
import { REDACTED } from '@payroute/masking';

export type { Logger };

/**
 * Credential-bearing paths. Secret containers already serialize to the
 * redaction marker; these cover raw values that reach a log call before
 * they are wrapped (connector headers, decoded auth structs).
 */
const REDACT_PATHS = [
  'authorization',
  'headers.authorization',
  'headers.Authorization',
  'request.headers.authorization',
  'request.headers.Authorization',
  '*.apiKey',
  '*.api_key',
  '*.key1',
  '*.apiSecret',
  '*.transactionKey',
  '*.cardNumber',
  '*.cardCode',
];

export interface LoggerOptions {
  name?: string;
  level?: LevelWithSilent;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const loggerOptions: PinoOptions = {
    name: options.name ?? 'payroute',
    level: options.level ?? 'info',
    redact: {
      paths: REDACT_PATHS,
      censor: REDACTED,
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

/**
 * Logger that discards everything; the default for library callers that
 * don't pass one in.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
