/**
 * Router context
 *
 * The one place process-wide state is built: configuration, logger,
 * transport and the connector registry. Everything downstream receives
 * the context explicitly.
 */
import { createLogger, loadConfig, mapErr, type Logger, type Result, type RouterConfig } from '@payroute/kernel';
import { configurationErrorToRouterError, type RouterError } from '@payroute/errors';
import {
  InMemoryCredentialStore,
  UndiciHttpClient,
  type ConnectorRegistry,
  type CredentialStore,
  type ExecutionContext,
  type HttpClient,
} from '@payroute/connectors-core';
import type { ConnectorName } from '@payroute/domain';
import { createConnectorRegistry } from './connectors.js';

export interface RouterContext extends ExecutionContext {
  readonly registry: ConnectorRegistry<ConnectorName>;
  readonly credentialStore: CredentialStore;
}

export interface RouterContextOptions {
  config: RouterConfig;
  httpClient?: HttpClient;
  logger?: Logger;
  credentialStore?: CredentialStore;
}

export function createRouterContext(options: RouterContextOptions): RouterContext {
  const logger = options.logger ?? createLogger({ level: options.config.logLevel });
  const registry = createConnectorRegistry();
  logger.info({ connectors: registry.list() }, 'router context ready');

  return Object.freeze({
    config: options.config,
    logger,
    registry,
    httpClient: options.httpClient ?? new UndiciHttpClient({ logger: logger.child({ component: 'http' }) }),
    credentialStore: options.credentialStore ?? new InMemoryCredentialStore(),
  });
}

/**
 * Read configuration from the environment, reporting bad values as a
 * configuration error.
 */
export function loadRouterConfig(
  env: Record<string, string | undefined> = process.env
): Result<RouterConfig, RouterError> {
  return mapErr(loadConfig(env), configurationErrorToRouterError);
}
