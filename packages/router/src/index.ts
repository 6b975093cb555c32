/**
 * @payroute/router
 *
 * Entry point for callers: build a router context once, then run flows
 * against it.
 *
 * @example
 * ```typescript
 * import { createRouterContext, loadRouterConfig, runFlow } from '@payroute/router';
 *
 * const config = loadRouterConfig();
 * if (!config.ok) throw config.error;
 * const ctx = createRouterContext({ config: config.value });
 *
 * const result = await runFlow(ctx, authorizeData);
 * ```
 *
 * @packageDocumentation
 */

export { CONNECTORS, createConnectorRegistry } from './connectors.js';

export {
  createRouterContext,
  loadRouterConfig,
  type RouterContext,
  type RouterContextOptions,
} from './context.js';

export { isRetryableFlow, resolveConnectorAuth, runFlow } from './flows.js';

export { RouterError, type RouterErrorKind, type ProblemJson } from '@payroute/errors';
