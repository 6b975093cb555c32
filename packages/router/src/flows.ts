import { err, mapErr, type Result } from '@payroute/kernel';
import type { ConnectorAuthType, Flow, FlowRouterData } from '@payroute/domain';
import {
  connectorErrorToRouterError,
  errorSummary,
  invalidConnectorName,
  processingStepErrorToRouterError,
  storageErrorToRouterError,
  type RouterError,
} from '@payroute/errors';
import { executeConnectorProcessingStep, type ProcessingAction } from '@payroute/connectors-core';
import type { RouterContext } from './context.js';

/**
 * Only read-only status syncs may be retried blindly. Mutating flows
 * risk a duplicate charge or refund at the connector.
 */
export function isRetryableFlow(flow: Flow): boolean {
  switch (flow) {
    case 'psync':
    case 'rsync':
      return true;
    case 'authorize':
    case 'capture':
    case 'void':
    case 'execute':
      return false;
  }
}

/**
 * Look up the merchant's credentials for a connector
 */
export async function resolveConnectorAuth(
  ctx: RouterContext,
  merchantId: string,
  connector: string
): Promise<Result<ConnectorAuthType, RouterError>> {
  if (!ctx.registry.has(connector)) {
    return err(connectorErrorToRouterError(invalidConnectorName(connector)));
  }
  return mapErr(await ctx.credentialStore.findConnectorAuth(merchantId, connector), storageErrorToRouterError);
}

/**
 * Run one processing step and lift its failure into a RouterError
 */
export async function runFlow<F extends Flow>(
  ctx: RouterContext,
  data: FlowRouterData<F>,
  action: ProcessingAction = { type: 'trigger' }
): Promise<Result<FlowRouterData<F>, RouterError>> {
  const log = ctx.logger.child({ component: 'router', connector: data.connector, flow: data.flow });
  const result = mapErr(await executeConnectorProcessingStep(ctx, data, action), processingStepErrorToRouterError);

  if (result.ok) {
    log.info({ paymentId: data.paymentId, status: result.value.status }, 'flow completed');
  } else {
    log.error({ paymentId: data.paymentId, error: errorSummary(result.error) }, 'flow failed');
  }
  return result;
}
