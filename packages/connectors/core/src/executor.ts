/**
 * Processing-step executor
 *
 * Drives one flow for one RouterData against its connector:
 *
 *   not_started → request_built → dispatched → response_received → reduced
 *
 * Any stage may end the step with an error. The step never retries and
 * never mutates its input; on success it returns a new RouterData whose
 * `response` is set.
 */
import { ok, err, type Logger, type Result, type RouterConfig } from '@payroute/kernel';
import { hasOutcome, type Flow, type FlowRouterData } from '@payroute/domain';
import {
  apiClientErrorFromStatus,
  errorSummary,
  isSuccessStatus,
  responseHandlingFailed,
  type ProcessingStepError,
} from '@payroute/errors';
import type { HttpClient, HttpResponse } from './http.js';
import type { ConnectorLookup } from './registry.js';

export type ProcessingStage = 'not_started' | 'request_built' | 'dispatched' | 'response_received' | 'reduced';

/**
 * How far the step goes once the request is built
 *
 * - `trigger`: send it and reduce the response
 * - `avoid`: stop after building; no I/O, data returned unchanged
 * - `handle_response`: reduce a response obtained elsewhere (webhook, replay)
 */
export type ProcessingAction =
  | { type: 'trigger' }
  | { type: 'avoid' }
  | { type: 'handle_response'; response: HttpResponse };

export interface ExecutionContext {
  registry: ConnectorLookup<string>;
  httpClient: HttpClient;
  config: RouterConfig;
  logger: Logger;
}

export async function executeConnectorProcessingStep<F extends Flow>(
  ctx: ExecutionContext,
  data: FlowRouterData<F>,
  action: ProcessingAction
): Promise<Result<FlowRouterData<F>, ProcessingStepError>> {
  const log = ctx.logger.child({
    component: 'executor',
    connector: data.connector,
    flow: data.flow,
    paymentId: data.paymentId,
    attemptId: data.attemptId,
  });

  const fail = (stage: ProcessingStage, error: ProcessingStepError) => {
    log.warn({ stage, error: errorSummary(error) }, 'processing step failed');
    return err(error);
  };

  const connector = ctx.registry.get(data.connector);
  if (!connector.ok) {
    return fail('not_started', connector.error);
  }
  const integration = ctx.registry.getIntegration(data.connector, data.flow);
  if (!integration.ok) {
    return fail('not_started', integration.error);
  }

  const request = integration.value.buildRequest(data, connector.value.baseUrl(ctx.config.connectors));
  if (!request.ok) {
    return fail('not_started', request.error);
  }
  log.debug({ stage: 'request_built', method: request.value.method, url: request.value.url }, 'stage');

  let response: HttpResponse;
  switch (action.type) {
    case 'avoid':
      return ok(data);
    case 'handle_response':
      response = action.response;
      break;
    case 'trigger': {
      log.debug({ stage: 'dispatched' }, 'stage');
      const sent = await ctx.httpClient.send(request.value, { timeoutMs: ctx.config.http.timeoutMs });
      if (!sent.ok) {
        return fail('dispatched', sent.error);
      }
      response = sent.value;
      break;
    }
  }
  log.debug({ stage: 'response_received', statusCode: response.statusCode }, 'stage');

  if (!isSuccessStatus(response.statusCode)) {
    const diagnostics = integration.value.getErrorResponse(response);
    if (!diagnostics.ok) {
      log.debug({ error: errorSummary(diagnostics.error) }, 'connector error body not recognised');
    }
    return fail(
      'response_received',
      apiClientErrorFromStatus(
        response.statusCode,
        response.body,
        diagnostics.ok ? diagnostics.value : undefined
      )
    );
  }

  const reduced = integration.value.handleResponse(data, response);
  if (!reduced.ok) {
    return fail('response_received', reduced.error);
  }
  if (!hasOutcome(reduced.value)) {
    return fail('response_received', responseHandlingFailed());
  }
  log.debug({ stage: 'reduced', status: reduced.value.status }, 'stage');
  return ok(reduced.value);
}
