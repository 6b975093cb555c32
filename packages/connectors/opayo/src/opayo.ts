import { ok, err, map, chain, type Result } from '@payroute/kernel';
import { ParsingError, missingRequiredField, type ConnectorError } from '@payroute/errors';
import type {
  AttemptStatus,
  ErrorResponse,
  Flow,
  FlowRouterData,
  PaymentsAuthorizeRouterData,
  PaymentsCancelRouterData,
  PaymentsCaptureRouterData,
  PaymentsResponseData,
  PaymentsSyncRouterData,
  RefundExecuteRouterData,
  RefundSyncRouterData,
  RefundsData,
  RefundsResponseData,
  RouterData,
} from '@payroute/domain';
import {
  BaseConnectorIntegration,
  encodeJson,
  joinUrl,
  parseJsonBody,
  type Connector,
  type HeaderValue,
  type HttpMethod,
  type HttpResponse,
} from '@payroute/connectors-core';
import {
  OPAYO_INSTRUCTION_STATUS_MAP,
  OpayoErrorResponseSchema,
  OpayoInstructionResponseSchema,
  OpayoPaymentsResponseSchema,
  OpayoRefundResponseSchema,
  PAYMENT_STATUS_MAP,
  REFUND_STATUS_MAP,
  toErrorResponse,
  toOpayoAuthType,
  toOpayoCaptureRequest,
  toOpayoPaymentsRequest,
  toOpayoRefundRequest,
  toOpayoVoidRequest,
} from './transformers.js';

function withPaymentOutcome<F extends Flow, Req>(
  data: RouterData<F, Req, PaymentsResponseData>,
  status: AttemptStatus,
  transactionId: string
): RouterData<F, Req, PaymentsResponseData> {
  const outcome: PaymentsResponseData = {
    resourceId: { type: 'connector_transaction_id', id: transactionId },
    redirect: false,
  };
  return { ...data, status, response: ok(outcome) };
}

function withRefundOutcome<F extends Flow>(
  data: RouterData<F, RefundsData, RefundsResponseData>,
  outcome: RefundsResponseData
): RouterData<F, RefundsData, RefundsResponseData> {
  return { ...data, response: ok(outcome) };
}

function transactionPath(id: string): string {
  return `transactions/${encodeURIComponent(id)}`;
}

/**
 * Header and error handling shared by every Opayo flow
 */
abstract class OpayoIntegration<F extends Flow> extends BaseConnectorIntegration<F> {
  override getHeaders(data: FlowRouterData<F>): Result<Record<string, HeaderValue>, ConnectorError> {
    return map(toOpayoAuthType(data.connectorAuthType), (auth): Record<string, HeaderValue> => ({
      'Content-Type': this.getContentType(),
      Authorization: auth.apiKey.map((key) => `Basic ${key}`),
    }));
  }

  getErrorResponse(response: HttpResponse): Result<ErrorResponse, ParsingError> {
    return map(parseJsonBody(response.body, OpayoErrorResponseSchema), (body) =>
      toErrorResponse(body, response.statusCode)
    );
  }
}

export class OpayoAuthorize extends OpayoIntegration<'authorize'> {
  getUrl(_data: PaymentsAuthorizeRouterData, baseUrl: string): Result<string, ConnectorError> {
    return ok(joinUrl(baseUrl, 'transactions'));
  }

  override getRequestBody(data: PaymentsAuthorizeRouterData): Result<string | undefined, ConnectorError> {
    return chain(toOpayoPaymentsRequest(data), encodeJson);
  }

  handleResponse(
    data: PaymentsAuthorizeRouterData,
    response: HttpResponse
  ): Result<PaymentsAuthorizeRouterData, ParsingError> {
    return map(parseJsonBody(response.body, OpayoPaymentsResponseSchema), (wire) =>
      withPaymentOutcome(data, PAYMENT_STATUS_MAP[wire.status], wire.id)
    );
  }
}

export class OpayoCapture extends OpayoIntegration<'capture'> {
  getUrl(data: PaymentsCaptureRouterData, baseUrl: string): Result<string, ConnectorError> {
    return ok(joinUrl(baseUrl, `${transactionPath(data.request.connectorTransactionId)}/instructions`));
  }

  override getRequestBody(data: PaymentsCaptureRouterData): Result<string | undefined, ConnectorError> {
    return chain(toOpayoCaptureRequest(data), encodeJson);
  }

  handleResponse(
    data: PaymentsCaptureRouterData,
    response: HttpResponse
  ): Result<PaymentsCaptureRouterData, ParsingError> {
    const wire = parseJsonBody(response.body, OpayoInstructionResponseSchema);
    if (!wire.ok) {
      return wire;
    }
    if (wire.value.instructionType !== 'release') {
      return err(new ParsingError(`Expected a release instruction, got ${wire.value.instructionType}`));
    }
    return ok(
      withPaymentOutcome(data, OPAYO_INSTRUCTION_STATUS_MAP.release, data.request.connectorTransactionId)
    );
  }
}

export class OpayoPSync extends OpayoIntegration<'psync'> {
  override getHttpMethod(): HttpMethod {
    return 'GET';
  }

  getUrl(data: PaymentsSyncRouterData, baseUrl: string): Result<string, ConnectorError> {
    return ok(joinUrl(baseUrl, transactionPath(data.request.connectorTransactionId)));
  }

  handleResponse(data: PaymentsSyncRouterData, response: HttpResponse): Result<PaymentsSyncRouterData, ParsingError> {
    return map(parseJsonBody(response.body, OpayoPaymentsResponseSchema), (wire) =>
      withPaymentOutcome(data, PAYMENT_STATUS_MAP[wire.status], wire.id)
    );
  }
}

export class OpayoVoid extends OpayoIntegration<'void'> {
  getUrl(data: PaymentsCancelRouterData, baseUrl: string): Result<string, ConnectorError> {
    return ok(joinUrl(baseUrl, `${transactionPath(data.request.connectorTransactionId)}/instructions`));
  }

  override getRequestBody(data: PaymentsCancelRouterData): Result<string | undefined, ConnectorError> {
    return encodeJson(toOpayoVoidRequest(data));
  }

  handleResponse(
    data: PaymentsCancelRouterData,
    response: HttpResponse
  ): Result<PaymentsCancelRouterData, ParsingError> {
    const wire = parseJsonBody(response.body, OpayoInstructionResponseSchema);
    if (!wire.ok) {
      return wire;
    }
    if (wire.value.instructionType !== 'void') {
      return err(new ParsingError(`Expected a void instruction, got ${wire.value.instructionType}`));
    }
    return ok(
      withPaymentOutcome(data, OPAYO_INSTRUCTION_STATUS_MAP.void, data.request.connectorTransactionId)
    );
  }
}

export class OpayoRefundExecute extends OpayoIntegration<'execute'> {
  getUrl(_data: RefundExecuteRouterData, baseUrl: string): Result<string, ConnectorError> {
    return ok(joinUrl(baseUrl, 'transactions'));
  }

  override getRequestBody(data: RefundExecuteRouterData): Result<string | undefined, ConnectorError> {
    return chain(toOpayoRefundRequest(data), encodeJson);
  }

  handleResponse(
    data: RefundExecuteRouterData,
    response: HttpResponse
  ): Result<RefundExecuteRouterData, ParsingError> {
    return map(parseJsonBody(response.body, OpayoRefundResponseSchema), (wire) =>
      withRefundOutcome(data, { connectorRefundId: wire.id, refundStatus: REFUND_STATUS_MAP[wire.status] })
    );
  }
}

export class OpayoRefundSync extends OpayoIntegration<'rsync'> {
  override getHttpMethod(): HttpMethod {
    return 'GET';
  }

  getUrl(data: RefundSyncRouterData, baseUrl: string): Result<string, ConnectorError> {
    const refundId = data.request.connectorRefundId;
    if (refundId === undefined) {
      return err(missingRequiredField('connector_refund_id'));
    }
    return ok(joinUrl(baseUrl, transactionPath(refundId)));
  }

  handleResponse(data: RefundSyncRouterData, response: HttpResponse): Result<RefundSyncRouterData, ParsingError> {
    return map(parseJsonBody(response.body, OpayoRefundResponseSchema), (wire) =>
      withRefundOutcome(data, { connectorRefundId: wire.id, refundStatus: REFUND_STATUS_MAP[wire.status] })
    );
  }
}

export const opayo: Connector<'opayo'> = {
  name: 'opayo',
  baseUrl: (config) => config.opayo.baseUrl,
  integrations: {
    authorize: new OpayoAuthorize(),
    capture: new OpayoCapture(),
    psync: new OpayoPSync(),
    void: new OpayoVoid(),
    execute: new OpayoRefundExecute(),
    rsync: new OpayoRefundSync(),
  },
};
