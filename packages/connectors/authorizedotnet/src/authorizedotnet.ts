import { ok, err, map, chain, type Result } from '@payroute/kernel';
import { missingRequiredField, type ConnectorError, type ParsingError } from '@payroute/errors';
import type {
  CaptureMethod,
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
  parseJsonBody,
  type Connector,
  type HttpResponse,
} from '@payroute/connectors-core';
import {
  CreateTransactionResponseSchema,
  ErrorBodySchema,
  REFUND_RESPONSE_STATUS_MAP,
  REFUND_TRANSACTION_STATUS_MAP,
  TRANSACTION_STATUS_MAP,
  TransactionDetailsResponseSchema,
  attemptStatusForResponseCode,
  createTransactionRequest,
  toAuthorizeTransaction,
  toCaptureTransaction,
  toErrorResponse,
  toMerchantAuthentication,
  toRefundTransaction,
  toVoidTransaction,
  transactionDetailsRequest,
  type CreateTransactionResponse,
  type MerchantAuthentication,
  type PaymentResponseFlow,
  type TransactionDetailsResponse,
} from './transformers.js';

function reducePayment<F extends Flow, Req>(
  data: RouterData<F, Req, PaymentsResponseData>,
  wire: CreateTransactionResponse,
  flow: PaymentResponseFlow,
  statusCode: number,
  captureMethod?: CaptureMethod
): RouterData<F, Req, PaymentsResponseData> {
  const transaction = wire.transactionResponse;
  if (!transaction) {
    return { ...data, status: 'failure', response: err(toErrorResponse(wire.messages, undefined, statusCode)) };
  }

  const status = attemptStatusForResponseCode(transaction.responseCode, flow, captureMethod);
  if (transaction.responseCode === '2' || transaction.responseCode === '3') {
    return { ...data, status, response: err(toErrorResponse(wire.messages, transaction, statusCode)) };
  }

  const outcome: PaymentsResponseData = {
    resourceId: { type: 'connector_transaction_id', id: transaction.transId },
    redirect: false,
  };
  return { ...data, status, response: ok(outcome) };
}

function reducePaymentDetails<F extends Flow, Req>(
  data: RouterData<F, Req, PaymentsResponseData>,
  wire: TransactionDetailsResponse,
  statusCode: number
): RouterData<F, Req, PaymentsResponseData> {
  if (!wire.transaction) {
    return { ...data, response: err(toErrorResponse(wire.messages, undefined, statusCode)) };
  }
  const outcome: PaymentsResponseData = {
    resourceId: { type: 'connector_transaction_id', id: wire.transaction.transId },
    redirect: false,
  };
  return { ...data, status: TRANSACTION_STATUS_MAP[wire.transaction.transactionStatus], response: ok(outcome) };
}

function withRefundOutcome<F extends Flow>(
  data: RouterData<F, RefundsData, RefundsResponseData>,
  outcome: RefundsResponseData
): RouterData<F, RefundsData, RefundsResponseData> {
  return { ...data, response: ok(outcome) };
}

/**
 * Single endpoint, credentials in the body, JSON both ways
 */
abstract class AuthorizedotnetIntegration<F extends Flow> extends BaseConnectorIntegration<F> {
  getUrl(_data: FlowRouterData<F>, baseUrl: string): Result<string, ConnectorError> {
    return ok(baseUrl);
  }

  override getRequestBody(data: FlowRouterData<F>): Result<string | undefined, ConnectorError> {
    return chain(toMerchantAuthentication(data.connectorAuthType), (auth) =>
      chain(this.buildPayload(data, auth), encodeJson)
    );
  }

  getErrorResponse(response: HttpResponse): Result<ErrorResponse, ParsingError> {
    return map(parseJsonBody(response.body, ErrorBodySchema), (body) =>
      toErrorResponse(body.messages, undefined, response.statusCode)
    );
  }

  protected abstract buildPayload(
    data: FlowRouterData<F>,
    auth: MerchantAuthentication
  ): Result<unknown, ConnectorError>;
}

export class AuthorizedotnetAuthorize extends AuthorizedotnetIntegration<'authorize'> {
  protected buildPayload(
    data: PaymentsAuthorizeRouterData,
    auth: MerchantAuthentication
  ): Result<unknown, ConnectorError> {
    return map(toAuthorizeTransaction(data.request), (transaction) =>
      createTransactionRequest(auth, transaction, data.request.idempotencyKey ?? data.paymentId)
    );
  }

  handleResponse(
    data: PaymentsAuthorizeRouterData,
    response: HttpResponse
  ): Result<PaymentsAuthorizeRouterData, ParsingError> {
    return map(parseJsonBody(response.body, CreateTransactionResponseSchema), (wire) =>
      reducePayment(data, wire, 'authorize', response.statusCode, data.request.captureMethod)
    );
  }
}

export class AuthorizedotnetCapture extends AuthorizedotnetIntegration<'capture'> {
  protected buildPayload(
    data: PaymentsCaptureRouterData,
    auth: MerchantAuthentication
  ): Result<unknown, ConnectorError> {
    const { connectorTransactionId, amountToCapture, currency } = data.request;
    const transaction = toCaptureTransaction({
      refTransId: connectorTransactionId,
      amountToCapture,
      paymentAmount: data.amount,
      currency,
    });
    return map(transaction, (request) => createTransactionRequest(auth, request, data.paymentId));
  }

  handleResponse(
    data: PaymentsCaptureRouterData,
    response: HttpResponse
  ): Result<PaymentsCaptureRouterData, ParsingError> {
    return map(parseJsonBody(response.body, CreateTransactionResponseSchema), (wire) =>
      reducePayment(data, wire, 'capture', response.statusCode)
    );
  }
}

export class AuthorizedotnetPSync extends AuthorizedotnetIntegration<'psync'> {
  protected buildPayload(
    data: PaymentsSyncRouterData,
    auth: MerchantAuthentication
  ): Result<unknown, ConnectorError> {
    return ok(transactionDetailsRequest(auth, data.request.connectorTransactionId));
  }

  handleResponse(data: PaymentsSyncRouterData, response: HttpResponse): Result<PaymentsSyncRouterData, ParsingError> {
    return map(parseJsonBody(response.body, TransactionDetailsResponseSchema), (wire) =>
      reducePaymentDetails(data, wire, response.statusCode)
    );
  }
}

export class AuthorizedotnetVoid extends AuthorizedotnetIntegration<'void'> {
  protected buildPayload(
    data: PaymentsCancelRouterData,
    auth: MerchantAuthentication
  ): Result<unknown, ConnectorError> {
    const transaction = toVoidTransaction(data.request.connectorTransactionId);
    return ok(createTransactionRequest(auth, transaction, data.paymentId));
  }

  handleResponse(
    data: PaymentsCancelRouterData,
    response: HttpResponse
  ): Result<PaymentsCancelRouterData, ParsingError> {
    return map(parseJsonBody(response.body, CreateTransactionResponseSchema), (wire) =>
      reducePayment(data, wire, 'void', response.statusCode)
    );
  }
}

export class AuthorizedotnetRefundExecute extends AuthorizedotnetIntegration<'execute'> {
  protected buildPayload(
    data: RefundExecuteRouterData,
    auth: MerchantAuthentication
  ): Result<unknown, ConnectorError> {
    const { request } = data;
    return map(
      toRefundTransaction({
        paymentMethodData: request.paymentMethodData,
        refTransId: request.connectorTransactionId,
        refundAmount: request.refundAmount,
        paymentAmount: request.paymentAmount,
        currency: request.currency,
      }),
      (transaction) => createTransactionRequest(auth, transaction, request.refundId)
    );
  }

  /**
   * A declined refund is still a refund outcome; only a refused request
   * attaches an error.
   */
  handleResponse(
    data: RefundExecuteRouterData,
    response: HttpResponse
  ): Result<RefundExecuteRouterData, ParsingError> {
    return map(parseJsonBody(response.body, CreateTransactionResponseSchema), (wire) => {
      const transaction = wire.transactionResponse;
      if (!transaction) {
        return { ...data, response: err(toErrorResponse(wire.messages, undefined, response.statusCode)) };
      }
      return withRefundOutcome(data, {
        connectorRefundId: transaction.transId,
        refundStatus: REFUND_RESPONSE_STATUS_MAP[transaction.responseCode],
      });
    });
  }
}

export class AuthorizedotnetRefundSync extends AuthorizedotnetIntegration<'rsync'> {
  protected buildPayload(
    data: RefundSyncRouterData,
    auth: MerchantAuthentication
  ): Result<unknown, ConnectorError> {
    const refundId = data.request.connectorRefundId;
    if (refundId === undefined) {
      return err(missingRequiredField('connector_refund_id'));
    }
    return ok(transactionDetailsRequest(auth, refundId));
  }

  handleResponse(data: RefundSyncRouterData, response: HttpResponse): Result<RefundSyncRouterData, ParsingError> {
    return map(parseJsonBody(response.body, TransactionDetailsResponseSchema), (wire) => {
      if (!wire.transaction) {
        return { ...data, response: err(toErrorResponse(wire.messages, undefined, response.statusCode)) };
      }
      return withRefundOutcome(data, {
        connectorRefundId: wire.transaction.transId,
        refundStatus: REFUND_TRANSACTION_STATUS_MAP[wire.transaction.transactionStatus],
      });
    });
  }
}

export const authorizedotnet: Connector<'authorizedotnet'> = {
  name: 'authorizedotnet',
  baseUrl: (config) => config.authorizedotnet.baseUrl,
  integrations: {
    authorize: new AuthorizedotnetAuthorize(),
    capture: new AuthorizedotnetCapture(),
    psync: new AuthorizedotnetPSync(),
    void: new AuthorizedotnetVoid(),
    execute: new AuthorizedotnetRefundExecute(),
    rsync: new AuthorizedotnetRefundSync(),
  },
};
