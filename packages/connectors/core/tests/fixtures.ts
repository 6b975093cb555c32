import { z } from 'zod';
import { ok, err, type Result } from '@payroute/kernel';
import { secret } from '@payroute/masking';
import { ParsingError, failedToObtainAuthType, type ConnectorError } from '@payroute/errors';
import type {
  ErrorResponse,
  Flow,
  FlowRouterData,
  PaymentsAuthorizeRouterData,
  PaymentsCancelRouterData,
  PaymentsResponseData,
} from '@payroute/domain';
import {
  BaseConnectorIntegration,
  encodeJson,
  joinUrl,
  parseJsonBody,
  type Connector,
  type HeaderValue,
  type HttpResponse,
} from '../src/index.js';

const PaymentBody = z.object({
  id: z.string(),
  status: z.enum(['succeeded', 'failed']),
});

const ErrorBody = z.object({ code: z.string(), message: z.string() });

export class StubAuthorize extends BaseConnectorIntegration<'authorize'> {
  override getHeaders(data: PaymentsAuthorizeRouterData): Result<Record<string, HeaderValue>, ConnectorError> {
    if (data.connectorAuthType.type !== 'header_key') {
      return err(failedToObtainAuthType());
    }
    return ok({ 'Content-Type': this.getContentType(), Authorization: data.connectorAuthType.apiKey });
  }

  getUrl(_data: PaymentsAuthorizeRouterData, baseUrl: string): Result<string, ConnectorError> {
    return ok(joinUrl(baseUrl, 'payments'));
  }

  override getRequestBody(data: PaymentsAuthorizeRouterData): Result<string | undefined, ConnectorError> {
    return encodeJson({ amount: data.request.amount, currency: data.request.currency });
  }

  handleResponse(
    data: PaymentsAuthorizeRouterData,
    response: HttpResponse
  ): Result<PaymentsAuthorizeRouterData, ParsingError> {
    const parsed = parseJsonBody(response.body, PaymentBody);
    if (!parsed.ok) {
      return parsed;
    }
    const outcome: PaymentsResponseData = {
      resourceId: { type: 'connector_transaction_id', id: parsed.value.id },
      redirect: false,
    };
    const next: PaymentsAuthorizeRouterData = {
      ...data,
      status: parsed.value.status === 'succeeded' ? 'charged' : 'failure',
      response: ok(outcome),
    };
    return ok(next);
  }

  getErrorResponse(response: HttpResponse): Result<ErrorResponse, ParsingError> {
    const parsed = parseJsonBody(response.body, ErrorBody);
    if (!parsed.ok) {
      return parsed;
    }
    return ok({ code: parsed.value.code, message: parsed.value.message, statusCode: response.statusCode });
  }
}

/**
 * Reducer that forgets to attach an outcome
 */
export class Unreduced<F extends Flow> extends BaseConnectorIntegration<F> {
  getUrl(_data: FlowRouterData<F>, baseUrl: string): Result<string, ConnectorError> {
    return ok(baseUrl);
  }

  handleResponse(data: FlowRouterData<F>): Result<FlowRouterData<F>, ParsingError> {
    return ok(data);
  }

  getErrorResponse(): Result<ErrorResponse, ParsingError> {
    return err(new ParsingError('no error body'));
  }
}

export const stubConnector: Connector<'stub'> = {
  name: 'stub',
  baseUrl: () => 'https://stub.test/',
  integrations: {
    authorize: new StubAuthorize(),
    capture: new Unreduced<'capture'>(),
    psync: new Unreduced<'psync'>(),
    void: new Unreduced<'void'>(),
    execute: new Unreduced<'execute'>(),
    rsync: new Unreduced<'rsync'>(),
  },
};

export function authorizeData(overrides: Partial<PaymentsAuthorizeRouterData> = {}): PaymentsAuthorizeRouterData {
  return {
    flow: 'authorize',
    merchantId: 'merchant_1',
    connector: 'stub',
    paymentId: 'pay_1',
    attemptId: 'att_1',
    status: 'pending',
    amount: 100,
    currency: 'USD',
    paymentMethod: 'card',
    connectorAuthType: { type: 'header_key', apiKey: secret('test-secret') },
    authType: 'no_three_ds',
    address: {},
    request: {
      paymentMethodData: {
        type: 'card',
        card: {
          cardNumber: secret('4111111111111111'),
          cardExpMonth: secret('12'),
          cardExpYear: secret('2030'),
          cardHolderName: secret('Test Holder'),
          cardCvc: secret('123'),
        },
      },
      amount: 100,
      currency: 'USD',
      confirm: true,
    },
    ...overrides,
  };
}

export function voidData(): PaymentsCancelRouterData {
  const { request: _request, flow: _flow, ...common } = authorizeData();
  return {
    ...common,
    flow: 'void',
    request: { connectorTransactionId: 'txn_1' },
  };
}
