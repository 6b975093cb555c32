import { describe, it, expect, vi } from 'vitest';
import { ok, unwrap, silentLogger, type Result } from '@payroute/kernel';
import { secret } from '@payroute/masking';
import { ApiClientError, ConnectorError } from '@payroute/errors';
import { FLOWS, type PaymentsAuthorizeRouterData } from '@payroute/domain';
import {
  InMemoryCredentialStore,
  type HttpClient,
  type HttpResponse,
} from '@payroute/connectors-core';
import {
  CONNECTORS,
  createRouterContext,
  isRetryableFlow,
  loadRouterConfig,
  resolveConnectorAuth,
  runFlow,
  RouterError,
} from '../src/index.js';

function stubClient(statusCode: number, body: string): HttpClient {
  return {
    send: vi.fn<HttpClient['send']>(
      async (): Promise<Result<HttpResponse, ApiClientError>> => ok({ statusCode, headers: {}, body })
    ),
  };
}

function context(httpClient: HttpClient = stubClient(200, '{}')) {
  return createRouterContext({
    config: unwrap(loadRouterConfig({})),
    httpClient,
    logger: silentLogger(),
    credentialStore: new InMemoryCredentialStore().set('merchant_1', 'opayo', {
      type: 'header_key',
      apiKey: secret('test-secret'),
    }),
  });
}

function authorizeData(overrides: Partial<PaymentsAuthorizeRouterData> = {}): PaymentsAuthorizeRouterData {
  return {
    flow: 'authorize',
    merchantId: 'merchant_1',
    connector: 'opayo',
    paymentId: 'pay_1',
    attemptId: 'att_1',
    status: 'pending',
    amount: 100,
    currency: 'USD',
    paymentMethod: 'card',
    connectorAuthType: { type: 'header_key', apiKey: secret('test-secret') },
    authType: 'three_ds',
    description: 'Order 1001',
    returnUrl: 'https://merchant.test/3ds/notify',
    address: {
      billing: {
        address: {
          line1: secret('1 Test Street'),
          city: 'London',
          country: 'GB',
          zip: secret('EC1A 1BB'),
          firstName: secret('Sam'),
          lastName: secret('Tester'),
        },
      },
    },
    request: {
      paymentMethodData: {
        type: 'card',
        card: {
          cardNumber: secret('4929000000006'),
          cardExpMonth: secret('03'),
          cardExpYear: secret('2030'),
          cardHolderName: secret('Sam Tester'),
          cardCvc: secret('123'),
          merchantSessionKey: secret('test-session-key'),
          cardIdentifier: secret('test-card-identifier'),
        },
      },
      amount: 100,
      currency: 'USD',
      confirm: true,
      browserInfo: {
        colorDepth: 24,
        javaEnabled: false,
        javaScriptEnabled: true,
        language: 'en-GB',
        screenHeight: 900,
        screenWidth: 1280,
        timeZone: 0,
        ipAddress: '192.0.2.10',
        acceptHeader: 'text/html',
        userAgent: 'Mozilla/5.0 (test)',
      },
    },
    ...overrides,
  };
}

describe('loadRouterConfig', () => {
  it('uses sandbox endpoints when nothing is set', () => {
    const config = unwrap(loadRouterConfig({}));
    expect(config.connectors.opayo.baseUrl).toBe('https://pi-test.sagepay.com/api/v1/');
    expect(config.http.timeoutMs).toBe(30000);
  });

  it('reports invalid values as a configuration error', () => {
    const result = loadRouterConfig({ OPAYO_BASE_URL: 'http://insecure.test/' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(RouterError);
      expect(result.error.kind).toBe('configuration');
      expect(result.error.statusCode).toBe(500);
    }
  });
});

describe('createRouterContext', () => {
  it('registers every connector', () => {
    const ctx = context();
    expect(ctx.registry.list()).toEqual(['opayo', 'authorizedotnet']);
    expect(Object.keys(CONNECTORS)).toEqual(['opayo', 'authorizedotnet']);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(context())).toBe(true);
  });
});

describe('isRetryableFlow', () => {
  it('allows only status syncs', () => {
    expect(FLOWS.filter(isRetryableFlow)).toEqual(['psync', 'rsync']);
  });
});

describe('resolveConnectorAuth', () => {
  it('returns stored credentials', async () => {
    const result = await resolveConnectorAuth(context(), 'merchant_1', 'opayo');
    expect(result.ok && result.value.type).toBe('header_key');
  });

  it('rejects an unknown connector as a validation error', async () => {
    const result = await resolveConnectorAuth(context(), 'merchant_1', 'acme');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('validation');
      expect(result.error.statusCode).toBe(400);
      expect(result.error.message).toBe('Error while validating: An invalid connector name was provided: acme');
    }
  });

  it('reports missing credentials from the store', async () => {
    const result = await resolveConnectorAuth(context(), 'merchant_1', 'authorizedotnet');
    expect(!result.ok && result.error.kind).toBe('database');
  });
});

describe('runFlow', () => {
  it('authorizes through Opayo', async () => {
    const ctx = context(stubClient(201, '{"id":"T-100","status":"succeeded"}'));

    const result = await runFlow(ctx, authorizeData());

    expect(result.ok && result.value.status).toBe('charged');
  });

  it('lifts a missing field into a validation error', async () => {
    const result = await runFlow(context(), authorizeData({ address: {} }));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('validation');
      expect(result.error.cause).toBeInstanceOf(ConnectorError);
      expect(result.error.toProblemJson()).toEqual({
        type: 'urn:payroute:error:validation',
        title: 'Error while validating',
        status: 400,
        detail: 'Error while validating: Missing required field: billing_address',
      });
    }
  });

  it('lifts an unsupported payment method into not_implemented_by_connector', async () => {
    const result = await runFlow(
      context(),
      authorizeData({
        request: {
          ...authorizeData().request,
          paymentMethodData: { type: 'wallet', wallet: { walletType: 'apple_pay' } },
        },
      })
    );

    expect(!result.ok && result.error.kind).toBe('not_implemented_by_connector');
    expect(!result.ok && result.error.statusCode).toBe(500);
  });

  it('keeps the transport error at the bottom of the cause chain', async () => {
    const result = await runFlow(context(stubClient(429, '{"code":"1001","description":"Slow down"}')), authorizeData());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('unexpected');
      const connectorError = result.error.cause;
      expect(connectorError).toBeInstanceOf(ConnectorError);
      if (connectorError instanceof ConnectorError) {
        expect(connectorError.code).toBe('processing_step_failed');
        expect(connectorError.cause).toBeInstanceOf(ApiClientError);
        if (connectorError.cause instanceof ApiClientError) {
          expect(connectorError.cause.code).toBe('too_many_requests_received');
        }
      }
    }
  });

  it('does not dispatch to an unknown connector', async () => {
    const client = stubClient(200, '{}');

    const result = await runFlow(context(client), authorizeData({ connector: 'acme' }));

    expect(!result.ok && result.error.kind).toBe('validation');
    expect(client.send).not.toHaveBeenCalled();
  });
});
