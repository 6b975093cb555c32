import { secret } from '@payroute/masking';
import type {
  AddressDetails,
  PaymentsAuthorizeData,
  PaymentsAuthorizeRouterData,
  RefundExecuteRouterData,
} from '@payroute/domain';

export type Common = Omit<PaymentsAuthorizeRouterData, 'flow' | 'request' | 'response'>;

export function common(): Common {
  return {
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
    address: { billing: { address: billingDetails() } },
  };
}

export function billingDetails(): AddressDetails {
  return {
    line1: secret('1 Test Street'),
    city: 'London',
    country: 'GB',
    zip: secret('EC1A 1BB'),
    firstName: secret('Sam'),
    lastName: secret('Tester'),
  };
}

export function authorizeRequest(overrides: Partial<PaymentsAuthorizeData> = {}): PaymentsAuthorizeData {
  return {
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
    captureMethod: 'automatic',
    browserInfo: {
      colorDepth: 24,
      javaEnabled: false,
      javaScriptEnabled: true,
      language: 'en-GB',
      screenHeight: 900,
      screenWidth: 450,
      timeZone: 0,
      ipAddress: '192.0.2.10',
      acceptHeader: 'text/html',
      userAgent: 'Mozilla/5.0 (test)',
    },
    ...overrides,
  };
}

export function authorizeData(overrides: Partial<PaymentsAuthorizeRouterData> = {}): PaymentsAuthorizeRouterData {
  return {
    ...common(),
    flow: 'authorize',
    request: authorizeRequest(),
    ...overrides,
  };
}

export function refundData(overrides: Partial<RefundExecuteRouterData['request']> = {}): RefundExecuteRouterData {
  return {
    ...common(),
    flow: 'execute',
    request: {
      refundId: 'ref_1',
      connectorTransactionId: 'T-100',
      refundAmount: 40,
      paymentAmount: 100,
      currency: 'USD',
      reason: 'Damaged item',
      paymentMethodData: authorizeRequest().paymentMethodData,
      ...overrides,
    },
  };
}
