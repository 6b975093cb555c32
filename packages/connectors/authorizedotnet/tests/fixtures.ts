import { secret } from '@payroute/masking';
import type { PaymentMethodData, PaymentsAuthorizeRouterData, RefundExecuteRouterData } from '@payroute/domain';

export type Common = Omit<PaymentsAuthorizeRouterData, 'flow' | 'request' | 'response'>;

export function card(overrides: { number?: string; month?: string; year?: string } = {}): PaymentMethodData {
  return {
    type: 'card',
    card: {
      cardNumber: secret(overrides.number ?? '5424000000000015'),
      cardExpMonth: secret(overrides.month ?? '10'),
      cardExpYear: secret(overrides.year ?? '2025'),
      cardHolderName: secret('John Doe'),
      cardCvc: secret('999'),
    },
  };
}

export function common(): Common {
  return {
    merchantId: 'merchant_1',
    connector: 'authorizedotnet',
    paymentId: 'pay_1',
    attemptId: 'att_1',
    status: 'pending',
    amount: 100,
    currency: 'USD',
    paymentMethod: 'card',
    connectorAuthType: { type: 'body_key', apiKey: secret('test-login'), key1: secret('test-secret') },
    authType: 'no_three_ds',
    description: 'This is a test',
    address: {},
  };
}

export function authorizeData(overrides: Partial<PaymentsAuthorizeRouterData> = {}): PaymentsAuthorizeRouterData {
  return {
    ...common(),
    flow: 'authorize',
    request: { paymentMethodData: card(), amount: 100, currency: 'USD', confirm: true },
    ...overrides,
  };
}

export function refundData(overrides: Partial<RefundExecuteRouterData['request']> = {}): RefundExecuteRouterData {
  return {
    ...common(),
    flow: 'execute',
    request: {
      refundId: 'ref_1',
      connectorTransactionId: '60123456789',
      refundAmount: 1,
      paymentAmount: 100,
      currency: 'USD',
      paymentMethodData: card(),
      ...overrides,
    },
  };
}

export const APPROVED = JSON.stringify({
  transactionResponse: {
    responseCode: '1',
    authCode: 'ABC123',
    transId: '60123456789',
    accountNumber: 'XXXX0015',
    messages: [{ code: '1', description: 'This transaction has been approved.' }],
  },
  refId: 'pay_1',
  messages: { resultCode: 'Ok', message: [{ code: 'I00001', text: 'Successful.' }] },
});

export function transactionResult(responseCode: '1' | '2' | '3' | '4', transId = '60123456789'): string {
  const declined = responseCode === '2' || responseCode === '3';
  return JSON.stringify({
    transactionResponse: {
      responseCode,
      transId,
      ...(declined ? { errors: [{ errorCode: responseCode, errorText: 'This transaction has been declined.' }] } : {}),
    },
    messages: declined
      ? { resultCode: 'Error', message: [{ code: 'E00027', text: 'The transaction was unsuccessful.' }] }
      : { resultCode: 'Ok', message: [{ code: 'I00001', text: 'Successful.' }] },
  });
}

export const AUTHENTICATION_FAILED = JSON.stringify({
  messages: {
    resultCode: 'Error',
    message: [{ code: 'E00007', text: 'User authentication failed due to invalid authentication values.' }],
  },
});

export function transactionDetails(transactionStatus: string, transId = '60123456789'): string {
  return JSON.stringify({
    transaction: { transId, transactionStatus },
    messages: { resultCode: 'Ok', message: [{ code: 'I00001', text: 'Successful.' }] },
  });
}
