import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { secret } from '@payroute/masking';
import {
  encodeJson,
  joinUrl,
  parseJsonBody,
  requirePositiveMinorUnits,
  requireRefundAmount,
  InMemoryCredentialStore,
} from '../src/index.js';

const Body = z.object({ status: z.enum(['ok', 'failed']) });

describe('parseJsonBody', () => {
  it('parses a body that matches the schema', () => {
    expect(parseJsonBody('{"status":"ok"}', Body)).toEqual({ ok: true, value: { status: 'ok' } });
  });

  it('drops a leading byte order mark', () => {
    expect(parseJsonBody('\uFEFF{"status":"failed"}', Body)).toEqual({ ok: true, value: { status: 'failed' } });
  });

  it('rejects malformed JSON', () => {
    const result = parseJsonBody('{"status":', Body);
    expect(!result.ok && result.error.message).toBe('Response body is not valid JSON');
    expect(!result.ok && result.error.layer).toBe('parsing');
  });

  it('names the first offending path', () => {
    const result = parseJsonBody('{"status":"unknown"}', Body);
    expect(!result.ok && result.error.message).toBe('Response body does not match wire schema at status');
  });
});

describe('requirePositiveMinorUnits', () => {
  it('passes whole positive amounts through', () => {
    expect(requirePositiveMinorUnits('amount', 1999)).toEqual({ ok: true, value: 1999 });
  });

  it.each([0, -100, 10.5, Number.NaN, Number.POSITIVE_INFINITY])('rejects %s', (amount) => {
    const result = requirePositiveMinorUnits('amount', amount);
    expect(!result.ok && result.error.code).toBe('invalid_data_format');
    expect(!result.ok && result.error.fieldName).toBe('amount');
  });
});

describe('requireRefundAmount', () => {
  it('accepts a partial refund', () => {
    expect(requireRefundAmount({ refundAmount: 400, paymentAmount: 1000 })).toEqual({ ok: true, value: 400 });
  });

  it('accepts a full refund', () => {
    expect(requireRefundAmount({ refundAmount: 1000, paymentAmount: 1000 })).toEqual({ ok: true, value: 1000 });
  });

  it.each<[number, number]>([
    [1001, 1000],
    [-40, 1000],
    [0, 1000],
  ])('rejects refunding %i of %i', (refundAmount, paymentAmount) => {
    const result = requireRefundAmount({ refundAmount, paymentAmount });
    expect(!result.ok && result.error.code).toBe('invalid_data_format');
    expect(!result.ok && result.error.fieldName).toBe('refund_amount');
  });
});

describe('encodeJson', () => {
  it('discloses secrets in the encoded payload', () => {
    expect(encodeJson({ card: { number: secret('4111111111111111') }, amount: 100 })).toEqual({
      ok: true,
      value: '{"card":{"number":"4111111111111111"},"amount":100}',
    });
  });

  it('reports payloads that cannot be encoded', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    const result = encodeJson(cyclic);
    expect(!result.ok && result.error.code).toBe('request_encoding_failed');
  });
});

describe('joinUrl', () => {
  it('joins with exactly one slash', () => {
    expect(joinUrl('https://pi-test.sagepay.com/api/v1/', 'transactions')).toBe(
      'https://pi-test.sagepay.com/api/v1/transactions'
    );
    expect(joinUrl('https://pi-test.sagepay.com/api/v1', '/transactions')).toBe(
      'https://pi-test.sagepay.com/api/v1/transactions'
    );
  });
});

describe('InMemoryCredentialStore', () => {
  it('finds stored credentials by merchant and connector', async () => {
    const auth = { type: 'header_key', apiKey: secret('test-secret') } as const;
    const store = new InMemoryCredentialStore().set('merchant_1', 'opayo', auth);

    expect(await store.findConnectorAuth('merchant_1', 'opayo')).toEqual({ ok: true, value: auth });
  });

  it('answers value_not_found for anything else', async () => {
    const store = new InMemoryCredentialStore();
    const result = await store.findConnectorAuth('merchant_1', 'opayo');
    expect(!result.ok && result.error.code).toBe('value_not_found');
    expect(!result.ok && result.error.message).toBe('ValueNotFound: connector account opayo for merchant merchant_1');
  });
});
