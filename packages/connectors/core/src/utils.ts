/**
 * Helpers shared by connector transformers
 */
import type { z } from 'zod';
import { ok, err, type Result } from '@payroute/kernel';
import { encodeWithSecrets } from '@payroute/masking';
import { ParsingError, invalidDataFormat, requestEncodingFailed, type ConnectorError } from '@payroute/errors';

const BOM = '\uFEFF';

/**
 * Decode a connector body and check it against its wire schema.
 *
 * Some gateways prefix JSON with a byte order mark; it is dropped first.
 */
export function parseJsonBody<T>(body: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Result<T, ParsingError> {
  const text = body.startsWith(BOM) ? body.slice(BOM.length) : body;

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return err(new ParsingError('Response body is not valid JSON', { cause: error }));
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return err(new ParsingError(`Response body does not match wire schema${where}`, { cause: parsed.error }));
  }
  return ok(parsed.data);
}

/**
 * Encode a wire request, disclosing its secret fields
 */
export function encodeJson(payload: unknown): Result<string, ConnectorError> {
  try {
    return ok(encodeWithSecrets(payload));
  } catch (error) {
    return err(requestEncodingFailed(error));
  }
}

/**
 * Amounts leave the router as positive whole numbers of minor units; zero,
 * negative, fractional and non-finite values are rejected naming the field.
 */
export function requirePositiveMinorUnits(fieldName: string, amount: number): Result<number, ConnectorError> {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    return err(invalidDataFormat(fieldName));
  }
  return ok(amount);
}

/**
 * Check a refund amount, which may not exceed the amount of the payment it
 * refunds.
 */
export function requireRefundAmount(request: {
  refundAmount: number;
  paymentAmount: number;
}): Result<number, ConnectorError> {
  const amount = requirePositiveMinorUnits('refund_amount', request.refundAmount);
  if (amount.ok && amount.value > request.paymentAmount) {
    return err(invalidDataFormat('refund_amount'));
  }
  return amount;
}

/**
 * Append a path to a base URL. Leading slashes on the path are ignored.
 */
export function joinUrl(baseUrl: string, path: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return `${base}${path.replace(/^\/+/, '')}`;
}
