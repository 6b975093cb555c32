/**
 * Supported settlement currencies and their minor-unit exponents.
 *
 * Amounts travel through the router as integers in minor units. Connectors
 * that want a decimal string derive it here, never with float math.
 */

export const CURRENCY_EXPONENTS = {
  AED: 2,
  AUD: 2,
  BHD: 3,
  BRL: 2,
  CAD: 2,
  CHF: 2,
  CLP: 0,
  CNY: 2,
  CZK: 2,
  DKK: 2,
  EUR: 2,
  GBP: 2,
  HKD: 2,
  HUF: 2,
  IDR: 2,
  INR: 2,
  ISK: 0,
  JOD: 3,
  JPY: 0,
  KRW: 0,
  KWD: 3,
  MXN: 2,
  MYR: 2,
  NOK: 2,
  NZD: 2,
  OMR: 3,
  PLN: 2,
  SAR: 2,
  SEK: 2,
  SGD: 2,
  THB: 2,
  TRY: 2,
  USD: 2,
  VND: 0,
  ZAR: 2,
} as const;

export type Currency = keyof typeof CURRENCY_EXPONENTS;

export const CURRENCIES: readonly string[] = Object.keys(CURRENCY_EXPONENTS);

export function isCurrency(value: unknown): value is Currency {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(CURRENCY_EXPONENTS, value);
}

/**
 * Render an integer minor-unit amount as a major-unit decimal string.
 *
 * @example
 * toMajorUnitString(100, 'USD') // '1.00'
 * toMajorUnitString(1500, 'JPY') // '1500'
 * toMajorUnitString(1234, 'KWD') // '1.234'
 */
export function toMajorUnitString(amount: number, currency: Currency): string {
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new RangeError(`Amount ${amount} is not a non-negative safe integer`);
  }
  const exponent = CURRENCY_EXPONENTS[currency];
  if (exponent === 0) {
    return String(amount);
  }
  const digits = String(amount).padStart(exponent + 1, '0');
  return `${digits.slice(0, -exponent)}.${digits.slice(-exponent)}`;
}
