import type { Secret } from '@payroute/masking';
import type { PaymentMethodType } from './enums.js';

/**
 * Card details. Every field is secret; connectors expose only what their
 * wire format needs.
 */
export interface Card {
  cardNumber: Secret<string>;
  cardExpMonth: Secret<string>;
  cardExpYear: Secret<string>;
  cardHolderName: Secret<string>;
  cardCvc: Secret<string>;
  /** Session key from a gateway's hosted tokenization step */
  merchantSessionKey?: Secret<string>;
  /** Gateway-issued token standing in for the card number */
  cardIdentifier?: Secret<string>;
}

export type WalletType = 'apple_pay' | 'google_pay' | 'paypal';

export interface Wallet {
  walletType: WalletType;
  /** Wallet-issued payment token */
  token?: Secret<string>;
}

export interface BankTransfer {
  bankName?: string;
  accountNumber: Secret<string>;
  routingNumber: Secret<string>;
}

export interface PayLater {
  provider: 'klarna' | 'affirm' | 'afterpay_clearpay';
  billingEmail: Secret<string>;
}

export type PaymentMethodData =
  | { type: 'card'; card: Card }
  | { type: 'wallet'; wallet: Wallet }
  | { type: 'bank_transfer'; bankTransfer: BankTransfer }
  | { type: 'pay_later'; payLater: PayLater };

export function paymentMethodTypeOf(data: PaymentMethodData): PaymentMethodType {
  return data.type;
}
