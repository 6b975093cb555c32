/**
 * Connector-agnostic enumerations.
 *
 * Every connector maps its own vocabulary onto these sets; nothing
 * connector-specific is allowed to appear in a value typed with them.
 */

export const ATTEMPT_STATUSES = [
  'started',
  'authentication_failed',
  'router_declined',
  'pending_vbv',
  'vbv_successful',
  'authorized',
  'authorization_failed',
  'charged',
  'authorizing',
  'cod_initiated',
  'voided',
  'void_initiated',
  'capture_initiated',
  'capture_failed',
  'void_failed',
  'auto_refunded',
  'partial_charged',
  'failure',
  'pending',
] as const;

export type AttemptStatus = (typeof ATTEMPT_STATUSES)[number];

export const DEFAULT_ATTEMPT_STATUS: AttemptStatus = 'pending';

export const REFUND_STATUSES = [
  'failure',
  'manual_review',
  'pending',
  'success',
  'transaction_failure',
] as const;

export type RefundStatus = (typeof REFUND_STATUSES)[number];

export type PaymentMethodType = 'card' | 'wallet' | 'bank_transfer' | 'pay_later';

export type AuthenticationType = 'three_ds' | 'no_three_ds';

export type CaptureMethod = 'automatic' | 'manual';
