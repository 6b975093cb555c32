/**
 * Flow markers
 *
 * A flow names the operation being performed. It carries no data and no
 * behavior; it is only the key that selects which integration of a
 * connector handles a RouterData envelope.
 */

export const FLOWS = ['authorize', 'capture', 'psync', 'void', 'execute', 'rsync'] as const;

export type Flow = (typeof FLOWS)[number];

/** Authorize (and optionally capture) a payment */
export type Authorize = 'authorize';
/** Capture a previously authorized payment */
export type Capture = 'capture';
/** Fetch the current status of a payment */
export type PSync = 'psync';
/** Cancel an authorization before capture */
export type Void = 'void';
/** Execute a refund */
export type Execute = 'execute';
/** Fetch the current status of a refund */
export type RSync = 'rsync';

export type PaymentFlow = Authorize | Capture | PSync | Void;
export type RefundFlow = Execute | RSync;

export function isFlow(value: unknown): value is Flow {
  return FLOWS.some((flow) => flow === value);
}
