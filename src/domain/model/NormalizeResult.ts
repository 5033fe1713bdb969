import type { FuelSale } from './FuelSale.js';
import type { RejectionReason } from './Rejection.js';

/** Outcome of normalizing one record: exactly one of a value or a reason. */
export type NormalizeResult =
  | { readonly ok: true; readonly value: FuelSale }
  | { readonly ok: false; readonly reason: RejectionReason };

/** Outcome of parsing a single field. */
export type FieldResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: RejectionReason };

export function accepted<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function rejected(reason: RejectionReason): { readonly ok: false; readonly reason: RejectionReason } {
  return { ok: false, reason };
}
