/**
 * Monthly Limit Policy
 *
 * Pure decision: may a proposed expense be applied without pushing the
 * month's total past the limit? The limit itself is allowed (inclusive).
 */

import type Decimal from 'decimal.js';
import { ZERO } from './money';

export interface LimitInput {
  /** Month total before the change */
  currentTotal: Decimal;
  /** Amount already recorded on the same date, if any */
  existingAmount: Decimal | null;
  proposed: Decimal;
  limit: Decimal;
}

export type LimitDecision =
  | {
      kind: 'accept';
      newTotal: Decimal;
      /** Amount the day's record will hold after the merge */
      recordAmount: Decimal;
    }
  | {
      kind: 'reject';
      current: Decimal;
      attempted: Decimal;
      limit: Decimal;
    };

export function decide({ currentTotal, existingAmount, proposed, limit }: LimitInput): LimitDecision {
  const existing = existingAmount ?? ZERO;

  // A second expense on the same day adds to the existing record
  const recordAmount = existing.plus(proposed);
  const newTotal = currentTotal.minus(existing).plus(recordAmount);

  if (newTotal.gt(limit)) {
    return { kind: 'reject', current: currentTotal, attempted: proposed, limit };
  }

  return { kind: 'accept', newTotal, recordAmount };
}
