/**
 * @module expiry
 *
 * Parsing and classification of MM/YY expiry dates.
 */

import { ExpiryFormatError } from "./errors.ts";
import type { ExpiryDate, ExpiryStatus } from "./types.ts";

/** Months ahead of today that still count as "expiring soon". */
export const DEFAULT_EXPIRING_SOON_MONTHS = 6;

const EXPIRY_PATTERN = /^(\d{2})\/(\d{2})$/;

/**
 * Parse an expiry in `MM/YY` form. Two-digit years map to 20YY.
 *
 * @throws ExpiryFormatError when the text is not MM/YY or the month is out of range
 */
export function parseExpiry(text: string): ExpiryDate {
  const match = EXPIRY_PATTERN.exec(text);
  if (!match) throw new ExpiryFormatError(text);

  const month = Number(match[1]);
  const year = 2000 + Number(match[2]);
  if (month < 1 || month > 12) throw new ExpiryFormatError(text);

  return { month, year, raw: text };
}

/**
 * Number of whole months from the current month to the expiry month.
 * Zero means the card expires this month; negative means already expired.
 */
export function monthsUntilExpiry(
  expiry: Pick<ExpiryDate, "month" | "year">,
  now: Date,
): number {
  const current = now.getFullYear() * 12 + (now.getMonth() + 1);
  return expiry.year * 12 + expiry.month - current;
}

/**
 * Classify an expiry date against `now` (local calendar month).
 * A card stays usable through the last day of its expiry month.
 */
export function classifyExpiry(
  expiry: Pick<ExpiryDate, "month" | "year">,
  now: Date,
  soonMonths: number = DEFAULT_EXPIRING_SOON_MONTHS,
): ExpiryStatus {
  const remaining = monthsUntilExpiry(expiry, now);
  if (remaining < 0) return "Expired";
  if (remaining <= soonMonths) return "ExpiringSoon";
  return "Valid";
}
