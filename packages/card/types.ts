/**
 * @module types
 *
 * Core card types shared by the validator and the CLI.
 */

/** Card networks recognised from the leading digits (IIN). */
export type CardType = "Visa" | "MasterCard" | "AmericanExpress" | "Unknown";

/** Human-readable label for each card type. */
export const CARD_TYPE_LABELS: Record<CardType, string> = {
  Visa: "Visa",
  MasterCard: "MasterCard",
  AmericanExpress: "American Express",
  Unknown: "Unknown",
};

/** Expiry window relative to the current month. */
export type ExpiryStatus = "Expired" | "ExpiringSoon" | "Valid";

/** Parsed expiry date. */
export interface ExpiryDate {
  /** 1-12 */
  month: number;
  /** Four-digit year. */
  year: number;
  /** Text as entered, e.g. "09/27". */
  raw: string;
}

/** Raw fields as collected from the user. */
export interface CardInput {
  number: string;
  expiry: string;
  holderName: string;
  cvv: string;
}

export interface CardRecord {
  number: string;
  expiry: ExpiryDate;
  holderName: string;
  /** Digits as entered; validated by its integer value. */
  cvv: string;
  cardType: CardType;
}

/** Outcome of a successful structural validation. */
export interface CardReport {
  record: CardRecord;
  cvvValid: boolean;
  expiryStatus: ExpiryStatus;
}
