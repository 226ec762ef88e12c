/**
 * @cardcheck/card — structural credit card checks.
 *
 * Pure TypeScript, no I/O. The CLI package handles prompts, output and the
 * card log.
 *
 * @example
 * import { maskCardNumber, validateCard } from "@cardcheck/card";
 *
 * const report = validateCard({
 *   number: "4111111111111111",
 *   expiry: "12/30",
 *   holderName: "Jane Doe",
 *   cvv: "123",
 * });
 * // report.record.cardType === "Visa"
 * // maskCardNumber(report.record.number) === "XXXX-XXXX-XXXX-1111"
 */

// Types
export type {
  CardInput,
  CardRecord,
  CardReport,
  CardType,
  ExpiryDate,
  ExpiryStatus,
} from "./types.ts";
export { CARD_TYPE_LABELS } from "./types.ts";

// Errors
export { CardError, ExpiryFormatError } from "./errors.ts";
export type { CardErrorCode } from "./errors.ts";

// Checks
export { hasValidLength, MAX_CARD_LENGTH, MIN_CARD_LENGTH, passesLuhn } from "./luhn.ts";
export { cvvLengthFor, detectCardType, isCvvValid } from "./issuer.ts";
export {
  classifyExpiry,
  DEFAULT_EXPIRING_SOON_MONTHS,
  monthsUntilExpiry,
  parseExpiry,
} from "./expiry.ts";
export { validateCard } from "./validate.ts";
export type { ValidateOptions } from "./validate.ts";

// Presentation helpers
export { maskCardNumber } from "./mask.ts";
export { formatRiskScore, riskScore } from "./risk.ts";
export type { RandomSource } from "./risk.ts";
