/**
 * Error types raised by the card validator.
 */

export type CardErrorCode = "INVALID_LENGTH" | "LUHN_FAILED";

const USER_MESSAGES: Record<CardErrorCode, string> = {
  INVALID_LENGTH: "❌ Invalid card number length!",
  LUHN_FAILED: "❌ Card number failed Luhn check! Invalid.",
};

/**
 * A card number that fails a structural check.
 * `message` is the line shown to the user.
 */
export class CardError extends Error {
  readonly code: CardErrorCode;

  constructor(code: CardErrorCode) {
    super(USER_MESSAGES[code]);
    this.name = "CardError";
    this.code = code;
  }
}

/**
 * Expiry text that is not a valid MM/YY date.
 */
export class ExpiryFormatError extends Error {
  readonly input: string;

  constructor(input: string) {
    super(`Invalid expiry date: "${input}" (expected MM/YY)`);
    this.name = "ExpiryFormatError";
    this.input = input;
  }
}
