import { CardError } from "./errors.ts";
import { classifyExpiry, DEFAULT_EXPIRING_SOON_MONTHS, parseExpiry } from "./expiry.ts";
import { detectCardType, isCvvValid } from "./issuer.ts";
import { hasValidLength, passesLuhn } from "./luhn.ts";
import type { CardInput, CardReport } from "./types.ts";

export interface ValidateOptions {
  /** Reference date for expiry classification. Default: current time. */
  now?: Date;
  /** Upper bound (in months) of the "expiring soon" window. Default: 6. */
  expiringSoonMonths?: number;
}

/**
 * Run the structural checks on a card and build its report.
 *
 * Length and Luhn failures are hard errors. CVV and expiry problems are
 * reported in the result rather than thrown; only unparseable expiry text
 * throws.
 *
 * @throws CardError when the number has the wrong length or fails the checksum
 * @throws ExpiryFormatError when the expiry is not MM/YY
 */
export function validateCard(
  input: CardInput,
  options: ValidateOptions = {},
): CardReport {
  const now = options.now ?? new Date();
  const soonMonths = options.expiringSoonMonths ?? DEFAULT_EXPIRING_SOON_MONTHS;

  if (!hasValidLength(input.number)) throw new CardError("INVALID_LENGTH");
  if (!passesLuhn(input.number)) throw new CardError("LUHN_FAILED");

  const expiry = parseExpiry(input.expiry);
  const cardType = detectCardType(input.number);

  return {
    record: {
      number: input.number,
      expiry,
      holderName: input.holderName,
      cvv: input.cvv,
      cardType,
    },
    cvvValid: isCvvValid(input.cvv, cardType),
    expiryStatus: classifyExpiry(expiry, now, soonMonths),
  };
}
