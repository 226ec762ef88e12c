import type { CardType } from "./types.ts";

const PREFIXES: ReadonlyArray<[prefix: string, type: CardType]> = [
  ["4", "Visa"],
  ["51", "MasterCard"],
  ["52", "MasterCard"],
  ["34", "AmericanExpress"],
  ["37", "AmericanExpress"],
];

/**
 * Classify the issuer from the leading digits (IIN).
 *
 * @example
 * detectCardType("4111111111111111"); // "Visa"
 * detectCardType("6011000000000004"); // "Unknown"
 */
export function detectCardType(number: string): CardType {
  for (const [prefix, type] of PREFIXES) {
    if (number.startsWith(prefix)) return type;
  }
  return "Unknown";
}

/** CVV digit count required by a card type. */
export function cvvLengthFor(type: CardType): 3 | 4 {
  return type === "AmericanExpress" ? 4 : 3;
}

/**
 * The CVV is read as an integer, so leading zeros do not count towards its
 * length: "012" has two digits.
 */
export function isCvvValid(cvv: string, type: CardType): boolean {
  if (!/^\d+$/.test(cvv)) return false;
  return String(Number.parseInt(cvv, 10)).length === cvvLengthFor(type);
}
