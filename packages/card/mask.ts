const MASK_PREFIX = "XXXX-XXXX-XXXX-";

/**
 * Mask a card number for display: only the last 4 digits stay visible,
 * whatever the number's length.
 *
 * @example
 * maskCardNumber("4111111111111111"); // "XXXX-XXXX-XXXX-1111"
 * maskCardNumber("378282246310005");  // "XXXX-XXXX-XXXX-0005"
 */
export function maskCardNumber(number: string): string {
  return MASK_PREFIX + number.slice(-4);
}
