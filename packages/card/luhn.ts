/** Shortest and longest accepted card number. */
export const MIN_CARD_LENGTH = 13;
export const MAX_CARD_LENGTH = 19;

export function hasValidLength(number: string): boolean {
  return number.length >= MIN_CARD_LENGTH && number.length <= MAX_CARD_LENGTH;
}

/**
 * Luhn (mod-10) checksum.
 *
 * Digits are summed right to left; every second digit is doubled and
 * reduced by 9 when the result exceeds 9. Other characters are skipped and
 * do not shift the alternation. A string without digits fails.
 */
export function passesLuhn(number: string): boolean {
  let sum = 0;
  let digits = 0;
  let alternate = false;

  for (let i = number.length - 1; i >= 0; i--) {
    let digit = number.charCodeAt(i) - 48;
    if (digit < 0 || digit > 9) continue;
    digits++;

    if (alternate) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }

    sum += digit;
    alternate = !alternate;
  }

  return digits > 0 && sum % 10 === 0;
}
