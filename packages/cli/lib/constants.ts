/**
 * Shared constants for the cardcheck CLI.
 */

/** Card log written in the working directory unless configured otherwise. */
export const DEFAULT_CARD_LOG_FILE = "card_log.txt";

/** Config file picked up from the working directory when --config is absent. */
export const DEFAULT_CONFIG_FILE = "cardcheck.json";

export const BANNER = "💳 Welcome to Credit Card Validator 💳";

/** Shown on stderr for any failure that is not a card validation error. */
export const UNEXPECTED_ERROR_MESSAGE = "Unexpected error occurred!";
