#!/usr/bin/env -S npx tsx
/**
 * cardcheck executable.
 *
 * Usage:
 *   cardcheck                         # prompts for every field
 *   cardcheck --number 4111111111111111 --expiry 12/30 --holder "Jane Doe" --cvv 123
 *
 * Environment variables:
 *   CARDCHECK_LOG_FILE              Card log path (default: card_log.txt)
 *   CARDCHECK_CARD_LOG              Append to the card log (true/false)
 *   CARDCHECK_LOG_LEVEL             Diagnostic log level (debug, info, warn, error)
 *   CARDCHECK_EXPIRING_SOON_MONTHS  Months counted as "expiring soon" (default: 6)
 */

import { createProgram } from "./mod.ts";

await createProgram().parseAsync(process.argv);
