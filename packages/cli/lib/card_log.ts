/**
 * Append-only plaintext card log.
 *
 * Each entry is four "Label: value" lines followed by a blank line. No
 * header, no rotation and no locking; concurrent writers may interleave.
 */

import { appendFile } from "node:fs/promises";
import { CARD_TYPE_LABELS, type CardReport, maskCardNumber } from "@cardcheck/card";

export function formatCardLogEntry(report: CardReport): string {
  const { record } = report;
  return [
    `Card Holder: ${record.holderName}`,
    `Card Type: ${CARD_TYPE_LABELS[record.cardType]}`,
    `Masked Card: ${maskCardNumber(record.number)}`,
    `Expiry: ${record.expiry.raw}`,
    "",
    "",
  ].join("\n");
}

/** Append one entry, creating the file if needed. */
export async function appendCardLog(
  filePath: string,
  report: CardReport,
): Promise<void> {
  await appendFile(filePath, formatCardLogEntry(report), "utf-8");
}
