import {
  CARD_TYPE_LABELS,
  type CardReport,
  type ExpiryStatus,
  formatRiskScore,
  maskCardNumber,
} from "@cardcheck/card";

export const EXPIRY_STATUS_LINES: Record<ExpiryStatus, string> = {
  Expired: "🔴 Status: Card is **Expired**!",
  ExpiringSoon: "🟡 Status: Card is expiring **soon**!",
  Valid: "🟢 Status: Card is **Valid**.",
};

/**
 * Console lines for a validated card, starting with a blank separator line.
 */
export function renderReport(report: CardReport): string[] {
  const { record } = report;
  return [
    "",
    `Card Holder: ${record.holderName}`,
    `Card Number (masked): ${maskCardNumber(record.number)}`,
    `Card Type: ${CARD_TYPE_LABELS[record.cardType]}`,
    `CVV Status: ${report.cvvValid ? "Valid" : "Invalid"}`,
    EXPIRY_STATUS_LINES[report.expiryStatus],
  ];
}

export function renderRiskLine(score: number): string {
  return `AI Risk Score (0=Safe, 1=High Risk): ${formatRiskScore(score)}`;
}
