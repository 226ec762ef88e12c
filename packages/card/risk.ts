/**
 * Placeholder "AI" risk indicator.
 *
 * Not a fraud model: the score is a random value in [0, 1) rounded down to
 * two decimals. It is unseeded and carries no security meaning.
 */

export type RandomSource = () => number;

export function riskScore(random: RandomSource = Math.random): number {
  return Math.floor(random() * 100) / 100;
}

export function formatRiskScore(score: number): string {
  return score.toFixed(2);
}
