import { expect, test } from "vitest";
import { formatRiskScore, riskScore } from "./risk.ts";

test("riskScore truncates to two decimals", () => {
  expect(riskScore(() => 0)).toBe(0);
  expect(riskScore(() => 0.5)).toBe(0.5);
  expect(riskScore(() => 0.424)).toBe(0.42);
  expect(riskScore(() => 0.999)).toBe(0.99);
});

test("riskScore stays in [0, 1) with the default source", () => {
  for (let i = 0; i < 100; i++) {
    const score = riskScore();
    expect(score).toBeGreaterThanOrEqual(0);
    expect(score).toBeLessThan(1);
  }
});

test("formatRiskScore prints two fixed decimals", () => {
  expect(formatRiskScore(0)).toBe("0.00");
  expect(formatRiskScore(0.5)).toBe("0.50");
  expect(formatRiskScore(0.42)).toBe("0.42");
});
