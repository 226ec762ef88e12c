import { expect, test } from "vitest";
import { CardError, ExpiryFormatError } from "./errors.ts";
import { validateCard } from "./validate.ts";
import type { CardInput } from "./types.ts";

const NOW = new Date(2026, 2, 15);

function input(overrides: Partial<CardInput> = {}): CardInput {
  return {
    number: "4111111111111111",
    expiry: "12/30",
    holderName: "Jane Doe",
    cvv: "123",
    ...overrides,
  };
}

test("validateCard builds a report for a valid Visa", () => {
  const report = validateCard(input(), { now: NOW });
  expect(report).toEqual({
    record: {
      number: "4111111111111111",
      expiry: { month: 12, year: 2030, raw: "12/30" },
      holderName: "Jane Doe",
      cvv: "123",
      cardType: "Visa",
    },
    cvvValid: true,
    expiryStatus: "Valid",
  });
});

test("validateCard throws INVALID_LENGTH before checking Luhn", () => {
  let caught: unknown;
  try {
    validateCard(input({ number: "411111111111" }), { now: NOW });
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(CardError);
  expect(caught).toMatchObject({
    code: "INVALID_LENGTH",
    message: "❌ Invalid card number length!",
  });
});

test("validateCard throws LUHN_FAILED for a bad checksum", () => {
  expect(() => validateCard(input({ number: "4111111111111112" }), { now: NOW }))
    .toThrow("❌ Card number failed Luhn check! Invalid.");
});

test("validateCard reports an American Express CVV mismatch without throwing", () => {
  const report = validateCard(
    input({ number: "378282246310005", cvv: "123" }),
    { now: NOW },
  );
  expect(report.record.cardType).toBe("AmericanExpress");
  expect(report.cvvValid).toBe(false);
});

test("validateCard classifies expiry against the given date", () => {
  expect(validateCard(input({ expiry: "02/26" }), { now: NOW }).expiryStatus)
    .toBe("Expired");
  expect(validateCard(input({ expiry: "06/26" }), { now: NOW }).expiryStatus)
    .toBe("ExpiringSoon");
  expect(
    validateCard(input({ expiry: "06/26" }), { now: NOW, expiringSoonMonths: 2 })
      .expiryStatus,
  ).toBe("Valid");
});

test("validateCard throws ExpiryFormatError for malformed expiry", () => {
  expect(() => validateCard(input({ expiry: "2030-12" }), { now: NOW }))
    .toThrow(ExpiryFormatError);
});

test("validateCard accepts a dash-separated number of valid length", () => {
  const report = validateCard(input({ number: "4111-1111-1111-1111" }), { now: NOW });
  expect(report.record.number).toBe("4111-1111-1111-1111");
  expect(report.record.cardType).toBe("Visa");
});

test("validateCard counts CVV digits by integer value", () => {
  expect(validateCard(input({ cvv: "012" }), { now: NOW }).cvvValid).toBe(false);
  expect(validateCard(input({ cvv: "120" }), { now: NOW }).cvvValid).toBe(true);
});
