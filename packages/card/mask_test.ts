import { expect, test } from "vitest";
import { maskCardNumber } from "./mask.ts";

test("maskCardNumber keeps the last four digits", () => {
  expect(maskCardNumber("4111111111111111")).toBe("XXXX-XXXX-XXXX-1111");
});

test("maskCardNumber uses the same layout for 13 to 19 digits", () => {
  expect(maskCardNumber("4222222222222")).toBe("XXXX-XXXX-XXXX-2222");
  expect(maskCardNumber("378282246310005")).toBe("XXXX-XXXX-XXXX-0005");
  expect(maskCardNumber("4000000000000000006")).toBe("XXXX-XXXX-XXXX-0006");
});

test("maskCardNumber reveals nothing before the last four", () => {
  for (let length = 13; length <= 19; length++) {
    const number = "9".repeat(length - 4) + "1234";
    const masked = maskCardNumber(number);
    expect(masked).toBe("XXXX-XXXX-XXXX-1234");
    expect(masked.replace(/\D/g, "")).toBe("1234");
  }
});
