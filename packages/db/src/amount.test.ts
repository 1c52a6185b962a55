import { describe, expect, it } from "vitest";
import {
  InvalidAmountError,
  addDecimalStrings,
  assertPositiveAmount,
  compareDecimalStrings,
  formatDecimal,
  fromBaseUnits,
  negateDecimalString,
  normalizeDecimal,
  parseDecimal,
  subtractDecimalStrings,
  sumDecimalStrings,
} from "./amount";

describe("amount", () => {
  it("parses valid decimals", () => {
    expect(parseDecimal("10")).toEqual({ value: 10n, scale: 0 });
    expect(parseDecimal("10.50")).toEqual({ value: 1050n, scale: 2 });
    expect(parseDecimal("-0.125")).toEqual({ value: -125n, scale: 3 });
  });

  it("rejects invalid decimal strings", () => {
    expect(() => parseDecimal("")).toThrow(InvalidAmountError);
    expect(() => parseDecimal("abc")).toThrow(InvalidAmountError);
    expect(() => parseDecimal("1.2.3")).toThrow(InvalidAmountError);
    expect(() => parseDecimal("1e5")).toThrow(InvalidAmountError);
  });

  it("formats decimals canonically", () => {
    expect(formatDecimal(725n, 2)).toBe("7.25");
    expect(formatDecimal(700n, 2)).toBe("7");
    expect(formatDecimal(-5n, 2)).toBe("-0.05");
    expect(normalizeDecimal("050.2500")).toBe("50.25");
  });

  it("enforces strictly positive amounts within token precision", () => {
    expect(() => assertPositiveAmount("0")).toThrow(InvalidAmountError);
    expect(() => assertPositiveAmount("-1")).toThrow(InvalidAmountError);
    expect(() => assertPositiveAmount("0.0000001")).toThrow(InvalidAmountError);
    expect(() => assertPositiveAmount("1.5000000")).not.toThrow();
    expect(() => assertPositiveAmount("0.000001")).not.toThrow();
  });

  it("compares decimal strings with different scales", () => {
    expect(compareDecimalStrings("1.2", "1.20")).toBe(0);
    expect(compareDecimalStrings("1.21", "1.20")).toBe(1);
    expect(compareDecimalStrings("1.19", "1.2")).toBe(-1);
  });

  it("adds, subtracts and sums decimal strings", () => {
    expect(addDecimalStrings("1", "2.50")).toBe("3.5");
    expect(addDecimalStrings("0.25", "0.75")).toBe("1");
    expect(subtractDecimalStrings("100", "5")).toBe("95");
    expect(subtractDecimalStrings("49.99", "50")).toBe("-0.01");
    expect(negateDecimalString("5.5")).toBe("-5.5");
    expect(sumDecimalStrings(["100", "-5", "5", "50"])).toBe("150");
    expect(sumDecimalStrings([])).toBe("0");
  });

  it("converts token base units using the token decimals", () => {
    expect(fromBaseUnits("50000000", 6)).toBe("50");
    expect(fromBaseUnits("1234567", 6)).toBe("1.234567");
    expect(() => fromBaseUnits("12.5", 6)).toThrow(InvalidAmountError);
  });
});
