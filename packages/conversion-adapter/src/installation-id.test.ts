import { describe, expect, it } from "vitest";
import {
  InvalidInstallationIdError,
  formatInstallationId,
  maskInstallationId,
  normalizeInstallationId,
} from "./installation-id";

const DIGITS = "1234567".repeat(9);

describe("installation id", () => {
  it("strips spaces and dashes", () => {
    const grouped = formatInstallationId(DIGITS);

    expect(grouped.split("-")).toHaveLength(13);
    expect(grouped.startsWith("12345-67123-")).toBe(true);
    expect(normalizeInstallationId(` ${grouped.replace(/-/g, " ")} `)).toBe(DIGITS);
  });

  it("rejects wrong lengths and leading zeros", () => {
    expect(() => normalizeInstallationId("")).toThrow("installation id is empty");
    expect(() => normalizeInstallationId(DIGITS.slice(1))).toThrow(
      "installation id must have exactly 63 digits (got 62)",
    );
    try {
      normalizeInstallationId(`000${DIGITS.slice(3)}`);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInstallationIdError);
      expect(error).toMatchObject({ reason: "leading_zeros" });
    }
  });

  it("leaves malformed input unformatted and masks digits for logs", () => {
    expect(formatInstallationId("12-34")).toBe("12-34");
    expect(maskInstallationId(DIGITS)).toBe("1234567123...");
  });
});
