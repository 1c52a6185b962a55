export const INSTALLATION_ID_DIGITS = 63;

export type InvalidInstallationIdReason = "empty" | "length" | "leading_zeros" | "rejected_by_provider";

export class InvalidInstallationIdError extends Error {
  constructor(
    public readonly reason: InvalidInstallationIdReason,
    message: string,
  ) {
    super(message);
    this.name = "InvalidInstallationIdError";
  }
}

/** Strips grouping characters and returns the bare digit string. */
export function normalizeInstallationId(raw: string): string {
  const digits = raw.replace(/\D/g, "");
  if (!digits) {
    throw new InvalidInstallationIdError("empty", "installation id is empty");
  }
  if (digits.length !== INSTALLATION_ID_DIGITS) {
    throw new InvalidInstallationIdError(
      "length",
      `installation id must have exactly ${INSTALLATION_ID_DIGITS} digits (got ${digits.length})`,
    );
  }
  if (digits.startsWith("000")) {
    throw new InvalidInstallationIdError("leading_zeros", "installation id must not start with 000");
  }
  return digits;
}

export function formatInstallationId(raw: string): string {
  const digits = raw.replace(/\D/g, "");
  if (digits.length !== INSTALLATION_ID_DIGITS) {
    return raw;
  }
  return digits.match(/\d{1,5}/g)?.join("-") ?? digits;
}

export function maskInstallationId(digits: string): string {
  return `${digits.slice(0, 10)}...`;
}
