export type ParsedDecimal = { value: bigint; scale: number };

// Token precision of the deposit asset; stored amounts never carry more fraction digits.
export const AMOUNT_SCALE = 6;

export class InvalidAmountError extends Error {
  constructor(public readonly amount: string) {
    super(`invalid amount: ${amount}`);
    this.name = "InvalidAmountError";
  }
}

export function pow10(n: number): bigint {
  if (n <= 0) return 1n;
  return BigInt(`1${"0".repeat(n)}`);
}

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?$/;

/** Parses a plain decimal string into an integer of minor units and its scale. */
export function parseDecimal(value: string): ParsedDecimal {
  const match = DECIMAL_PATTERN.exec(value.trim());
  const intPart = match?.[2] ?? "";
  const fracPart = match?.[3] ?? "";
  if (!match || (intPart === "" && fracPart === "")) {
    throw new InvalidAmountError(value);
  }

  const digits = BigInt(`${intPart}${fracPart}` || "0");
  return { value: match[1] === "-" ? -digits : digits, scale: fracPart.length };
}

export function formatDecimal(value: bigint, scale: number): string {
  if (scale <= 0) return value.toString();

  const abs = value < 0n ? -value : value;
  const unit = pow10(scale);
  const whole = abs / unit;
  const fraction = (abs % unit).toString().padStart(scale, "0").replace(/0+$/, "");
  const sign = value < 0n ? "-" : "";
  return fraction ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
}

export function normalizeDecimal(value: string): string {
  const parsed = parseDecimal(value);
  return formatDecimal(parsed.value, parsed.scale);
}

export function assertPositiveAmount(value: string, maxScale = AMOUNT_SCALE): void {
  const parsed = parseDecimal(value);
  if (parsed.value <= 0n) {
    throw new InvalidAmountError(value);
  }
  // Trailing zeros beyond the token precision are harmless ("1.5000000").
  const normalized = parseDecimal(formatDecimal(parsed.value, parsed.scale));
  if (normalized.scale > maxScale) {
    throw new InvalidAmountError(value);
  }
}

export function compareDecimalStrings(left: string, right: string): number {
  const a = parseDecimal(left);
  const b = parseDecimal(right);
  const scale = Math.max(a.scale, b.scale);
  const leftValue = a.value * pow10(scale - a.scale);
  const rightValue = b.value * pow10(scale - b.scale);
  if (leftValue === rightValue) {
    return 0;
  }
  return leftValue > rightValue ? 1 : -1;
}

export function addDecimalStrings(left: string, right: string): string {
  const a = parseDecimal(left);
  const b = parseDecimal(right);
  const scale = Math.max(a.scale, b.scale);
  const value = a.value * pow10(scale - a.scale) + b.value * pow10(scale - b.scale);
  return formatDecimal(value, scale);
}

export function subtractDecimalStrings(left: string, right: string): string {
  return addDecimalStrings(left, negateDecimalString(right));
}

export function negateDecimalString(value: string): string {
  const parsed = parseDecimal(value);
  return formatDecimal(-parsed.value, parsed.scale);
}

export function sumDecimalStrings(values: string[]): string {
  return values.reduce((total, value) => addDecimalStrings(total, value), "0");
}

export function fromBaseUnits(raw: string, decimals: number): string {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidAmountError(raw);
  }
  return formatDecimal(BigInt(trimmed), decimals);
}
