export type ConversionUnavailableReason = "timeout" | "network" | "auth" | "rate_limited" | "unavailable" | "malformed";

export class ConversionProviderUnavailableError extends Error {
  constructor(
    message: string,
    public readonly reason: ConversionUnavailableReason,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "ConversionProviderUnavailableError";
  }
}

export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}
