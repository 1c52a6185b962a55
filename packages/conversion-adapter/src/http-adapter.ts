import { ConversionProviderUnavailableError, isTimeoutError } from "./conversion-client";
import { InvalidInstallationIdError, normalizeInstallationId } from "./installation-id";
import type { ConversionProvider, ConversionResult, CreateHttpConversionAdapterArgs } from "./types";

// The provider holds the connection open while it computes the confirmation id.
export const DEFAULT_CONVERSION_TIMEOUT_MS = 120_000;
const SUCCESS_RESULT = "Successfully";
const MIN_PLAIN_TEXT_CONFIRMATION_LENGTH = 10;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function looksRejected(text: string): boolean {
  return /invalid|failed|blocked|banned/i.test(text);
}

function readErrorField(payload: Record<string, unknown>): string | null {
  for (const key of ["errorexecuting", "error_executing"]) {
    const value = payload[key];
    if (typeof value === "string" && value.trim()) {
      return value.trim();
    }
  }
  const occurred = payload.hadoccurred ?? payload.had_occurred;
  if (occurred !== undefined && occurred !== 0 && occurred !== "0") {
    return "Unknown error occurred";
  }
  return null;
}

function parseJsonBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function parseSuccessBody(body: string): ConversionResult {
  const text = body.trim();
  if (text.startsWith("{") && text.endsWith("}")) {
    const payload = parseJsonBody(text);
    if (isRecord(payload)) {
      const confirmationId = payload.confirmationid;
      if (payload.result === SUCCESS_RESULT && typeof confirmationId === "string" && confirmationId.trim()) {
        return { confirmationId: confirmationId.trim() };
      }
      const error = readErrorField(payload);
      if (error) {
        if (looksRejected(error)) {
          throw new InvalidInstallationIdError("rejected_by_provider", error);
        }
        throw new ConversionProviderUnavailableError(`conversion provider error: ${error}`, "unavailable", 200);
      }
      throw new ConversionProviderUnavailableError("conversion provider returned an unexpected response", "malformed", 200);
    }
  }

  // Some responses carry the confirmation id as plain text.
  if (looksRejected(text) || text.length < MIN_PLAIN_TEXT_CONFIRMATION_LENGTH) {
    throw new InvalidInstallationIdError("rejected_by_provider", "conversion provider rejected the installation id");
  }
  return { confirmationId: text };
}

function mapStatus(status: number): Error {
  if (status === 400 || status === 403) {
    return new InvalidInstallationIdError("rejected_by_provider", "conversion provider rejected the installation id");
  }
  if (status === 401) {
    return new ConversionProviderUnavailableError("conversion provider rejected the API key", "auth", status);
  }
  if (status === 429) {
    return new ConversionProviderUnavailableError("conversion provider rate limit exceeded", "rate_limited", status);
  }
  return new ConversionProviderUnavailableError(`conversion provider HTTP ${status}`, "unavailable", status);
}

export function createHttpConversionAdapter(args: CreateHttpConversionAdapterArgs): ConversionProvider {
  const fetchFn = args.fetchFn ?? fetch;
  const timeoutMs = args.timeoutMs ?? DEFAULT_CONVERSION_TIMEOUT_MS;

  return {
    async convert({ installationId }) {
      const digits = normalizeInstallationId(installationId);
      const url = new URL(args.endpoint);
      url.searchParams.set("iids", digits);
      url.searchParams.set("justforcheck", "0");
      url.searchParams.set("apikey", args.apiKey);

      let response: Response;
      try {
        response = await fetchFn(url.toString(), {
          method: "GET",
          headers: { "user-agent": "cid-ledger/0.1" },
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        if (isTimeoutError(error)) {
          throw new ConversionProviderUnavailableError(`conversion provider timed out after ${timeoutMs}ms`, "timeout");
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new ConversionProviderUnavailableError(`conversion provider request failed: ${message}`, "network");
      }

      if (response.status !== 200) {
        throw mapStatus(response.status);
      }

      let body: string;
      try {
        body = await response.text();
      } catch (error) {
        if (isTimeoutError(error)) {
          throw new ConversionProviderUnavailableError(`conversion provider timed out after ${timeoutMs}ms`, "timeout");
        }
        throw error;
      }
      return parseSuccessBody(body);
    },
  };
}
