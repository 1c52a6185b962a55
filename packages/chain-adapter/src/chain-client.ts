// Client errors that say nothing about the transaction itself: credentials, timeouts, throttling.
const TRANSIENT_CLIENT_STATUSES = new Set([401, 403, 408, 429]);

export class ChainLookupError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly data?: unknown,
  ) {
    super(message);
    this.name = "ChainLookupError";
  }

  /** False when the provider refused the request itself, so asking again gets the same answer. */
  get retryable(): boolean {
    if (this.status === undefined || this.status < 400 || this.status >= 500) {
      return true;
    }
    return TRANSIENT_CLIENT_STATUSES.has(this.status);
  }
}

export type ChainGetArgs = {
  fetchFn?: typeof fetch;
  headers?: Record<string, string>;
  timeoutMs: number;
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function chainGet(url: string, args: ChainGetArgs): Promise<unknown> {
  const fetchFn = args.fetchFn ?? fetch;
  let response: Response;
  try {
    response = await fetchFn(url, {
      method: "GET",
      headers: { accept: "application/json", ...args.headers },
      signal: AbortSignal.timeout(args.timeoutMs),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ChainLookupError(`Chain API request failed: ${message}`, undefined, error);
  }

  if (!response.ok) {
    throw new ChainLookupError(`Chain API HTTP ${response.status}`, response.status);
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ChainLookupError("Chain API returned malformed JSON", response.status, error);
  }
}
