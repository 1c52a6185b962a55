import crypto from "crypto";

type SignArgs = { secret: string; payload: string; ts: string; nonce: string };

type CheckArgs = SignArgs & { signature: string };

export type SignedRequestHeaders = {
  appId: string;
  ts: string;
  nonce: string;
  signature: string;
};

/** Signature over `${ts}.${nonce}.${rawBody}` with the caller's shared secret. */
export const verifyHmac = {
  sign({ secret, payload, ts, nonce }: SignArgs) {
    const input = `${ts}.${nonce}.${payload}`;
    return crypto.createHmac("sha256", secret).update(input).digest("hex");
  },
  check({ secret, payload, ts, nonce, signature }: CheckArgs) {
    const expected = verifyHmac.sign({ secret, payload, ts, nonce });
    if (expected.length !== signature.length) return false;
    return crypto.timingSafeEqual(Buffer.from(expected), Buffer.from(signature));
  },
};

function headerValue(value: string | string[] | undefined): string {
  if (Array.isArray(value)) {
    return value[0] ?? "";
  }
  return value ?? "";
}

export function readSignedHeaders(headers: Record<string, string | string[] | undefined>): SignedRequestHeaders {
  return {
    appId: headerValue(headers["x-app-id"]),
    ts: headerValue(headers["x-ts"]),
    nonce: headerValue(headers["x-nonce"]),
    signature: headerValue(headers["x-signature"]),
  };
}

/** `ts` is unix seconds; accepted when within `windowMs` of now in either direction. */
export function isTimestampFresh(ts: string, nowMs: number, windowMs: number): boolean {
  if (!/^\d+$/.test(ts)) return false;
  const delta = Math.abs(nowMs - Number(ts) * 1000);
  return delta <= windowMs;
}
