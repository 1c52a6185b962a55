import { describe, it, expect } from "vitest";
import { isTimestampFresh, readSignedHeaders, verifyHmac } from "./hmac";

const secret = "test-secret";

describe("hmac", () => {
  it("verifies valid signature", () => {
    const payload = "{}";
    const ts = "1700000000";
    const nonce = "n1";
    const sig = verifyHmac.sign({ secret, payload, ts, nonce });
    expect(verifyHmac.check({ secret, payload, ts, nonce, signature: sig })).toBe(true);
  });

  it("rejects a signature made over a different body", () => {
    const ts = "1700000000";
    const nonce = "n1";
    const sig = verifyHmac.sign({ secret, payload: '{"a":1}', ts, nonce });
    expect(verifyHmac.check({ secret, payload: '{"a": 1}', ts, nonce, signature: sig })).toBe(false);
  });

  it("returns false on signature length mismatch", () => {
    const payload = "{}";
    const ts = "1700000000";
    const nonce = "n1";
    const result = verifyHmac.check({
      secret,
      payload,
      ts,
      nonce,
      signature: "short",
    });
    expect(result).toBe(false);
  });
});

describe("signed request headers", () => {
  it("reads the first value of each signing header", () => {
    expect(
      readSignedHeaders({ "x-app-id": ["bot", "other"], "x-ts": "1700000000", "x-nonce": "n1" }),
    ).toEqual({ appId: "bot", ts: "1700000000", nonce: "n1", signature: "" });
  });

  it("accepts timestamps inside the window only", () => {
    const nowMs = 1_700_000_000_000;

    expect(isTimestampFresh("1700000000", nowMs, 300_000)).toBe(true);
    expect(isTimestampFresh("1700000300", nowMs, 300_000)).toBe(true);
    expect(isTimestampFresh("1699999699", nowMs, 300_000)).toBe(false);
    expect(isTimestampFresh("17e8", nowMs, 300_000)).toBe(false);
    expect(isTimestampFresh("", nowMs, 300_000)).toBe(false);
  });
});
