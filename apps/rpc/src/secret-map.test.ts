import { describe, expect, it, vi } from "vitest";
import { loadSecretMap, resolveSecretForApp } from "./secret-map";

describe("loadSecretMap", () => {
  it("returns null when no env is set", () => {
    expect(loadSecretMap({})).toBeNull();
  });

  it("parses a valid JSON map", () => {
    expect(loadSecretMap({ CID_LEDGER_HMAC_SECRET_MAP: JSON.stringify({ bot: "test-secret" }) })).toEqual({
      bot: "test-secret",
    });
  });

  it("throws on invalid JSON", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(() => loadSecretMap({ CID_LEDGER_HMAC_SECRET_MAP: "{invalid" })).toThrow(
      "Invalid CID_LEDGER_HMAC_SECRET_MAP",
    );
    vi.restoreAllMocks();
  });

  it("throws when a secret is not a string", () => {
    expect(() => loadSecretMap({ CID_LEDGER_HMAC_SECRET_MAP: JSON.stringify({ bot: 42 }) })).toThrow(
      "Invalid CID_LEDGER_HMAC_SECRET_MAP: expected an object of app id to secret",
    );
  });
});

describe("resolveSecretForApp", () => {
  it("prefers the per-app secret over the shared fallback", () => {
    const onResolve = vi.fn();

    const secret = resolveSecretForApp("bot", {
      envSecretMap: { bot: "map-secret" },
      envFallbackSecret: "shared-secret",
      onResolve,
    });

    expect(secret).toBe("map-secret");
    expect(onResolve).toHaveBeenCalledWith({ appId: "bot", source: "env_map" });
  });

  it("falls back to the shared secret for apps missing from the map", () => {
    expect(
      resolveSecretForApp("other", { envSecretMap: { bot: "map-secret" }, envFallbackSecret: "shared-secret" }),
    ).toBe("shared-secret");
  });

  it("returns empty secret when neither source has one", () => {
    const onResolve = vi.fn();

    expect(resolveSecretForApp("bot", { envSecretMap: {}, envFallbackSecret: "", onResolve })).toBe("");
    expect(onResolve).toHaveBeenCalledWith({ appId: "bot", source: "missing" });
  });
});
