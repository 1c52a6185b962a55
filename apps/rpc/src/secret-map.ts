import { z } from "zod";

export type SecretMap = Record<string, string>;

export type SecretSource = "env_map" | "env_fallback" | "missing";

const SecretMapSchema = z.record(z.string().min(1), z.string().min(1));

export function loadSecretMap(env: NodeJS.ProcessEnv = process.env): SecretMap | null {
  const mapRaw = env.CID_LEDGER_HMAC_SECRET_MAP;
  if (!mapRaw) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(mapRaw);
  } catch (error) {
    console.error("FATAL: Invalid CID_LEDGER_HMAC_SECRET_MAP. Must be valid JSON.", error);
    throw new Error("Invalid CID_LEDGER_HMAC_SECRET_MAP");
  }
  const result = SecretMapSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error("Invalid CID_LEDGER_HMAC_SECRET_MAP: expected an object of app id to secret");
  }
  return result.data;
}

type ResolveSecretOptions = {
  envSecretMap?: SecretMap | null;
  envFallbackSecret?: string;
  onResolve?: (meta: { appId: string; source: SecretSource }) => void;
};

/** Per-app secrets take precedence over the shared fallback; an empty string means the app is unknown. */
export function resolveSecretForApp(appId: string, options: ResolveSecretOptions): string {
  const fromMap = options.envSecretMap?.[appId];
  if (fromMap) {
    options.onResolve?.({ appId, source: "env_map" });
    return fromMap;
  }

  if (options.envFallbackSecret) {
    options.onResolve?.({ appId, source: "env_fallback" });
    return options.envFallbackSecret;
  }

  options.onResolve?.({ appId, source: "missing" });
  return "";
}
