export type LogSeverity = "info" | "warn" | "error";

export type LogContext = {
  accountId?: string;
  txHash?: string;
  code?: string;
  requestId?: string;
  [key: string]: unknown;
};

export type StructuredLog = LogContext & {
  component: string;
  event: string;
  severity: LogSeverity;
};

export type ComponentLogger = {
  info: (event: string, context?: LogContext) => void;
  warn: (event: string, context?: LogContext) => void;
  error: (event: string, context?: LogContext) => void;
};

export type CreateComponentLoggerOptions = {
  /** Events below this severity are dropped. Defaults to LOG_LEVEL, then "info". */
  minSeverity?: LogSeverity;
  env?: NodeJS.ProcessEnv;
};

const SEVERITY_RANK: Record<LogSeverity, number> = { info: 0, warn: 1, error: 2 };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseLogSeverity(raw: string | undefined): LogSeverity {
  const normalized = (raw ?? "").trim().toLowerCase();
  if (normalized === "" || normalized === "info" || normalized === "debug") {
    return "info";
  }
  if (normalized === "warn" || normalized === "error") {
    return normalized;
  }
  throw new Error(`Invalid LOG_LEVEL '${raw}'. Expected one of: info, warn, error.`);
}

function serializeError(error: Error): Record<string, unknown> {
  const serialized: Record<string, unknown> = { name: error.name, message: error.message };
  // Driver errors (pg, ioredis) carry a machine-readable code.
  if ("code" in error && (typeof error.code === "string" || typeof error.code === "number")) {
    serialized.code = error.code;
  }
  serialized.stack = error.stack;
  return serialized;
}

export function toJsonSafe(value: unknown): unknown {
  try {
    return JSON.parse(
      JSON.stringify(value, (_key, current) => {
        if (typeof current === "bigint") {
          return current.toString();
        }
        if (current instanceof Error) {
          return serializeError(current);
        }
        return current;
      }),
    );
  } catch {
    return String(value);
  }
}

function buildPayload(component: string, event: string, severity: LogSeverity, context?: LogContext): StructuredLog {
  const safeContext = toJsonSafe(context ?? {});
  const payloadBase = {
    component,
    event,
    severity,
  };
  if (!isRecord(safeContext)) {
    return {
      ...payloadBase,
      details: safeContext,
    };
  }
  return {
    ...payloadBase,
    ...safeContext,
  };
}

export function createComponentLogger(component: string, options: CreateComponentLoggerOptions = {}): ComponentLogger {
  const minRank = SEVERITY_RANK[options.minSeverity ?? parseLogSeverity((options.env ?? process.env).LOG_LEVEL)];
  const enabled = (severity: LogSeverity) => SEVERITY_RANK[severity] >= minRank;

  return {
    info(event, context) {
      if (enabled("info")) console.log(buildPayload(component, event, "info", context));
    },
    warn(event, context) {
      if (enabled("warn")) console.warn(buildPayload(component, event, "warn", context));
    },
    error(event, context) {
      if (enabled("error")) console.error(buildPayload(component, event, "error", context));
    },
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
