type MonitoringContext = Record<string, unknown>;

const SENSITIVE_KEY_PATTERN = /(password|token|secret|authorization|cookie|session|key)/i;
const MAX_STRING_LENGTH = 300;

function sanitizeValue(value: unknown): unknown {
  if (value === null || value === undefined) return value;

  if (typeof value === "string") {
    return value.length > MAX_STRING_LENGTH ? `${value.slice(0, MAX_STRING_LENGTH)}...` : value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return value.slice(0, 20).map((item) => sanitizeValue(item));
  }

  if (typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, nestedValue] of Object.entries(value)) {
      if (SENSITIVE_KEY_PATTERN.test(key)) {
        out[key] = "[redacted]";
        continue;
      }
      out[key] = sanitizeValue(nestedValue);
    }
    return out;
  }

  return value;
}

function getErrorMessage(error: unknown) {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  if (error && typeof error === "object" && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return "Unknown error";
}

function getErrorStack(error: unknown) {
  if (error instanceof Error) return error.stack ?? null;
  return null;
}

export function logServerError(event: string, error: unknown, context?: MonitoringContext) {
  const payload = {
    source: "server",
    level: "error",
    event,
    message: getErrorMessage(error),
    stack: getErrorStack(error),
    context: sanitizeValue(context ?? {}),
    timestamp: new Date().toISOString(),
  };

  console.error("[monitoring]", JSON.stringify(payload));
}

export function logServerEvent(event: string, context?: MonitoringContext) {
  const payload = {
    source: "server",
    level: "info",
    event,
    context: sanitizeValue(context ?? {}),
    timestamp: new Date().toISOString(),
  };

  console.info("[monitoring]", JSON.stringify(payload));
}
