/**
 * Structured JSON log lines on stderr. stdout stays reserved for the
 * command's JSON result.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEvent {
  level: LogLevel;
  op: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
}

export function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export const logEvent = ({ level, op, ...fields }: LogEvent): void => {
  if (!shouldLog(level, parseLogLevel(process.env.PROVISION_LOG_LEVEL))) {
    return;
  }

  const entry = {
    ts: new Date().toISOString(),
    level,
    op,
    ...fields,
  };

  console.error(JSON.stringify(entry));
};
