import { ENV_VARIABLES } from "../constants.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

type Meta = Record<string, unknown>;

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line)
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(SEVERITY, value);
}

const fromEnv = process.env[ENV_VARIABLES.logLevel];
let threshold: LogLevel = isLogLevel(fromEnv) ? fromEnv : "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/** `[LEVEL] message {meta}`; meta is omitted when empty. */
export function log(level: LogLevel, message: string, meta: Meta = {}): void {
  if (SEVERITY[level] < SEVERITY[threshold]) {
    return;
  }
  const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  WRITERS[level](`[${level.toUpperCase()}] ${message}${suffix}`);
}

export const logger = {
  debug: (message: string, meta?: Meta) => log("debug", message, meta),
  info: (message: string, meta?: Meta) => log("info", message, meta),
  warn: (message: string, meta?: Meta) => log("warn", message, meta),
  error: (message: string, meta?: Meta) => log("error", message, meta)
};
