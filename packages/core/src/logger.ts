import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

function defaultLevel(): LogLevel {
  const fromEnv = (process.env.KNXLENS_LOG_LEVEL ?? "").trim().toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  // silent under the test runner
  if (process.env.VITEST || process.env.NODE_ENV === "test") return "silent";
  return "warn";
}

let currentLevel: LogLevel = defaultLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function write(level: Exclude<LogLevel, "silent">, scope: string, parts: unknown[]): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel]) return;
  const body = parts
    .map((part) => (typeof part === "string" ? part : inspect(part, { depth: 4, breakLength: Infinity })))
    .join(" ");
  process.stderr.write(`${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${body}\n`);
}

export interface Logger {
  debug(...parts: unknown[]): void;
  info(...parts: unknown[]): void;
  warn(...parts: unknown[]): void;
  error(...parts: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  return {
    debug: (...parts) => write("debug", scope, parts),
    info: (...parts) => write("info", scope, parts),
    warn: (...parts) => write("warn", scope, parts),
    error: (...parts) => write("error", scope, parts),
  };
}
