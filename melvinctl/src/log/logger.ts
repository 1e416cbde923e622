import { redactSensitiveInfo, sanitizeLogMessage } from "../util/sanitize.js";

/**
 * Structured, level based logger.
 *
 * `jsonl` mode writes one `{ level, ts, code, message, ...context }` object per
 * line to stdout (errors to stderr); `human` mode writes the message only.
 * Tests and embedders swap the sink with `setLogSink()`.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export type OutputFormat = "human" | "jsonl";

export type LogEntry = {
  level: LogLevel;
  code: string;
  message: string;
  ts: string;
  context: Record<string, unknown>;
};

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(code: string, message: string, context?: Record<string, unknown>): void;
  info(code: string, message: string, context?: Record<string, unknown>): void;
  warn(code: string, message: string, context?: Record<string, unknown>): void;
  error(code: string, message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let format: OutputFormat = "human";
let minLevel: LogLevel = "info";
let secrets: string[] = [];

function consoleSink(entry: LogEntry): void {
  const stream = entry.level === "error" || entry.level === "warn" ? process.stderr : process.stdout;
  if (format === "jsonl") {
    stream.write(JSON.stringify({ level: entry.level, ts: entry.ts, code: entry.code, message: entry.message, ...entry.context }) + "\n");
    return;
  }
  const prefix = entry.level === "info" ? "" : `[${entry.level}] `;
  stream.write(`${prefix}${entry.message}\n`);
}

let sink: LogSink = consoleSink;

export function configureLogging(opts: { format?: OutputFormat; level?: LogLevel }): void {
  if (opts.format) format = opts.format;
  if (opts.level) minLevel = opts.level;
}

/** Register literal secret values that must never reach a log line. */
export function registerSecret(value: string): void {
  if (value.length > 0 && !secrets.includes(value)) secrets.push(value);
}

export function setLogSink(next: LogSink | null): void {
  sink = next ?? consoleSink;
}

export function resetLogging(): void {
  format = "human";
  minLevel = "info";
  secrets = [];
  sink = consoleSink;
}

export function scrub(message: string): string {
  return sanitizeLogMessage(redactSensitiveInfo(message, secrets));
}

function emit(level: LogLevel, code: string, message: string, context: Record<string, unknown>): void {
  if (PRIORITY[level] < PRIORITY[minLevel]) return;
  sink({ level, code, message: scrub(message), ts: new Date().toISOString(), context });
}

export function createLogger(base: Record<string, unknown> = {}): Logger {
  return {
    debug: (code, msg, ctx) => emit("debug", code, msg, { ...base, ...ctx }),
    info: (code, msg, ctx) => emit("info", code, msg, { ...base, ...ctx }),
    warn: (code, msg, ctx) => emit("warn", code, msg, { ...base, ...ctx }),
    error: (code, msg, ctx) => emit("error", code, msg, { ...base, ...ctx }),
    child: (ctx) => createLogger({ ...base, ...ctx })
  };
}

export const logger = createLogger({ component: "melvinctl" });
