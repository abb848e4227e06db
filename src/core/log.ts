/**
 * Component-tagged logger.
 *
 * Every line goes to stderr: stdout carries the MCP stdio transport.
 *
 * Environment:
 *   PROOFGEN_LOG_LEVEL = debug|info|warn|error (default: info)
 *   PROOFGEN_LOG_JSON  = 1 for JSON lines (default: text)
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

function parseLevel(raw: string | undefined): LogLevel {
  const v = (raw ?? "info").trim().toLowerCase();
  return v === "debug" || v === "info" || v === "warn" || v === "error" ? v : "info";
}

function formatText(entry: LogEntry): string {
  const fields = entry.data
    ? Object.entries(entry.data)
        .map(([k, v]) => `${k}=${typeof v === "string" ? v : JSON.stringify(v)}`)
        .join(" ")
    : "";
  return `${entry.ts} ${entry.level.toUpperCase().padEnd(5)} [${entry.component}] ${entry.msg}${fields ? " " + fields : ""}`;
}

const stderrSink: LogSink = (entry) => {
  const line = process.env.PROOFGEN_LOG_JSON === "1" ? JSON.stringify(entry) : formatText(entry);
  process.stderr.write(line + "\n");
};

let sink: LogSink = stderrSink;
const minLevel: LogLevel = parseLevel(process.env.PROOFGEN_LOG_LEVEL);

/** Replaces the output sink; returns the previous one so tests can restore it. */
export function setLogSink(next: LogSink): LogSink {
  const prev = sink;
  sink = next;
  return prev;
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

export function createLogger(component: string): Logger {
  const emit = (level: LogLevel, msg: string, data?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    sink({ level, ts: new Date().toISOString(), component, msg, ...(data ? { data } : {}) });
  };
  return {
    debug: (msg, data) => emit("debug", msg, data),
    info: (msg, data) => emit("info", msg, data),
    warn: (msg, data) => emit("warn", msg, data),
    error: (msg, data) => emit("error", msg, data)
  };
}
