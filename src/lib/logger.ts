/**
 * Structured JSON logging with async buffered writes.
 * Each module creates its own logger: `createLogger("launcher")`.
 * `LOG_LEVEL` (debug | info | warn | error | silent) sets the threshold.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

type Meta = Record<string, unknown>;

interface LogEntry {
  ts: string;
  level: LogLevel;
  service: string;
  msg: string;
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevelName(value: string): value is LogLevel | "silent" {
  return Object.hasOwn(LEVEL_RANK, value);
}

function parseThreshold(raw: string | undefined): number {
  const key = (raw ?? "info").trim().toLowerCase();
  return isLevelName(key) ? LEVEL_RANK[key] : LEVEL_RANK.info;
}

const threshold = parseThreshold(process.env["LOG_LEVEL"]);

// ─── Async write buffer ──────────────────────────────────────────────────────

const FLUSH_INTERVAL = 50; // ms
const MAX_BUFFER = 100;

let stdoutBuf: string[] = [];
let stderrBuf: string[] = [];

function flushStdout(): void {
  if (stdoutBuf.length === 0) return;
  const batch = stdoutBuf.join("");
  stdoutBuf = [];
  process.stdout.write(batch);
}

function flushStderr(): void {
  if (stderrBuf.length === 0) return;
  const batch = stderrBuf.join("");
  stderrBuf = [];
  process.stderr.write(batch);
}

const stdoutTimer = setInterval(flushStdout, FLUSH_INTERVAL);
const stderrTimer = setInterval(flushStderr, FLUSH_INTERVAL);
stdoutTimer.unref();
stderrTimer.unref();

process.on("beforeExit", () => { flushStdout(); flushStderr(); });

/** Write everything still buffered. Call before `process.exit`. */
export function flushLogs(): void {
  flushStdout();
  flushStderr();
}

function emit(level: LogLevel, service: string, msg: string, meta?: Meta): void {
  if (LEVEL_RANK[level] < threshold) return;
  const entry: LogEntry = { ts: new Date().toISOString(), level, service, msg, ...meta };
  const line = JSON.stringify(entry) + "\n";
  if (level === "error" || level === "warn") {
    stderrBuf.push(line);
    if (stderrBuf.length >= MAX_BUFFER) flushStderr();
  } else {
    stdoutBuf.push(line);
    if (stdoutBuf.length >= MAX_BUFFER) flushStdout();
  }
}

export interface Logger {
  debug: (msg: string, meta?: Meta) => void;
  info:  (msg: string, meta?: Meta) => void;
  warn:  (msg: string, meta?: Meta) => void;
  error: (msg: string, meta?: Meta) => void;
  /** Logger that stamps `bindings` onto every entry. */
  child: (bindings: Meta) => Logger;
}

function build(service: string, bindings: Meta): Logger {
  const merge = (meta?: Meta): Meta => ({ ...bindings, ...meta });
  return {
    debug: (msg, meta) => emit("debug", service, msg, merge(meta)),
    info:  (msg, meta) => emit("info",  service, msg, merge(meta)),
    warn:  (msg, meta) => emit("warn",  service, msg, merge(meta)),
    error: (msg, meta) => emit("error", service, msg, merge(meta)),
    child: (extra) => build(service, { ...bindings, ...extra }),
  };
}

export function createLogger(service: string): Logger {
  return build(service, {});
}
