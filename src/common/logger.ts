import EventEmitter from "events";

export enum LogLevel {
  TRACE = "trace",
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

const levelOrder: LogLevel[] = [
  LogLevel.TRACE,
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

export type LogFormat = "json" | "simple";

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  timestamp?: boolean;
}

type LogContext = Record<string, unknown>;

export interface LogMessage extends LogContext {
  level: LogLevel;
  message: string;
  ts?: string;
}

export interface Logger {
  trace: (message: string) => void;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;

  getLevel: () => LogLevel;
  with: () => LoggerContext;

  isTraceEnabled: () => boolean;
  isDebugEnabled: () => boolean;
}

export interface LoggerContext {
  str: (key: string, value?: string) => LoggerContext;
  num: (key: string, value?: number) => LoggerContext;
  bool: (key: string, value?: boolean) => LoggerContext;
  any: (key: string, value?: unknown, stringify?: boolean) => LoggerContext;
  array: (key: string, value?: unknown[]) => LoggerContext;
  error: (e: unknown) => LoggerContext;
  logger: () => Logger;
}

// Every formatted line is emitted here before it reaches the console.
export const LoggerEvents = new EventEmitter();

export class StructuredLogger implements Logger {
  private readonly level: LogLevel;
  private readonly format: LogFormat;
  private readonly timestamp: boolean;
  private readonly ctx: LogContext;

  constructor(options: LoggerOptions = {}, ctx: LogContext = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.format = options.format ?? "json";
    this.timestamp = options.timestamp ?? false;
    this.ctx = ctx;
  }

  trace(message: string) {
    // NOT USING console.trace, it prints a stack for every line
    this.write(LogLevel.TRACE, message, console.log);
  }

  debug(message: string) {
    this.write(LogLevel.DEBUG, message, console.debug);
  }

  info(message: string) {
    this.write(LogLevel.INFO, message, console.info);
  }

  warn(message: string) {
    this.write(LogLevel.WARN, message, console.warn);
  }

  error(message: string) {
    this.write(LogLevel.ERROR, message, console.error);
  }

  getLevel() {
    return this.level;
  }

  isTraceEnabled() {
    return this.level === LogLevel.TRACE;
  }

  isDebugEnabled() {
    return this.level === LogLevel.DEBUG || this.isTraceEnabled();
  }

  isEnabled(level: LogLevel) {
    return levelOrder.indexOf(level) >= levelOrder.indexOf(this.level);
  }

  setCtx(key: string, value?: unknown) {
    this.ctx[key] = value;
  }

  with(): LoggerContext {
    return new StructuredLogContext(
      new StructuredLogger(
        { level: this.level, format: this.format, timestamp: this.timestamp },
        { ...this.ctx }
      )
    );
  }

  private write(
    level: LogLevel,
    message: string,
    sink: (line: string) => void
  ) {
    if (!this.isEnabled(level)) return;
    const entry: LogMessage = { message, ...this.ctx, level };
    if (this.timestamp) {
      entry.ts = new Date().toISOString();
    }
    const json = safeStringify(entry);
    LoggerEvents.emit("log", json);
    sink(this.format === "simple" ? formatSimple(entry) : json);
  }
}

export class StructuredLogContext implements LoggerContext {
  constructor(private readonly target: StructuredLogger) {}

  str(key: string, value?: string) {
    return this.any(key, value);
  }

  num(key: string, value?: number) {
    return this.any(key, value);
  }

  bool(key: string, value?: boolean) {
    return this.any(key, value);
  }

  array(key: string, value?: unknown[]) {
    return this.any(key, value);
  }

  error(e: unknown) {
    if (e instanceof Error) {
      const details: LogContext = { message: e.message, stack: e.stack };
      if ("code" in e && typeof e.code === "string") {
        details.code = e.code;
      }
      return this.any("error", details);
    } else if (typeof e === "string") {
      return this.str("error", e);
    } else {
      return this.any("error", e);
    }
  }

  any(key: string, value?: unknown, stringify?: boolean) {
    this.target.setCtx(key, stringify ? safeStringify(value) : value);
    return this;
  }

  logger(): Logger {
    return this.target;
  }
}

const colors: Record<LogLevel, string> = {
  [LogLevel.TRACE]: "\x1b[37m",
  [LogLevel.DEBUG]: "\x1b[36m",
  [LogLevel.INFO]: "\x1b[32m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
};

export function formatSimple(entry: LogMessage): string {
  const { level, message, ts, ...rest } = entry;
  const stamp = ts ? ` [${ts}]` : "";
  let stack = "";
  const err = rest.error;
  if (err && typeof err === "object" && "stack" in err) {
    const { stack: rawStack, ...errRest } = err;
    if (typeof rawStack === "string") {
      stack = prettyFormatStack(rawStack);
    }
    rest.error = errRest;
  }
  const ctx = Object.keys(rest).length > 0 ? ` ${safeStringify(rest)}` : "";
  return `${colors[level]}${level.toUpperCase()}\x1b[0m${stamp} ${message}${ctx}${stack}`;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const found = levelOrder.find((l) => l === value?.trim().toLowerCase());
  return found ?? LogLevel.INFO;
}

export function getLogger(
  env: Record<string, string | undefined> = process.env
): StructuredLogger {
  return new StructuredLogger({
    level: parseLogLevel(env.LOG_LEVEL),
    format: env.LOG_FORMAT === "simple" ? "simple" : "json",
    timestamp: Boolean(env.LOG_TIMESTAMP),
  });
}

function prettyFormatStack(stack: string) {
  return (
    "\n" +
    stack
      .split("\n")
      .map((line) => line.replace(/^\s+at\s+/, "  at "))
      .join("\n")
  );
}

function safeStringify(obj: unknown) {
  return JSON.stringify(obj, (_k, v) =>
    typeof v === "bigint" ? Number(v) : v
  );
}
