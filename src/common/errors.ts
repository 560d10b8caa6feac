export type ErrorCode =
  | "date.parse"
  | "upstream.schema"
  | "http.status"
  | "http.timeout"
  | "http.network"
  | "config.invalid";

export class CounterSyncError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "CounterSyncError";
    this.code = code;
  }
}

/** A `--start`/`--end` value that is not a real `YYYY-MM-DD` date. */
export class DateParseError extends CounterSyncError {
  constructor(readonly input: string) {
    super("date.parse", `Invalid date '${input}', expected YYYY-MM-DD`);
    this.name = "DateParseError";
  }
}

/** Vendor response that does not match the shape we decode. */
export class UpstreamSchemaError extends CounterSyncError {
  constructor(readonly source: string, message: string, cause?: unknown) {
    super("upstream.schema", `${source}: ${message}`, cause);
    this.name = "UpstreamSchemaError";
  }
}

export class HttpError extends CounterSyncError {
  readonly status?: number;

  constructor(
    code: Extract<ErrorCode, `http.${string}`>,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(code, message, options.cause);
    this.name = "HttpError";
    this.status = options.status;
  }
}

export class ConfigError extends CounterSyncError {
  constructor(readonly problems: string[]) {
    super("config.invalid", `Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}
