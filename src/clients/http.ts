import { HttpError, UpstreamSchemaError } from "../common/errors";
import type { Logger } from "../common/logger";

export type FetchFn = typeof fetch;

export interface HttpRequestOptions {
  method?: "GET" | "POST";
  url: string;
  body?: unknown;
  headers?: Record<string, string>;
  /** No timeout unless set */
  timeoutMs?: number;
  /** Names the upstream in error messages */
  source: string;
}

export interface HttpClientOptions {
  logger: Logger;
  fetch?: FetchFn;
}

export class HttpClient {
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;

  constructor(options: HttpClientOptions) {
    this.logger = options.logger;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /** Sends the request and returns the decoded, still unvalidated, JSON body. */
  async requestJson(options: HttpRequestOptions): Promise<unknown> {
    const text = await this.request(options);
    try {
      return JSON.parse(text);
    } catch (e) {
      throw new UpstreamSchemaError(options.source, "response is not JSON", e);
    }
  }

  /** Resolves with the response body; the timeout covers reading it. */
  private async request(options: HttpRequestOptions): Promise<string> {
    const method = options.method ?? "GET";
    const headers = new Headers(options.headers ?? {});
    let body: string | undefined;
    if (options.body !== undefined) {
      headers.set("Content-Type", "application/json");
      body = JSON.stringify(options.body);
    }

    const controller = new AbortController();
    const handle =
      options.timeoutMs === undefined
        ? undefined
        : setTimeout(() => controller.abort(), options.timeoutMs);

    if (this.logger.isTraceEnabled()) {
      this.logger
        .with()
        .str("method", method)
        .str("url", options.url)
        .logger()
        .trace(`Requesting ${options.source}`);
    }

    try {
      const response = await this.fetchFn(options.url, {
        method,
        headers,
        body,
        signal: controller.signal,
      });
      if (!response.ok) {
        throw await this.buildStatusError(response, method, options);
      }
      return await response.text();
    } catch (error) {
      if (error instanceof HttpError) {
        throw error;
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new HttpError(
          "http.timeout",
          `${method} ${options.source} timed out after ${options.timeoutMs} ms`,
          { cause: error }
        );
      }
      throw new HttpError(
        "http.network",
        `${method} ${options.source} failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error }
      );
    } finally {
      if (handle) clearTimeout(handle);
    }
  }

  private async buildStatusError(
    response: Response,
    method: string,
    options: HttpRequestOptions
  ): Promise<HttpError> {
    let detail = "";
    const text = await response.text().catch(() => "");
    try {
      const payload: unknown = JSON.parse(text);
      if (
        payload &&
        typeof payload === "object" &&
        "message" in payload &&
        typeof payload.message === "string"
      ) {
        detail = `: ${payload.message}`;
      }
    } catch {
      // body is not JSON, keep the status only
    }
    return new HttpError(
      "http.status",
      `${method} ${options.source} failed with status ${response.status}${detail}`,
      { status: response.status, cause: text || undefined }
    );
  }
}
