import { z } from "zod";
import { UpstreamSchemaError } from "../../common/errors";
import type { Logger } from "../../common/logger";
import type {
  DeviceRecord,
  ReadingRecord,
  UpsertResult,
} from "../../types";
import { HttpClient } from "../http";
import type { FetchFn } from "../http";
import type { CatalogSink } from "../../pipeline/sink";

export const DEFAULT_TIMEOUT_MS = 60_000;

export type SocrataSinkOptions = {
  endpoint: string;
  appToken: string;
  username: string;
  password: string;
  readingsDatasetId: string;
  devicesDatasetId: string;
  timeoutMs?: number;
  logger: Logger;
  fetch?: FetchFn;
};

const UpsertResponseSchema = z.object({
  "Rows Created": z.number().optional(),
  "Rows Updated": z.number().optional(),
  Errors: z.number().optional(),
});

/**
 * Writes into an open-data catalog through the SODA upsert endpoint.
 * Rows are matched on the dataset's row identifier column, so replaying a
 * payload updates instead of duplicating.
 */
export class SocrataSink implements CatalogSink {
  private readonly http: HttpClient;
  private readonly logger: Logger;
  private readonly endpoint: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(private readonly config: SocrataSinkOptions) {
    this.logger = config.logger;
    this.endpoint = config.endpoint.replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.headers = {
      "X-App-Token": config.appToken,
      Authorization:
        "Basic " +
        Buffer.from(`${config.username}:${config.password}`).toString(
          "base64"
        ),
    };
    this.http = new HttpClient({ logger: config.logger, fetch: config.fetch });
  }

  upsertReadings(records: ReadingRecord[]): Promise<UpsertResult> {
    return this.upsert(this.config.readingsDatasetId, records);
  }

  upsertDevices(records: DeviceRecord[]): Promise<UpsertResult> {
    return this.upsert(this.config.devicesDatasetId, records);
  }

  async close(): Promise<void> {
    // stateless over HTTP
  }

  async upsert(
    datasetId: string,
    records: ReadingRecord[] | DeviceRecord[]
  ): Promise<UpsertResult> {
    const url = `${this.endpoint}/resource/${encodeURIComponent(
      datasetId
    )}.json`;
    const body = await this.http.requestJson({
      method: "POST",
      url,
      body: records,
      headers: this.headers,
      timeoutMs: this.timeoutMs,
      source: `catalog dataset ${datasetId}`,
    });
    const parsed = UpsertResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamSchemaError(
        `catalog dataset ${datasetId}`,
        "unexpected upsert response",
        parsed.error
      );
    }
    const result: UpsertResult = {
      created: parsed.data["Rows Created"] ?? 0,
      updated: parsed.data["Rows Updated"] ?? 0,
      errors: parsed.data.Errors ?? 0,
    };
    this.logger
      .with()
      .str("dataset", datasetId)
      .num("records", records.length)
      .num("created", result.created)
      .num("updated", result.updated)
      .num("errors", result.errors)
      .logger()
      .info("Upserted records");
    return result;
  }
}
