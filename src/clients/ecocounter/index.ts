import type { z } from "zod";
import { UpstreamSchemaError } from "../../common/errors";
import type { Logger } from "../../common/logger";
import type { DateRange, Device, RawReading } from "../../types";
import { HttpClient } from "../http";
import type { FetchFn } from "../http";
import {
  describeIssues,
  toDevice,
  toRawReadings,
  VendorDeviceListSchema,
  VendorReadingListSchema,
} from "./schema";

export const DEFAULT_BASE_URL = "https://www.eco-visio.net/api/aladdin/1.0.0/pbl";
export const DEFAULT_ORGANIZATION_ID = "89";
// 4 = one value per day
export const DEFAULT_INTERVAL = "4";

export type EcoCounterOptions = {
  baseUrl: string;
  organizationId: string;
  interval: string;
};

export type EcoCounterClientOptions = EcoCounterOptions & {
  logger: Logger;
  fetch?: FetchFn;
};

export function buildDevicesUrl(options: EcoCounterOptions): string {
  return `${trimBase(options.baseUrl)}/publicwebpageplus/${
    options.organizationId
  }?withNull=true`;
}

/**
 * Builds the time-series query for one device. Dates go in as given
 * (DD/MM/YYYY); the linked flow ids are joined with ';' and encoded as one
 * parameter value.
 */
export function buildReadingsUrl(
  options: EcoCounterOptions,
  device: Device,
  range: DateRange
): string {
  const flowIds = encodeURIComponent(
    device.linkedFlows.map((f) => String(f.flowId)).join(";")
  );
  const id = encodeURIComponent(String(device.id));
  return (
    `${trimBase(options.baseUrl)}/publicwebpageplus/data/${id}` +
    `?idOrganisme=${options.organizationId}&idPdc=${id}` +
    `&fin=${range.end}&debut=${range.start}` +
    `&interval=${options.interval}&flowIds=${flowIds}`
  );
}

export class EcoCounterClient {
  private readonly http: HttpClient;
  private readonly logger: Logger;
  private readonly options: EcoCounterOptions;

  constructor(config: EcoCounterClientOptions) {
    this.logger = config.logger;
    this.options = {
      baseUrl: config.baseUrl,
      organizationId: config.organizationId,
      interval: config.interval,
    };
    this.http = new HttpClient({ logger: config.logger, fetch: config.fetch });
  }

  async fetchDevices(): Promise<Device[]> {
    const body = await this.http.requestJson({
      url: buildDevicesUrl(this.options),
      source: "devices",
    });
    const devices = validate("devices", VendorDeviceListSchema, body).map(
      toDevice
    );
    this.logger
      .with()
      .num("devices", devices.length)
      .logger()
      .info("Fetched device catalog");
    return devices;
  }

  async fetchReadings(device: Device, range: DateRange): Promise<RawReading[]> {
    const body = await this.http.requestJson({
      url: buildReadingsUrl(this.options, device, range),
      source: `readings for device ${device.id}`,
    });
    const readings = toRawReadings(
      validate(`readings for device ${device.id}`, VendorReadingListSchema, body)
    );
    this.logger.debug(`${readings.length} records found for ${device.name}`);
    return readings;
  }
}

function validate<S extends z.ZodTypeAny>(
  source: string,
  schema: S,
  body: unknown
): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new UpstreamSchemaError(
      source,
      `unexpected response shape (${describeIssues(result.error)})`,
      result.error
    );
  }
  return result.data;
}

function trimBase(baseUrl: string) {
  return baseUrl.replace(/\/+$/, "");
}
