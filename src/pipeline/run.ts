import { resolveDateRange } from "../common/dates";
import type { Logger } from "../common/logger";
import type { DateRange, Device, RawReading, TableRow } from "../types";
import type { Publisher } from "./publisher";
import { transformReadings } from "./transform";

export interface DeviceSource {
  fetchDevices(): Promise<Device[]>;
  fetchReadings(device: Device, range: DateRange): Promise<RawReading[]>;
}

export interface RunDeps {
  source: DeviceSource;
  publisher: Publisher;
  logger: Logger;
}

export interface RunOptions {
  start?: string;
  end?: string;
  strictTyping: boolean;
  now?: Date;
}

export interface RunSummary {
  range: DateRange;
  devices: number;
  readings: number;
  upserts: number;
  table: TableRow[];
}

/**
 * One pass: dates, device catalog, then fetch/transform/publish per device
 * in catalog order. The first failure aborts the run.
 */
export async function runPipeline(
  deps: RunDeps,
  options: RunOptions
): Promise<RunSummary> {
  const { source, publisher, logger } = deps;
  // date errors surface before any network call
  const range = resolveDateRange(options.start, options.end, options.now);
  logger
    .with()
    .str("start", range.start)
    .str("end", range.end)
    .str("mode", publisher.mode)
    .bool("strictTyping", options.strictTyping)
    .logger()
    .info("Starting run");

  const devices = await source.fetchDevices();

  let readings = 0;
  for (const device of devices) {
    const raw = await source.fetchReadings(device, range);
    const table = transformReadings(device, raw, {
      strictTyping: options.strictTyping,
    });
    if (table.rows.length === 0) {
      logger.with().str("device", device.name).logger().debug("No data");
      continue;
    }
    await publisher.publish(device, table);
    readings += table.rows.length;
  }

  await publisher.finish(devices);

  return {
    range,
    devices: devices.length,
    readings,
    upserts: publisher.upserts(),
    table: publisher.table(),
  };
}
