import { ConfigError } from "../common/errors";
import type { Logger } from "../common/logger";
import type { Device, ReadingTable, TableRow } from "../types";
import type { CatalogSink } from "./sink";
import { toDeviceRecord, toReadingRecord } from "./transform";

export type PublishMode = "aggregate" | "catalog-sync";

export interface Publisher {
  readonly mode: PublishMode;
  /** Called once per device, only with non-empty tables. */
  publish(device: Device, table: ReadingTable): Promise<void>;
  /** Called once after the device loop. */
  finish(devices: Device[]): Promise<void>;
  /** Combined table; always empty outside aggregate mode. */
  table(): TableRow[];
  upserts(): number;
}

export class AggregatePublisher implements Publisher {
  readonly mode = "aggregate";
  private readonly rows: TableRow[] = [];

  constructor(private readonly logger: Logger) {}

  async publish(device: Device, table: ReadingTable): Promise<void> {
    this.rows.push(...table.rows);
    this.logger
      .with()
      .str("device", device.name)
      .num("rows", table.rows.length)
      .num("total", this.rows.length)
      .logger()
      .debug("Appended device table");
  }

  async finish(): Promise<void> {
    this.logger
      .with()
      .num("rows", this.rows.length)
      .logger()
      .info("Aggregate table ready");
  }

  table(): TableRow[] {
    return this.rows;
  }

  upserts(): number {
    return 0;
  }
}

export class CatalogPublisher implements Publisher {
  readonly mode = "catalog-sync";
  private upsertCount = 0;

  constructor(
    private readonly sink: CatalogSink,
    private readonly logger: Logger
  ) {}

  async publish(device: Device, table: ReadingTable): Promise<void> {
    if (table.kind !== "strict") {
      throw new ConfigError(["catalog-sync mode requires strict typing"]);
    }
    const result = await this.sink.upsertReadings(
      table.rows.map(toReadingRecord)
    );
    this.upsertCount++;
    this.logger
      .with()
      .str("device", device.name)
      .num("created", result.created)
      .num("updated", result.updated)
      .num("errors", result.errors)
      .logger()
      .info("Published readings");
  }

  async finish(devices: Device[]): Promise<void> {
    if (devices.length === 0) return;
    const result = await this.sink.upsertDevices(devices.map(toDeviceRecord));
    this.upsertCount++;
    this.logger
      .with()
      .num("devices", devices.length)
      .num("created", result.created)
      .num("updated", result.updated)
      .logger()
      .info("Published device metadata");
  }

  table(): TableRow[] {
    return [];
  }

  upserts(): number {
    return this.upsertCount;
  }
}
