import type { Logger } from "../common/logger";
import type { CatalogSink } from "../pipeline/sink";
import type { DeviceRecord, ReadingRecord, UpsertResult } from "../types";
import { closeDatabase, openDatabase, type Database } from "./connection";
import { DeviceRepository, ReadingRepository } from "./repositories";
import { createSchema } from "./schema";

interface Repositories {
  readings: ReadingRepository;
  devices: DeviceRepository;
}

/** Local stand-in for the open-data catalog, backed by a DuckDB file. */
export class DuckDbSink implements CatalogSink {
  private db: Database | null = null;
  private repos: Promise<Repositories> | null = null;

  constructor(
    private readonly dbPath: string,
    private readonly logger: Logger
  ) {}

  async upsertReadings(records: ReadingRecord[]): Promise<UpsertResult> {
    const { readings } = await this.init();
    const result = await readings.upsertMany(records);
    this.logResult("readings", records.length, result);
    return result;
  }

  async upsertDevices(records: DeviceRecord[]): Promise<UpsertResult> {
    const { devices } = await this.init();
    const result = await devices.upsertMany(records);
    this.logResult("devices", records.length, result);
    return result;
  }

  async repositories(): Promise<Repositories> {
    return this.init();
  }

  async close(): Promise<void> {
    const db = this.db;
    this.db = null;
    this.repos = null;
    if (db) closeDatabase(db);
  }

  private init(): Promise<Repositories> {
    if (!this.repos) {
      this.repos = this.open();
    }
    return this.repos;
  }

  private async open(): Promise<Repositories> {
    const db = await openDatabase(this.dbPath);
    this.db = db;
    const conn = db.connection;
    await createSchema(conn);
    this.logger.with().str("path", this.dbPath).logger().info("DuckDB ready");
    return {
      readings: new ReadingRepository(conn),
      devices: new DeviceRepository(conn),
    };
  }

  private logResult(table: string, records: number, result: UpsertResult) {
    this.logger
      .with()
      .str("table", table)
      .num("records", records)
      .num("created", result.created)
      .num("updated", result.updated)
      .logger()
      .info("Upserted records");
  }
}
