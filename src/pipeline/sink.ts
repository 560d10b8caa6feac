import type { DeviceRecord, ReadingRecord, UpsertResult } from "../types";

/** Destination of catalog-sync mode: one readings and one devices dataset. */
export interface CatalogSink {
  upsertReadings(records: ReadingRecord[]): Promise<UpsertResult>;
  upsertDevices(records: DeviceRecord[]): Promise<UpsertResult>;
  close(): Promise<void>;
}
