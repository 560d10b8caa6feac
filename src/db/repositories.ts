import { DuckDBConnection } from "@duckdb/node-api";
import type { DuckDBValue } from "@duckdb/node-api";
import type { DeviceRecord, ReadingRecord, UpsertResult } from "../types";

function toNullableNumber(val: DuckDBValue): number | null {
  return val === null ? null : Number(val);
}

// Upserts mirror the catalog's semantics: the key column decides insert or update.
export class ReadingRepository {
  constructor(private conn: DuckDBConnection) {}

  async exists(recordId: string): Promise<boolean> {
    const reader = await this.conn.runAndReadAll(
      `select 1 from readings where record_id=$id`,
      { id: recordId }
    );
    return reader.getRowObjects().length > 0;
  }

  async upsert(record: ReadingRecord): Promise<void> {
    await this.conn.run(
      `insert into readings(record_id, reading_date, reading_count, sensor_id, sensor_name)
       values($record_id, $reading_date, $reading_count, $sensor_id, $sensor_name)
       on conflict(record_id) do update set
         reading_count=excluded.reading_count,
         sensor_name=excluded.sensor_name`,
      {
        record_id: record.record_id,
        reading_date: record.date,
        reading_count: record.count,
        sensor_id: record.sensor_id,
        sensor_name: record.sensor_name,
      }
    );
  }

  async upsertMany(records: ReadingRecord[]): Promise<UpsertResult> {
    const result: UpsertResult = { created: 0, updated: 0, errors: 0 };
    for (const r of records) {
      if (await this.exists(r.record_id)) result.updated++;
      else result.created++;
      await this.upsert(r);
    }
    return result;
  }

  async listBySensor(sensorId: string): Promise<ReadingRecord[]> {
    const reader = await this.conn.runAndReadAll(
      `select record_id, strftime(reading_date, '%Y-%m-%dT%H:%M:%S') as reading_date,
              reading_count, sensor_id, sensor_name
       from readings where sensor_id=$s order by reading_date, record_id`,
      { s: sensorId }
    );
    return reader.getRowObjects().map((r) => ({
      record_id: String(r.record_id),
      date: String(r.reading_date),
      count: Number(r.reading_count),
      sensor_id: String(r.sensor_id),
      sensor_name: String(r.sensor_name),
    }));
  }
}

export class DeviceRepository {
  constructor(private conn: DuckDBConnection) {}

  async exists(sensorId: string): Promise<boolean> {
    const reader = await this.conn.runAndReadAll(
      `select 1 from devices where sensor_id=$id`,
      { id: sensorId }
    );
    return reader.getRowObjects().length > 0;
  }

  async upsert(device: DeviceRecord): Promise<void> {
    await this.conn.run(
      `insert into devices(sensor_id, sensor_name, latitude, longitude)
       values($sensor_id, $sensor_name, $latitude, $longitude)
       on conflict(sensor_id) do update set
         sensor_name=excluded.sensor_name,
         latitude=coalesce(excluded.latitude, devices.latitude),
         longitude=coalesce(excluded.longitude, devices.longitude)`,
      {
        sensor_id: device.sensor_id,
        sensor_name: device.sensor_name,
        latitude: device.latitude,
        longitude: device.longitude,
      }
    );
  }

  async upsertMany(devices: DeviceRecord[]): Promise<UpsertResult> {
    const result: UpsertResult = { created: 0, updated: 0, errors: 0 };
    for (const d of devices) {
      if (await this.exists(d.sensor_id)) result.updated++;
      else result.created++;
      await this.upsert(d);
    }
    return result;
  }

  async getAll(): Promise<DeviceRecord[]> {
    const reader = await this.conn.runAndReadAll(
      `select sensor_id, sensor_name, latitude, longitude from devices order by sensor_id`
    );
    return reader.getRowObjects().map((r) => ({
      sensor_id: String(r.sensor_id),
      latitude: toNullableNumber(r.latitude),
      longitude: toNullableNumber(r.longitude),
      sensor_name: String(r.sensor_name),
    }));
  }
}
