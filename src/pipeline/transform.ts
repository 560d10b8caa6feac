import { toCatalogTimestamp } from "../common/dates";
import {
  recordId,
  type Device,
  type DeviceRecord,
  type LooseReading,
  type RawReading,
  type Reading,
  type ReadingRecord,
  type ReadingTable,
} from "../types";

export interface TransformOptions {
  strictTyping: boolean;
}

/**
 * Reshapes one device's raw readings.
 *
 * Strict typing truncates counts to integers, drops rows whose count is null
 * or not positive, and keys every row by device id + raw timestamp. Loose typing
 * only labels rows with the device name.
 */
export function transformReadings(
  device: Device,
  raw: RawReading[],
  options: TransformOptions
): ReadingTable {
  if (!options.strictTyping) {
    return { kind: "loose", rows: raw.map((r) => toLooseReading(device, r)) };
  }
  const sensorId = String(device.id);
  const rows: Reading[] = [];
  for (const r of raw) {
    if (r.count === null) continue;
    const count = Math.trunc(r.count);
    if (count <= 0) continue;
    rows.push({
      date: r.timestamp,
      count,
      sensorId,
      sensorName: device.name,
      recordId: recordId(sensorId, r.timestamp),
    });
  }
  return { kind: "strict", rows };
}

function toLooseReading(device: Device, r: RawReading): LooseReading {
  return { date: r.timestamp, count: r.count, sensorLocation: device.name };
}

export function toReadingRecord(reading: Reading): ReadingRecord {
  return {
    date: toCatalogTimestamp(reading.date),
    count: reading.count,
    sensor_id: reading.sensorId,
    sensor_name: reading.sensorName,
    record_id: reading.recordId,
  };
}

export function toDeviceRecord(device: Device): DeviceRecord {
  return {
    sensor_id: String(device.id),
    latitude: device.latitude,
    longitude: device.longitude,
    sensor_name: device.name,
  };
}
