export interface LinkedFlow {
  flowId: string | number;
}

export interface Device {
  id: string | number;
  name: string;
  latitude: number | null;
  longitude: number | null;
  linkedFlows: LinkedFlow[];
}

// Both ends in the vendor encoding, DD/MM/YYYY
export interface DateRange {
  start: string;
  end: string;
}

export interface RawReading {
  timestamp: string; // as sent by the vendor, e.g. "01/06/2022"
  count: number | null;
}

export interface Reading {
  date: string;
  count: number;
  sensorId: string;
  sensorName: string;
  recordId: string;
}

export interface LooseReading {
  date: string;
  count: number | null;
  sensorLocation: string;
}

export type ReadingTable =
  | { kind: "strict"; rows: Reading[] }
  | { kind: "loose"; rows: LooseReading[] };

export type TableRow = Reading | LooseReading;

// Catalog payloads keep the dataset's snake_case column names
export interface ReadingRecord {
  date: string;
  count: number;
  sensor_id: string;
  sensor_name: string;
  record_id: string;
}

export interface DeviceRecord {
  sensor_id: string;
  latitude: number | null;
  longitude: number | null;
  sensor_name: string;
}

export interface UpsertResult {
  created: number;
  updated: number;
  errors: number;
}

export function recordId(sensorId: string | number, timestamp: string): string {
  return `${sensorId}${timestamp}`;
}
