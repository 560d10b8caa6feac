import { describe, expect, it, vi } from "vitest";
import { ConfigError, DateParseError, HttpError } from "../common/errors";
import { LogLevel, StructuredLogger } from "../common/logger";
import type {
  DateRange,
  Device,
  DeviceRecord,
  RawReading,
  ReadingRecord,
  UpsertResult,
} from "../types";
import { AggregatePublisher, CatalogPublisher } from "./publisher";
import { runPipeline } from "./run";
import type { DeviceSource } from "./run";
import type { CatalogSink } from "./sink";

const logger = new StructuredLogger({ level: LogLevel.ERROR });

const elm: Device = {
  id: 42,
  name: "Elm St",
  latitude: 45.5,
  longitude: -73.6,
  linkedFlows: [{ flowId: 7 }, { flowId: 8 }],
};

const oak: Device = {
  id: 43,
  name: "Oak Ave",
  latitude: null,
  longitude: null,
  linkedFlows: [],
};

const readingsById: Record<string, RawReading[]> = {
  "42": [
    { timestamp: "01/06/2022", count: 5 },
    { timestamp: "01/06/2022", count: 0 },
    { timestamp: "02/06/2022", count: 3 },
  ],
  "43": [],
};

function fakeSource(
  devices: Device[],
  readings: Record<string, RawReading[]> = readingsById
) {
  return {
    fetchDevices: vi.fn<DeviceSource["fetchDevices"]>(async () => devices),
    fetchReadings: vi.fn<DeviceSource["fetchReadings"]>(
      async (device: Device, _range: DateRange) =>
        readings[String(device.id)] ?? []
    ),
  };
}

const ok: UpsertResult = { created: 1, updated: 0, errors: 0 };

function fakeSink() {
  return {
    upsertReadings: vi.fn<(records: ReadingRecord[]) => Promise<UpsertResult>>(
      async () => ok
    ),
    upsertDevices: vi.fn<(records: DeviceRecord[]) => Promise<UpsertResult>>(
      async () => ok
    ),
    close: vi.fn<CatalogSink["close"]>(async () => undefined),
  };
}

const options = { start: "2022-06-01", end: "2022-06-02", strictTyping: true };

describe("runPipeline in catalog-sync mode", () => {
  it("upserts each non-empty device table and then the device list", async () => {
    const source = fakeSource([elm, oak]);
    const sink = fakeSink();
    const publisher = new CatalogPublisher(sink, logger);

    const summary = await runPipeline({ source, publisher, logger }, options);

    expect(source.fetchReadings).toHaveBeenCalledTimes(2);
    expect(source.fetchReadings).toHaveBeenCalledWith(elm, {
      start: "01/06/2022",
      end: "02/06/2022",
    });
    expect(sink.upsertReadings).toHaveBeenCalledTimes(1);
    expect(sink.upsertReadings).toHaveBeenCalledWith([
      {
        date: "2022-06-01T00:00:00",
        count: 5,
        sensor_id: "42",
        sensor_name: "Elm St",
        record_id: "4201/06/2022",
      },
      {
        date: "2022-06-02T00:00:00",
        count: 3,
        sensor_id: "42",
        sensor_name: "Elm St",
        record_id: "4202/06/2022",
      },
    ]);
    expect(sink.upsertDevices).toHaveBeenCalledWith([
      { sensor_id: "42", latitude: 45.5, longitude: -73.6, sensor_name: "Elm St" },
      { sensor_id: "43", latitude: null, longitude: null, sensor_name: "Oak Ave" },
    ]);
    expect(summary).toEqual({
      range: { start: "01/06/2022", end: "02/06/2022" },
      devices: 2,
      readings: 2,
      upserts: 2,
      table: [],
    });
  });

  it("makes no upsert for an empty device list", async () => {
    const sink = fakeSink();
    const summary = await runPipeline(
      {
        source: fakeSource([]),
        publisher: new CatalogPublisher(sink, logger),
        logger,
      },
      options
    );
    expect(sink.upsertReadings).not.toHaveBeenCalled();
    expect(sink.upsertDevices).not.toHaveBeenCalled();
    expect(summary.upserts).toBe(0);
    expect(summary.readings).toBe(0);
  });

  it("skips the readings upsert for a device whose rows are all filtered out", async () => {
    const source = fakeSource([elm], {
      "42": [
        { timestamp: "01/06/2022", count: 0 },
        { timestamp: "02/06/2022", count: -3 },
        { timestamp: "03/06/2022", count: null },
      ],
    });
    const sink = fakeSink();

    const summary = await runPipeline(
      { source, publisher: new CatalogPublisher(sink, logger), logger },
      options
    );

    expect(source.fetchReadings).toHaveBeenCalledTimes(1);
    expect(sink.upsertReadings).not.toHaveBeenCalled();
    expect(sink.upsertDevices).toHaveBeenCalledWith([
      { sensor_id: "42", latitude: 45.5, longitude: -73.6, sensor_name: "Elm St" },
    ]);
    expect(summary.readings).toBe(0);
    expect(summary.upserts).toBe(1);
  });

  it("refuses loose tables", async () => {
    const publisher = new CatalogPublisher(fakeSink(), logger);
    await expect(
      runPipeline(
        { source: fakeSource([elm]), publisher, logger },
        { ...options, strictTyping: false }
      )
    ).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("runPipeline in aggregate mode", () => {
  it("concatenates device tables in catalog order", async () => {
    const cedar: Device = { ...oak, id: 44, name: "Cedar Rd" };
    const readings = {
      ...readingsById,
      "44": [{ timestamp: "01/06/2022", count: 9 }],
    };
    const publisher = new AggregatePublisher(logger);

    const summary = await runPipeline(
      { source: fakeSource([elm, oak, cedar], readings), publisher, logger },
      { ...options, strictTyping: false }
    );

    expect(summary.upserts).toBe(0);
    expect(summary.readings).toBe(4);
    expect(summary.table).toEqual([
      { date: "01/06/2022", count: 5, sensorLocation: "Elm St" },
      { date: "01/06/2022", count: 0, sensorLocation: "Elm St" },
      { date: "02/06/2022", count: 3, sensorLocation: "Elm St" },
      { date: "01/06/2022", count: 9, sensorLocation: "Cedar Rd" },
    ]);
  });

  it("returns an empty table for an empty device list", async () => {
    const summary = await runPipeline(
      {
        source: fakeSource([]),
        publisher: new AggregatePublisher(logger),
        logger,
      },
      options
    );
    expect(summary.table).toEqual([]);
    expect(summary.devices).toBe(0);
  });
});

describe("runPipeline failures", () => {
  it("rejects a malformed date before any request", async () => {
    const source = fakeSource([elm]);
    await expect(
      runPipeline(
        { source, publisher: new AggregatePublisher(logger), logger },
        { ...options, start: "06/01/2022" }
      )
    ).rejects.toBeInstanceOf(DateParseError);
    expect(source.fetchDevices).not.toHaveBeenCalled();
  });

  it("aborts on the first failing device", async () => {
    const source = fakeSource([elm, oak]);
    source.fetchReadings.mockImplementation(async (device: Device) => {
      if (device.id === 43) {
        throw new HttpError("http.status", "GET readings failed with status 502", {
          status: 502,
        });
      }
      return readingsById["42"];
    });
    const sink = fakeSink();

    await expect(
      runPipeline(
        { source, publisher: new CatalogPublisher(sink, logger), logger },
        options
      )
    ).rejects.toBeInstanceOf(HttpError);
    expect(sink.upsertReadings).toHaveBeenCalledTimes(1);
    expect(sink.upsertDevices).not.toHaveBeenCalled();
  });
});
