import { DuckDBConnection } from "@duckdb/node-api";

export async function createSchema(
  connection: DuckDBConnection
): Promise<void> {
  // readings keyed like the catalog dataset: device id + raw vendor timestamp
  await connection.run(`create table if not exists readings (
    record_id text primary key,
    reading_date timestamp not null,
    reading_count integer not null,
    sensor_id text not null,
    sensor_name text not null,
    ingested_at timestamp not null default current_timestamp
  )`);

  await connection.run(`create table if not exists devices (
    sensor_id text primary key,
    sensor_name text not null,
    latitude double,
    longitude double
  )`);
}
