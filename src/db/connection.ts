import { DuckDBInstance, DuckDBConnection } from "@duckdb/node-api";
import { mkdirSync, existsSync } from "fs";
import { dirname } from "path";

export const MEMORY_DB = ":memory:";

export interface Database {
  instance: DuckDBInstance;
  connection: DuckDBConnection;
}

/** Opens `dbPath`, creating its directory first; each call owns its handles. */
export async function openDatabase(dbPath: string): Promise<Database> {
  if (dbPath !== MEMORY_DB) {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  }
  const instance = await DuckDBInstance.create(dbPath);
  const connection = await instance.connect();
  return { instance, connection };
}

export function closeDatabase(db: Database): void {
  db.connection.closeSync();
  db.instance.closeSync();
}
