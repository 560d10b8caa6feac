import { parseArgs } from "util";
import { EcoCounterClient } from "./clients/ecocounter";
import type { FetchFn } from "./clients/http";
import { SocrataSink } from "./clients/socrata";
import { loadConfig } from "./common/config";
import type { CatalogConfig, Config } from "./common/config";
import { ConfigError } from "./common/errors";
import type { Logger } from "./common/logger";
import { DuckDbSink } from "./db/sink";
import { AggregatePublisher, CatalogPublisher } from "./pipeline/publisher";
import type { Publisher } from "./pipeline/publisher";
import { runPipeline } from "./pipeline/run";
import type { RunSummary } from "./pipeline/run";
import type { CatalogSink } from "./pipeline/sink";

export interface CliArgs {
  start?: string;
  end?: string;
}

export function parseCliArgs(argv: string[]): CliArgs {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        start: { type: "string" },
        end: { type: "string" },
      },
      strict: true,
      allowPositionals: false,
    });
    return { start: values.start, end: values.end };
  } catch (e) {
    throw new ConfigError([
      e instanceof Error ? e.message : String(e),
      "usage: [--start YYYY-MM-DD] [--end YYYY-MM-DD]",
    ]);
  }
}

export interface MainOptions {
  logger: Logger;
  fetch?: FetchFn;
  now?: Date;
}

export function createSink(
  catalog: CatalogConfig,
  logger: Logger,
  fetch?: FetchFn
): CatalogSink {
  switch (catalog.target) {
    case "socrata":
      return new SocrataSink({ ...catalog, logger, fetch });
    case "duckdb":
      return new DuckDbSink(catalog.dbPath, logger);
  }
}

/** Parses flags and environment, then runs one pass in the configured mode. */
export async function main(
  argv: string[],
  env: Record<string, string | undefined>,
  options: MainOptions
): Promise<RunSummary> {
  const { logger } = options;
  const args = parseCliArgs(argv);
  const config: Config = loadConfig(env);

  const source = new EcoCounterClient({
    ...config.ecocounter,
    logger,
    fetch: options.fetch,
  });

  let sink: CatalogSink | null = null;
  let publisher: Publisher;
  if (config.publish.mode === "catalog-sync") {
    if (!config.catalog) {
      throw new ConfigError(["catalog-sync mode needs a catalog target"]);
    }
    sink = createSink(config.catalog, logger, options.fetch);
    publisher = new CatalogPublisher(sink, logger);
  } else {
    publisher = new AggregatePublisher(logger);
  }

  try {
    const summary = await runPipeline(
      { source, publisher, logger },
      {
        start: args.start,
        end: args.end,
        strictTyping: config.publish.strictTyping,
        now: options.now,
      }
    );
    logger
      .with()
      .num("devices", summary.devices)
      .num("readings", summary.readings)
      .num("upserts", summary.upserts)
      .num("tableRows", summary.table.length)
      .logger()
      .info("Run complete");
    return summary;
  } finally {
    await sink?.close();
  }
}
