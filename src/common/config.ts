import { z } from "zod";
import {
  DEFAULT_BASE_URL,
  DEFAULT_INTERVAL,
  DEFAULT_ORGANIZATION_ID,
} from "../clients/ecocounter";
import { DEFAULT_TIMEOUT_MS } from "../clients/socrata";
import { ConfigError } from "./errors";
import type { PublishMode } from "../pipeline/publisher";

// -------------------- Config Types --------------------
export type CatalogConfig =
  | {
      target: "socrata";
      endpoint: string;
      appToken: string;
      username: string;
      password: string;
      readingsDatasetId: string;
      devicesDatasetId: string;
      timeoutMs: number;
    }
  | {
      target: "duckdb";
      dbPath: string;
    };

export interface Config {
  ecocounter: {
    baseUrl: string;
    organizationId: string;
    interval: string;
  };
  publish: {
    mode: PublishMode;
    strictTyping: boolean;
  };
  // only present in catalog-sync mode
  catalog?: CatalogConfig;
}

type Env = Record<string, string | undefined>;

const optional = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const EnvSchema = z.object({
  ECOCOUNTER_BASE_URL: optional.pipe(z.string().url().optional()),
  ECOCOUNTER_ORGANIZATION_ID: optional,
  ECOCOUNTER_INTERVAL: optional,
  PUBLISH_MODE: optional.pipe(z.enum(["aggregate", "catalog-sync"]).optional()),
  STRICT_TYPING: optional.pipe(z.enum(["true", "false"]).optional()),
  CATALOG_TARGET: optional.pipe(z.enum(["socrata", "duckdb"]).optional()),
  SOCRATA_ENDPOINT: optional.pipe(z.string().url().optional()),
  SOCRATA_APP_TOKEN: optional,
  SOCRATA_USERNAME: optional,
  SOCRATA_PASSWORD: optional,
  READINGS_DATASET_ID: optional,
  DEVICES_DATASET_ID: optional,
  CATALOG_TIMEOUT_MS: optional.pipe(
    z.coerce.number().int().positive().optional()
  ),
  DUCKDB_PATH: optional,
});

type ParsedEnv = z.infer<typeof EnvSchema>;

const SOCRATA_VARS = [
  "SOCRATA_ENDPOINT",
  "SOCRATA_APP_TOKEN",
  "SOCRATA_USERNAME",
  "SOCRATA_PASSWORD",
  "READINGS_DATASET_ID",
  "DEVICES_DATASET_ID",
] as const;

/**
 * Builds the run configuration from environment variables. Everything a
 * catalog-sync run needs is checked here, before any request is made.
 */
export function loadConfig(env: Env = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  const vars = parsed.data;
  const mode = vars.PUBLISH_MODE ?? "aggregate";
  const strictTyping = vars.STRICT_TYPING !== "false";

  const config: Config = {
    ecocounter: {
      baseUrl: vars.ECOCOUNTER_BASE_URL ?? DEFAULT_BASE_URL,
      organizationId: vars.ECOCOUNTER_ORGANIZATION_ID ?? DEFAULT_ORGANIZATION_ID,
      interval: vars.ECOCOUNTER_INTERVAL ?? DEFAULT_INTERVAL,
    },
    publish: { mode, strictTyping },
  };

  if (mode === "catalog-sync") {
    if (!strictTyping) {
      throw new ConfigError([
        "STRICT_TYPING=false is not supported with PUBLISH_MODE=catalog-sync",
      ]);
    }
    config.catalog = loadCatalogConfig(vars);
  }
  return config;
}

function loadCatalogConfig(vars: ParsedEnv): CatalogConfig {
  if (vars.CATALOG_TARGET === "duckdb") {
    if (!vars.DUCKDB_PATH) {
      throw new ConfigError(["DUCKDB_PATH is required for CATALOG_TARGET=duckdb"]);
    }
    return { target: "duckdb", dbPath: vars.DUCKDB_PATH };
  }

  const {
    SOCRATA_ENDPOINT: endpoint,
    SOCRATA_APP_TOKEN: appToken,
    SOCRATA_USERNAME: username,
    SOCRATA_PASSWORD: password,
    READINGS_DATASET_ID: readingsDatasetId,
    DEVICES_DATASET_ID: devicesDatasetId,
  } = vars;
  if (
    !endpoint ||
    !appToken ||
    !username ||
    !password ||
    !readingsDatasetId ||
    !devicesDatasetId
  ) {
    const missing = SOCRATA_VARS.filter((name) => !vars[name]);
    throw new ConfigError(missing.map((name) => `${name} is required`));
  }
  return {
    target: "socrata",
    endpoint,
    appToken,
    username,
    password,
    readingsDatasetId,
    devicesDatasetId,
    timeoutMs: vars.CATALOG_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
  };
}
