#!/usr/bin/env node
/**
 * index.ts
 *
 * Fetches trail-counter readings from the eco-counter public API for a date
 * range and either returns them as one combined table (aggregate mode) or
 * upserts them into a catalog (catalog-sync mode).
 *
 *   node dist/index.js [--start YYYY-MM-DD] [--end YYYY-MM-DD]
 */
import { main } from "./cli";
import { getLogger } from "./common/logger";

const logger = getLogger();

main(process.argv.slice(2), process.env, { logger }).catch((err) => {
  logger.with().error(err).logger().error("Fatal error");
  process.exit(1);
});
