import { errorMessage, logger } from "../lib/logger.js";
import { runMigrations } from "./migrations.js";
import { closeSql } from "./postgres.js";

async function main(): Promise<void> {
  const applied = await runMigrations();
  await closeSql();
  logger.info("Schema migrations applied", { count: applied.length });
}

void main().catch((error) => {
  logger.error("Schema migration failed", { error: errorMessage(error) });
  process.exitCode = 1;
});
