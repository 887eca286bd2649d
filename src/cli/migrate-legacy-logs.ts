import { openStore } from "../app/store.js";
import { getEnv } from "../config/env.js";
import { closeSql } from "../db/postgres.js";
import { errorMessage, logger, setLogLevel } from "../lib/logger.js";
import { LegacyMigrationService } from "../services/legacy-migration-service.js";

async function main(): Promise<void> {
  const env = getEnv();
  setLogLevel(env.LOG_LEVEL);

  const store = await openStore(env);
  const report = await new LegacyMigrationService(store).migrateLogsToEvents();
  await closeSql();
  console.log(JSON.stringify(report));
}

void main().catch((error) => {
  logger.error("Legacy log migration failed", { error: errorMessage(error) });
  process.exitCode = 1;
});
