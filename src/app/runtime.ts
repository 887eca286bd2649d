import { getEnv, parseAllowedOrigins } from "../config/env.js";
import { closeSql } from "../db/postgres.js";
import { getRedis, isRedisConfigured } from "../db/redis.js";
import { ApiServer } from "../http/api-server.js";
import { errorMessage, logger, setLogLevel } from "../lib/logger.js";
import { CredentialService } from "../services/credential-service.js";
import { EventLedgerService } from "../services/event-ledger-service.js";
import { LegacyMigrationService } from "../services/legacy-migration-service.js";
import { MemoryCounterStore } from "../services/memory-counter-store.js";
import { RateLimitService, type CounterStore } from "../services/rate-limit-service.js";
import { openStore } from "./store.js";

export async function runRuntime(): Promise<void> {
  const env = getEnv();
  setLogLevel(env.LOG_LEVEL);

  const store = await openStore(env);
  if (env.MIGRATE_LEGACY_LOGS_ON_START) {
    await new LegacyMigrationService(store).migrateLogsToEvents();
  }

  let counters: CounterStore;
  if (isRedisConfigured(env)) {
    counters = getRedis();
  } else {
    logger.warn("Redis not configured; rate limits are kept in process memory");
    counters = new MemoryCounterStore();
  }

  const credentials = new CredentialService(store, { maxCodeAttempts: env.CODE_ISSUE_MAX_ATTEMPTS });
  const ledger = new EventLedgerService(store);
  const server = new ApiServer(credentials, ledger, new RateLimitService(counters), {
    port: env.HTTP_PORT,
    allowedOrigins: parseAllowedOrigins(env.ALLOWED_ORIGINS),
    trustProxy: env.PRODUCTION
  });
  await server.start();

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down");
    await server.stop();
    await closeSql();
  };

  const onSignal = (): void => {
    void shutdown().catch((error) => {
      logger.error("Shutdown failed", { error: errorMessage(error) });
      process.exitCode = 1;
    });
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}
