import type { AppEnv } from "../config/env.js";
import { resolveDataFile } from "../config/env.js";
import { FileSnapshotBackend } from "../db/file-snapshot-backend.js";
import { runMigrations } from "../db/migrations.js";
import { getSql } from "../db/postgres.js";
import { PostgresSnapshotBackend } from "../db/postgres-snapshot-backend.js";
import { SnapshotStore, type SnapshotBackend } from "../db/snapshot-store.js";
import { logger } from "../lib/logger.js";

export async function openStore(env: AppEnv): Promise<SnapshotStore> {
  let backend: SnapshotBackend;
  if (env.DATA_STORE === "postgres") {
    const sql = getSql();
    await runMigrations(sql);
    backend = new PostgresSnapshotBackend(sql, env.STORE_DOCUMENT_KEY);
  } else {
    backend = new FileSnapshotBackend(resolveDataFile(env));
  }

  const store = new SnapshotStore(backend);
  // Surfaces a corrupt document at start-up instead of on the first request.
  await store.read();
  logger.info("Store opened", { backend: env.DATA_STORE, location: store.location });
  return store;
}
