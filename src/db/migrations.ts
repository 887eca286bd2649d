import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import type { Sql } from "postgres";

import { logger } from "../lib/logger.js";
import { getSql } from "./postgres.js";

interface MigrationRow {
  name: string;
}

export const MIGRATIONS_DIR = path.join(process.cwd(), "src", "db", "migrations");

export async function runMigrations(sql: Sql = getSql(), dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await sql`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `;

  const files = (await readdir(dir))
    .filter((file) => file.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b));

  const appliedRows = await sql<MigrationRow[]>`SELECT name FROM schema_migrations`;
  const applied = new Set(appliedRows.map((row) => row.name));
  const newlyApplied: string[] = [];

  for (const file of files) {
    if (applied.has(file)) {
      continue;
    }

    const migrationSql = await readFile(path.join(dir, file), "utf8");
    await sql.unsafe(migrationSql);
    await sql`INSERT INTO schema_migrations (name) VALUES (${file})`;
    newlyApplied.push(file);
    logger.info("Applied schema migration", { file });
  }

  return newlyApplied;
}
