import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { Sql } from "postgres";
import { afterEach, beforeAll, beforeEach, describe, expect, test } from "vitest";

import { MIGRATIONS_DIR, runMigrations } from "../src/db/migrations.js";
import { setLogLevel } from "../src/lib/logger.js";

function fakeSql(alreadyApplied: string[]): { sql: Sql; executed: string[]; recorded: unknown[] } {
  const executed: string[] = [];
  const recorded: unknown[] = [];
  const tag = async (strings: TemplateStringsArray, ...values: unknown[]): Promise<unknown[]> => {
    const text = strings.join("?");
    if (text.includes("SELECT name FROM schema_migrations")) {
      return alreadyApplied.map((name) => ({ name }));
    }
    if (text.includes("INSERT INTO schema_migrations")) {
      recorded.push(values[0]);
    }
    return [];
  };
  const unsafe = async (text: string): Promise<unknown[]> => {
    executed.push(text);
    return [];
  };
  return { sql: Object.assign(tag, { unsafe }) as unknown as Sql, executed, recorded };
}

describe("runMigrations", () => {
  let dir: string;

  beforeAll(() => {
    setLogLevel("error");
  });

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "medlog-migrations-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("applies pending SQL files in name order and records them", async () => {
    await writeFile(path.join(dir, "002_second.sql"), "SELECT 2;");
    await writeFile(path.join(dir, "001_first.sql"), "SELECT 1;");
    await writeFile(path.join(dir, "notes.txt"), "ignored");
    const { sql, executed, recorded } = fakeSql([]);

    const applied = await runMigrations(sql, dir);

    expect(applied).toEqual(["001_first.sql", "002_second.sql"]);
    expect(executed).toEqual(["SELECT 1;", "SELECT 2;"]);
    expect(recorded).toEqual(["001_first.sql", "002_second.sql"]);
  });

  test("skips files that were already applied", async () => {
    await writeFile(path.join(dir, "001_first.sql"), "SELECT 1;");
    await writeFile(path.join(dir, "002_second.sql"), "SELECT 2;");
    const { sql, executed } = fakeSql(["001_first.sql"]);

    await expect(runMigrations(sql, dir)).resolves.toEqual(["002_second.sql"]);
    expect(executed).toEqual(["SELECT 2;"]);
  });

  test("ships the store_documents table migration", async () => {
    const { sql, executed } = fakeSql([]);

    await runMigrations(sql, MIGRATIONS_DIR);

    expect(executed).toHaveLength(1);
    expect(executed[0]).toContain("CREATE TABLE IF NOT EXISTS store_documents");
  });
});
