import type { Sql } from "postgres";

import { decodeSnapshot, encodeSnapshot } from "./snapshot-codec.js";
import type { SnapshotBackend } from "./snapshot-store.js";
import { emptySnapshot, type StoreSnapshot } from "./types.js";

interface DocumentRow {
  document: string;
}

export class PostgresSnapshotBackend implements SnapshotBackend {
  readonly location: string;

  constructor(
    private readonly sql: Sql,
    private readonly documentKey: string
  ) {
    this.location = `postgres:store_documents/${documentKey}`;
  }

  async load(): Promise<StoreSnapshot> {
    const rows = await this.sql<DocumentRow[]>`
      SELECT document::text AS document
      FROM store_documents
      WHERE id = ${this.documentKey}
    `;

    const row = rows[0];
    if (!row) {
      const initial = emptySnapshot();
      await this.sql`
        INSERT INTO store_documents (id, document)
        VALUES (${this.documentKey}, ${encodeSnapshot(initial)}::jsonb)
        ON CONFLICT (id) DO NOTHING
      `;
      return initial;
    }

    return decodeSnapshot(row.document, this.location);
  }

  async save(snapshot: StoreSnapshot): Promise<void> {
    await this.sql`
      INSERT INTO store_documents (id, document, updated_at)
      VALUES (${this.documentKey}, ${encodeSnapshot(snapshot)}::jsonb, NOW())
      ON CONFLICT (id)
      DO UPDATE SET document = EXCLUDED.document, updated_at = NOW()
    `;
  }
}
