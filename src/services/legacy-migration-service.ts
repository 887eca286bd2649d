import type { SnapshotStore, SnapshotUpdate } from "../db/snapshot-store.js";
import {
  MEDICINE_TYPES,
  type EventRecord,
  type LegacyLogRecord,
  type StoreSnapshot,
  type StoredRecord
} from "../db/types.js";
import { deriveLegacyEventId } from "../lib/event-id.js";
import { logger } from "../lib/logger.js";

// Legacy logs carried no time of day.
const LEGACY_TIME_OF_DAY = "T12:00:00.000Z";

export interface MigrationReport {
  scanned: number;
  created: number;
  skipped: number;
}

export interface MigrationPlan {
  events: EventRecord[];
  report: MigrationReport;
}

export function toStoredRecords(snapshot: StoreSnapshot): StoredRecord[] {
  return [
    ...snapshot.logs.map((record): StoredRecord => ({ kind: "legacy_log", record })),
    ...snapshot.events.map((record): StoredRecord => ({ kind: "event", record }))
  ];
}

export function convertLegacyLog(entry: LegacyLogRecord, receivedFallback: string): EventRecord[] {
  const converted: EventRecord[] = [];
  for (const type of MEDICINE_TYPES) {
    const count = entry.log[type];
    if (count === undefined || count === null || count <= 0) {
      continue;
    }

    converted.push({
      code: entry.code,
      event: {
        id: deriveLegacyEventId(entry.code, entry.log.date, type),
        date: entry.log.date,
        timestamp: `${entry.log.date}${LEGACY_TIME_OF_DAY}`,
        type,
        count,
        preventive: false
      },
      received_at: entry.received_at ?? receivedFallback
    });
  }
  return converted;
}

/**
 * Works out which events a migration run would add. Ids already present
 * anywhere in the store are left alone, including ids produced earlier in the
 * same run.
 */
export function planLegacyMigration(snapshot: StoreSnapshot, now: Date): MigrationPlan {
  const records = toStoredRecords(snapshot);
  const seen = new Set<string>();
  const legacy: LegacyLogRecord[] = [];
  for (const stored of records) {
    if (stored.kind === "event") {
      seen.add(stored.record.event.id);
    } else {
      legacy.push(stored.record);
    }
  }

  const events: EventRecord[] = [];
  let skipped = 0;
  const fallback = now.toISOString();

  for (const entry of legacy) {
    for (const candidate of convertLegacyLog(entry, fallback)) {
      if (seen.has(candidate.event.id)) {
        skipped += 1;
        continue;
      }
      seen.add(candidate.event.id);
      events.push(candidate);
    }
  }

  return {
    events,
    report: { scanned: legacy.length, created: events.length, skipped }
  };
}

export class LegacyMigrationService {
  constructor(
    private readonly store: SnapshotStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async migrateLogsToEvents(): Promise<MigrationReport> {
    const report = await this.store.update((snapshot): SnapshotUpdate<MigrationReport> => {
      if (snapshot.logs.length === 0) {
        return { result: { scanned: 0, created: 0, skipped: 0 }, changed: false };
      }

      const plan = planLegacyMigration(snapshot, this.now());
      snapshot.events.push(...plan.events);
      return { result: plan.report, changed: plan.events.length > 0 };
    });

    logger.info("Legacy log migration finished", { ...report });
    return report;
  }
}
