import type { SnapshotStore, SnapshotUpdate } from "../db/snapshot-store.js";
import type { LegacyLog, LegacyLogView, StoredEvent, UsageEvent } from "../db/types.js";
import { logger } from "../lib/logger.js";

export type AppendOutcome = "inserted" | "skipped";

export interface EventLedgerOptions {
  now?: () => Date;
}

export class EventLedgerService {
  private readonly now: () => Date;

  constructor(
    private readonly store: SnapshotStore,
    options: EventLedgerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Stores the event unless one with the same id already exists for this code.
   * Retrying with the same id is safe and reports "skipped".
   */
  async appendEvent(code: string, event: UsageEvent): Promise<AppendOutcome> {
    const outcome = await this.store.update((snapshot): SnapshotUpdate<AppendOutcome> => {
      const duplicate = snapshot.events.some(
        (entry) => entry.code === code && entry.event.id === event.id
      );
      if (duplicate) {
        return { result: "skipped", changed: false };
      }

      snapshot.events.push({
        code,
        event: { ...event },
        received_at: this.now().toISOString()
      });
      return { result: "inserted", changed: true };
    });

    logger.debug("Event append", { eventId: event.id, outcome });
    return outcome;
  }

  async listEvents(code: string): Promise<StoredEvent[]> {
    return this.store.view((snapshot) =>
      snapshot.events
        .filter((entry) => entry.code === code)
        .map((entry) => ({ ...entry.event, received_at: entry.received_at }))
    );
  }

  async appendLog(code: string, log: LegacyLog): Promise<void> {
    await this.store.update((snapshot): SnapshotUpdate<void> => {
      snapshot.logs.push({
        code,
        log: { ...log },
        received_at: this.now().toISOString()
      });
      return { result: undefined, changed: true };
    });
  }

  async listLogsWithMetadata(code: string): Promise<LegacyLogView[]> {
    return this.store.view((snapshot) =>
      snapshot.logs
        .filter((entry) => entry.code === code)
        .map((entry) => ({
          date: entry.log.date,
          spray: entry.log.spray ?? 0,
          ventoline: entry.log.ventoline ?? 0,
          preventive: entry.log.preventive ?? false,
          received_at: entry.received_at ?? null
        }))
    );
  }
}
