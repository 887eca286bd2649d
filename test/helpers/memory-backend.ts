import { decodeSnapshot, encodeSnapshot } from "../../src/db/snapshot-codec.js";
import { SnapshotStore, type SnapshotBackend } from "../../src/db/snapshot-store.js";
import { emptySnapshot, type StoreSnapshot } from "../../src/db/types.js";

export class MemorySnapshotBackend implements SnapshotBackend {
  readonly location = "memory";
  saves = 0;
  private raw: string | null;

  constructor(initial?: StoreSnapshot | string) {
    if (initial === undefined) {
      this.raw = null;
    } else {
      this.raw = typeof initial === "string" ? initial : encodeSnapshot(initial);
    }
  }

  async load(): Promise<StoreSnapshot> {
    await Promise.resolve();
    if (this.raw === null) {
      return emptySnapshot();
    }
    return decodeSnapshot(this.raw, this.location);
  }

  async save(snapshot: StoreSnapshot): Promise<void> {
    await Promise.resolve();
    this.saves += 1;
    this.raw = encodeSnapshot(snapshot);
  }

  current(): StoreSnapshot {
    return this.raw === null ? emptySnapshot() : decodeSnapshot(this.raw, this.location);
  }
}

export function memoryStore(initial?: StoreSnapshot | string): {
  store: SnapshotStore;
  backend: MemorySnapshotBackend;
} {
  const backend = new MemorySnapshotBackend(initial);
  return { store: new SnapshotStore(backend), backend };
}

export function fixedClock(iso: string): () => Date {
  return () => new Date(iso);
}
