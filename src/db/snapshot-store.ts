import { Mutex } from "../lib/mutex.js";
import type { StoreSnapshot } from "./types.js";

export interface SnapshotBackend {
  readonly location: string;
  load(): Promise<StoreSnapshot>;
  save(snapshot: StoreSnapshot): Promise<void>;
}

export interface SnapshotUpdate<T> {
  result: T;
  changed: boolean;
}

/**
 * Whole-document store. Every read, write and read-modify-write runs under a
 * single lock, so concurrent callers observe a linear sequence of documents.
 */
export class SnapshotStore {
  constructor(
    private readonly backend: SnapshotBackend,
    private readonly mutex: Mutex = new Mutex()
  ) {}

  get location(): string {
    return this.backend.location;
  }

  async read(): Promise<StoreSnapshot> {
    return this.mutex.runExclusive(() => this.backend.load());
  }

  async write(snapshot: StoreSnapshot): Promise<void> {
    await this.mutex.runExclusive(() => this.backend.save(snapshot));
  }

  async update<T>(mutate: (snapshot: StoreSnapshot) => SnapshotUpdate<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const snapshot = await this.backend.load();
      const { result, changed } = mutate(snapshot);
      if (changed) {
        await this.backend.save(snapshot);
      }
      return result;
    });
  }

  async view<T>(select: (snapshot: StoreSnapshot) => T): Promise<T> {
    const snapshot = await this.read();
    return select(snapshot);
  }
}
