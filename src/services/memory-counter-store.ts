import type { CounterStore } from "./rate-limit-service.js";

interface Counter {
  value: number;
  expiresAt: number | null;
}

const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

// Used when no Redis is configured. Counts are per process and lost on restart.
export class MemoryCounterStore implements CounterStore {
  private readonly counters = new Map<string, Counter>();
  private nextSweepAt: number;

  constructor(
    private readonly clock: () => number = () => Date.now(),
    private readonly sweepIntervalMs: number = DEFAULT_SWEEP_INTERVAL_MS
  ) {
    this.nextSweepAt = clock() + sweepIntervalMs;
  }

  get size(): number {
    return this.counters.size;
  }

  async incr(key: string): Promise<number> {
    this.sweepIfDue();
    const current = this.live(key);
    const next: Counter = { value: (current?.value ?? 0) + 1, expiresAt: current?.expiresAt ?? null };
    this.counters.set(key, next);
    return next.value;
  }

  async expire(key: string, seconds: number): Promise<number> {
    const current = this.live(key);
    if (!current) {
      return 0;
    }
    current.expiresAt = this.clock() + seconds * 1000;
    return 1;
  }

  async ttl(key: string): Promise<number> {
    const current = this.live(key);
    if (!current) {
      return -2;
    }
    if (current.expiresAt === null) {
      return -1;
    }
    return Math.ceil((current.expiresAt - this.clock()) / 1000);
  }

  private live(key: string): Counter | undefined {
    const counter = this.counters.get(key);
    if (counter && isExpired(counter, this.clock())) {
      this.counters.delete(key);
      return undefined;
    }
    return counter;
  }

  private sweepIfDue(): void {
    const now = this.clock();
    if (now < this.nextSweepAt) {
      return;
    }

    for (const [key, counter] of this.counters) {
      if (isExpired(counter, now)) {
        this.counters.delete(key);
      }
    }
    this.nextSweepAt = now + this.sweepIntervalMs;
  }
}

function isExpired(counter: Counter, now: number): boolean {
  return counter.expiresAt !== null && counter.expiresAt <= now;
}
