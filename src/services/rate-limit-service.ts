export interface CounterStore {
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<number>;
  ttl(key: string): Promise<number>;
}

export interface RateLimitDecision {
  allowed: boolean;
  retryAfterSeconds: number;
}

export class RateLimitService {
  constructor(private readonly counters: CounterStore) {}

  async check(key: string, maxAttempts: number, windowSeconds: number): Promise<RateLimitDecision> {
    const attempts = await this.counters.incr(key);
    if (attempts === 1) {
      await this.counters.expire(key, windowSeconds);
    }

    if (attempts <= maxAttempts) {
      return { allowed: true, retryAfterSeconds: 0 };
    }

    const ttl = await this.counters.ttl(key);
    return { allowed: false, retryAfterSeconds: ttl > 0 ? ttl : windowSeconds };
  }
}
