import { Redis } from "@upstash/redis";

import type { AppEnv } from "../config/env.js";
import { getEnv } from "../config/env.js";

let redisClient: Redis | null = null;

export function isRedisConfigured(env: AppEnv = getEnv()): boolean {
  return Boolean(env.UPSTASH_REDIS_REST_URL && env.UPSTASH_REDIS_REST_TOKEN);
}

export function getRedis(): Redis {
  if (redisClient) {
    return redisClient;
  }

  const env = getEnv();
  if (!env.UPSTASH_REDIS_REST_URL || !env.UPSTASH_REDIS_REST_TOKEN) {
    throw new Error("Missing UPSTASH_REDIS_REST_URL or UPSTASH_REDIS_REST_TOKEN");
  }

  redisClient = new Redis({
    url: env.UPSTASH_REDIS_REST_URL,
    token: env.UPSTASH_REDIS_REST_TOKEN
  });
  return redisClient;
}
