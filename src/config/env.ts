import { z } from "zod";

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") {
        return fallback;
      }
      return ["true", "1"].includes(value.trim().toLowerCase());
    });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DATA_STORE: z.enum(["file", "postgres"]).default("file"),
  DATA_FILE: z.string().min(1).optional(),
  ASTHMA_DATA_FILE: z.string().min(1).optional(),
  DATABASE_URL: z.string().url().optional(),
  STORE_DOCUMENT_KEY: z.string().min(1).default("default"),
  UPSTASH_REDIS_REST_URL: z.string().url().optional(),
  UPSTASH_REDIS_REST_TOKEN: z.string().min(1).optional(),
  HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  ALLOWED_ORIGINS: z.string().min(1).default("*"),
  PRODUCTION: booleanFlag(false),
  MIGRATE_LEGACY_LOGS_ON_START: booleanFlag(true),
  CODE_ISSUE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(100).default(10)
});

export type AppEnv = z.infer<typeof envSchema>;

export const DEFAULT_DATA_FILE = "data/storage.json";

let cachedEnv: AppEnv | null = null;

export function parseEnv(source: Record<string, string | undefined>): AppEnv {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function getEnv(): AppEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}

export function resetEnvForTests(): void {
  cachedEnv = null;
}

// DATA_FILE wins over the older ASTHMA_DATA_FILE name.
export function resolveDataFile(env: AppEnv): string {
  return env.DATA_FILE ?? env.ASTHMA_DATA_FILE ?? DEFAULT_DATA_FILE;
}

export function parseAllowedOrigins(raw: string): "*" | string[] {
  const trimmed = raw.trim();
  if (trimmed === "*") {
    return "*";
  }
  return trimmed
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}
