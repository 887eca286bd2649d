import { describe, expect, test } from "vitest";

import { DEFAULT_DATA_FILE, parseAllowedOrigins, parseEnv, resolveDataFile } from "../src/config/env.js";

describe("parseEnv", () => {
  test("applies defaults for an empty environment", () => {
    const env = parseEnv({});

    expect(env).toMatchObject({
      NODE_ENV: "development",
      DATA_STORE: "file",
      HTTP_PORT: 5000,
      ALLOWED_ORIGINS: "*",
      PRODUCTION: false,
      MIGRATE_LEGACY_LOGS_ON_START: true,
      CODE_ISSUE_MAX_ATTEMPTS: 10
    });
    expect(resolveDataFile(env)).toBe(DEFAULT_DATA_FILE);
  });

  test("reads production mode from common truthy spellings", () => {
    expect(parseEnv({ PRODUCTION: "true" }).PRODUCTION).toBe(true);
    expect(parseEnv({ PRODUCTION: "1" }).PRODUCTION).toBe(true);
    expect(parseEnv({ PRODUCTION: "TRUE" }).PRODUCTION).toBe(true);
    expect(parseEnv({ PRODUCTION: "false" }).PRODUCTION).toBe(false);
    expect(parseEnv({ PRODUCTION: "yes" }).PRODUCTION).toBe(false);
  });

  test("prefers DATA_FILE over ASTHMA_DATA_FILE", () => {
    expect(resolveDataFile(parseEnv({ DATA_FILE: "a.json", ASTHMA_DATA_FILE: "b.json" }))).toBe("a.json");
    expect(resolveDataFile(parseEnv({ ASTHMA_DATA_FILE: "b.json" }))).toBe("b.json");
  });

  test("rejects invalid values", () => {
    expect(() => parseEnv({ DATA_STORE: "sqlite" })).toThrow(/^Invalid environment:/);
    expect(() => parseEnv({ HTTP_PORT: "70000" })).toThrow(/^Invalid environment:/);
  });
});

describe("parseAllowedOrigins", () => {
  test("keeps the wildcard", () => {
    expect(parseAllowedOrigins("*")).toBe("*");
  });

  test("splits a comma separated list", () => {
    expect(parseAllowedOrigins("https://a.example.test, https://b.example.test,")).toEqual([
      "https://a.example.test",
      "https://b.example.test"
    ]);
  });
});
