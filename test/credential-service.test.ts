import { describe, expect, test } from "vitest";

import { CodeSpaceExhaustedError } from "../src/lib/errors.js";
import { CODE_ALPHABET, generateCode, generateToken } from "../src/security/credentials.js";
import { CredentialService } from "../src/services/credential-service.js";
import { fixedClock, memoryStore } from "./helpers/memory-backend.js";

const NOW = "2026-03-01T08:30:00.000Z";

function sequence(values: string[]): () => string {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)] ?? "";
    index += 1;
    return value;
  };
}

describe("credential generators", () => {
  test("codes are six characters from the uppercase alphanumeric alphabet", () => {
    for (let i = 0; i < 50; i += 1) {
      const code = generateCode();
      expect(code).toMatch(/^[A-Z0-9]{6}$/);
      expect([...code].every((char) => CODE_ALPHABET.includes(char))).toBe(true);
    }
  });

  test("tokens are 64 lowercase hex characters", () => {
    expect(generateToken()).toMatch(/^[0-9a-f]{64}$/);
    expect(generateToken()).not.toBe(generateToken());
  });
});

describe("CredentialService", () => {
  test("issues a code and persists its record", async () => {
    const { store, backend } = memoryStore();
    const service = new CredentialService(store, { now: fixedClock(NOW), generateCode: () => "ABC123" });

    const code = await service.issueCode();

    expect(code).toBe("ABC123");
    expect(backend.current().codes).toEqual([{ code: "ABC123", created_at: NOW }]);
  });

  test("re-rolls a code that collides with an existing one", async () => {
    const { store, backend } = memoryStore({
      codes: [{ code: "ABC123", created_at: NOW }],
      logs: [],
      events: []
    });
    const service = new CredentialService(store, {
      now: fixedClock(NOW),
      generateCode: sequence(["ABC123", "ABC123", "XYZ789"])
    });

    await expect(service.issueCode()).resolves.toBe("XYZ789");
    expect(backend.current().codes.map((entry) => entry.code)).toEqual(["ABC123", "XYZ789"]);
  });

  test("gives up after the configured number of collisions", async () => {
    const { store, backend } = memoryStore({
      codes: [{ code: "ABC123", created_at: NOW }],
      logs: [],
      events: []
    });
    const service = new CredentialService(store, { maxCodeAttempts: 3, generateCode: () => "ABC123" });

    await expect(service.issueCode()).rejects.toBeInstanceOf(CodeSpaceExhaustedError);
    expect(backend.saves).toBe(0);
  });

  test("stamps last_login_at on code authentication", async () => {
    const { store, backend } = memoryStore({
      codes: [{ code: "ABC123", created_at: "2026-01-01T00:00:00.000Z" }],
      logs: [],
      events: []
    });
    const service = new CredentialService(store, { now: fixedClock(NOW) });

    await expect(service.authenticateByCode("ABC123")).resolves.toEqual({ ok: true });
    expect(backend.current().codes[0]?.last_login_at).toBe(NOW);
  });

  test("rejects authentication with an unknown code without writing", async () => {
    const { store, backend } = memoryStore();
    const service = new CredentialService(store);

    await expect(service.authenticateByCode("NOPE00")).resolves.toEqual({
      ok: false,
      reason: "code_not_found"
    });
    expect(backend.saves).toBe(0);
  });

  test("returns the same token on every request for a code", async () => {
    const { store, backend } = memoryStore();
    const service = new CredentialService(store, {
      now: fixedClock(NOW),
      generateCode: () => "ABC123",
      generateToken: sequence(["a".repeat(64), "b".repeat(64)])
    });
    const code = await service.issueCode();

    const first = await service.issueToken(code);
    const second = await service.issueToken(code);

    expect(first).toEqual({ ok: true, token: "a".repeat(64), created: true });
    expect(second).toEqual({ ok: true, token: "a".repeat(64), created: false });
    expect(backend.current().codes[0]).toEqual({
      code: "ABC123",
      created_at: NOW,
      token: "a".repeat(64),
      token_generated_at: NOW
    });
  });

  test("does not issue a token for an unknown code", async () => {
    const { store } = memoryStore();
    const service = new CredentialService(store);

    await expect(service.issueToken("NOPE00")).resolves.toEqual({ ok: false, reason: "code_not_found" });
  });

  test("resolves each token to exactly the code it was issued for", async () => {
    const { store } = memoryStore();
    const service = new CredentialService(store, {
      generateCode: sequence(["AAA111", "BBB222"])
    });
    const codeA = await service.issueCode();
    const codeB = await service.issueCode();
    const tokenA = await service.issueToken(codeA);
    const tokenB = await service.issueToken(codeB);
    if (!tokenA.ok || !tokenB.ok) {
      throw new Error("expected tokens");
    }

    expect(tokenA.token).not.toBe(tokenB.token);
    await expect(service.resolveToken(tokenA.token)).resolves.toEqual({ ok: true, code: "AAA111" });
    await expect(service.resolveToken(tokenB.token)).resolves.toEqual({ ok: true, code: "BBB222" });
  });

  test("rejects unknown, empty and differently cased tokens", async () => {
    const { store } = memoryStore();
    const service = new CredentialService(store, {
      generateCode: () => "ABC123",
      generateToken: () => "abcdef".padEnd(64, "0")
    });
    await service.issueToken(await service.issueCode());

    await expect(service.resolveToken("f".repeat(64))).resolves.toEqual({ ok: false, reason: "token_invalid" });
    await expect(service.resolveToken("")).resolves.toEqual({ ok: false, reason: "token_invalid" });
    await expect(service.resolveToken("ABCDEF".padEnd(64, "0"))).resolves.toEqual({
      ok: false,
      reason: "token_invalid"
    });
  });

  test("serialises concurrent token requests for one code", async () => {
    const { store } = memoryStore({ codes: [{ code: "ABC123", created_at: NOW }], logs: [], events: [] });
    const service = new CredentialService(store, {
      generateToken: sequence(["1".repeat(64), "2".repeat(64), "3".repeat(64)])
    });

    const results = await Promise.all([
      service.issueToken("ABC123"),
      service.issueToken("ABC123"),
      service.issueToken("ABC123")
    ]);

    const tokens = results.map((result) => (result.ok ? result.token : null));
    expect(tokens).toEqual(["1".repeat(64), "1".repeat(64), "1".repeat(64)]);
  });

  test("checks whether a code exists", async () => {
    const { store } = memoryStore({ codes: [{ code: "ABC123", created_at: NOW }], logs: [], events: [] });
    const service = new CredentialService(store);

    await expect(service.codeExists("ABC123")).resolves.toBe(true);
    await expect(service.codeExists("ZZZZZZ")).resolves.toBe(false);
  });
});
