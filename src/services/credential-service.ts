import type { SnapshotStore, SnapshotUpdate } from "../db/snapshot-store.js";
import type { CredentialRecord } from "../db/types.js";
import { CodeSpaceExhaustedError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { generateCode, generateToken, tokensMatch } from "../security/credentials.js";

export type LoginResult = { ok: true } | { ok: false; reason: "code_not_found" };

export type TokenResult =
  | { ok: true; token: string; created: boolean }
  | { ok: false; reason: "code_not_found" };

export type ResolveTokenResult = { ok: true; code: string } | { ok: false; reason: "token_invalid" };

export interface CredentialServiceOptions {
  maxCodeAttempts?: number;
  now?: () => Date;
  generateCode?: () => string;
  generateToken?: () => string;
}

const DEFAULT_MAX_CODE_ATTEMPTS = 10;

export class CredentialService {
  private readonly maxCodeAttempts: number;
  private readonly now: () => Date;
  private readonly nextCode: () => string;
  private readonly nextToken: () => string;

  constructor(
    private readonly store: SnapshotStore,
    options: CredentialServiceOptions = {}
  ) {
    this.maxCodeAttempts = options.maxCodeAttempts ?? DEFAULT_MAX_CODE_ATTEMPTS;
    this.now = options.now ?? (() => new Date());
    this.nextCode = options.generateCode ?? generateCode;
    this.nextToken = options.generateToken ?? generateToken;
  }

  async issueCode(): Promise<string> {
    const code = await this.store.update((snapshot) => {
      const taken = new Set(snapshot.codes.map((entry) => entry.code));
      for (let attempt = 1; attempt <= this.maxCodeAttempts; attempt += 1) {
        const candidate = this.nextCode();
        if (taken.has(candidate)) {
          logger.warn("Generated code collided, re-rolling", { attempt });
          continue;
        }

        snapshot.codes.push({ code: candidate, created_at: this.timestamp() });
        return { result: candidate, changed: true };
      }

      throw new CodeSpaceExhaustedError(this.maxCodeAttempts);
    });

    logger.info("Issued code");
    return code;
  }

  async authenticateByCode(code: string): Promise<LoginResult> {
    return this.store.update((snapshot): SnapshotUpdate<LoginResult> => {
      const entry = findByCode(snapshot.codes, code);
      if (!entry) {
        return { result: { ok: false, reason: "code_not_found" }, changed: false };
      }

      entry.last_login_at = this.timestamp();
      return { result: { ok: true }, changed: true };
    });
  }

  async issueToken(code: string): Promise<TokenResult> {
    const result = await this.store.update((snapshot): SnapshotUpdate<TokenResult> => {
      const entry = findByCode(snapshot.codes, code);
      if (!entry) {
        return { result: { ok: false, reason: "code_not_found" }, changed: false };
      }

      if (entry.token) {
        return { result: { ok: true, token: entry.token, created: false }, changed: false };
      }

      const token = this.nextToken();
      entry.token = token;
      entry.token_generated_at = this.timestamp();
      return { result: { ok: true, token, created: true }, changed: true };
    });

    if (result.ok && result.created) {
      logger.info("Issued token for code");
    }
    return result;
  }

  async resolveToken(token: string): Promise<ResolveTokenResult> {
    if (!token) {
      return { ok: false, reason: "token_invalid" };
    }

    return this.store.view((snapshot): ResolveTokenResult => {
      const entry = snapshot.codes.find((candidate) =>
        candidate.token ? tokensMatch(token, candidate.token) : false
      );
      return entry ? { ok: true, code: entry.code } : { ok: false, reason: "token_invalid" };
    });
  }

  async codeExists(code: string): Promise<boolean> {
    return this.store.view((snapshot) => findByCode(snapshot.codes, code) !== undefined);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

function findByCode(codes: CredentialRecord[], code: string): CredentialRecord | undefined {
  return codes.find((entry) => entry.code === code);
}
