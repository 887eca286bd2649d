import { randomBytes, randomInt, timingSafeEqual } from "node:crypto";

export const CODE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
export const CODE_LENGTH = 6;
const TOKEN_BYTES = 32;

export function generateCode(): string {
  let code = "";
  for (let i = 0; i < CODE_LENGTH; i += 1) {
    code += CODE_ALPHABET.charAt(randomInt(CODE_ALPHABET.length));
  }
  return code;
}

// 32 random bytes, 64 lowercase hex characters.
export function generateToken(): string {
  return randomBytes(TOKEN_BYTES).toString("hex");
}

export function tokensMatch(candidate: string, stored: string): boolean {
  const candidateBuffer = Buffer.from(candidate, "utf8");
  const storedBuffer = Buffer.from(stored, "utf8");
  if (candidateBuffer.length !== storedBuffer.length) {
    return false;
  }

  return timingSafeEqual(candidateBuffer, storedBuffer);
}
