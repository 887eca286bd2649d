import { z } from "zod";

import { StorageCorruptError } from "../lib/errors.js";
import { MEDICINE_TYPES, type StoreSnapshot } from "./types.js";

// Records pass unknown keys through so a rewrite of the document keeps them.
const credentialRecordSchema = z
  .object({
    code: z.string(),
    created_at: z.string(),
    token: z.string().optional(),
    token_generated_at: z.string().optional(),
    last_login_at: z.string().optional()
  })
  .passthrough();

// Old clients could store counts as numeric strings.
const legacyCount = z.union([z.number(), z.string().regex(/^\d+$/).transform(Number)]).nullish();

const legacyLogRecordSchema = z
  .object({
    code: z.string(),
    log: z
      .object({
        date: z.string(),
        spray: legacyCount,
        ventoline: legacyCount,
        preventive: z.boolean().nullish()
      })
      .passthrough(),
    received_at: z.string().optional()
  })
  .passthrough();

const eventRecordSchema = z
  .object({
    code: z.string(),
    event: z
      .object({
        id: z.string(),
        date: z.string(),
        timestamp: z.string(),
        type: z.enum(MEDICINE_TYPES),
        count: z.number().int(),
        preventive: z.boolean().default(false)
      })
      .passthrough(),
    received_at: z.string()
  })
  .passthrough();

// Documents written before events existed only carry codes and logs.
const snapshotSchema = z
  .object({
    codes: z.array(credentialRecordSchema).default([]),
    logs: z.array(legacyLogRecordSchema).default([]),
    events: z.array(eventRecordSchema).default([])
  })
  .passthrough();

export function decodeSnapshot(raw: string, location: string): StoreSnapshot {
  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(raw);
  } catch (error) {
    throw new StorageCorruptError(location, "document is not valid JSON", error);
  }

  const parsed = snapshotSchema.safeParse(parsedJson);
  if (!parsed.success) {
    throw new StorageCorruptError(location, parsed.error.message, parsed.error);
  }

  return parsed.data;
}

export function encodeSnapshot(snapshot: StoreSnapshot): string {
  return JSON.stringify(snapshot, null, 2);
}
