import { z } from "zod";

import { MEDICINE_TYPES } from "../db/types.js";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function isCalendarDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

const dateField = z.string().refine(isCalendarDate, {
  message: "Date must be in YYYY-MM-DD format and be a valid date"
});

const countField = z.number().int().nonnegative();

export const logEntrySchema = z
  .object({
    date: dateField,
    spray: countField.nullish(),
    ventoline: countField.nullish(),
    preventive: z.boolean().nullish()
  })
  .refine((log) => (log.spray ?? 0) > 0 || (log.ventoline ?? 0) > 0, {
    message: "At least one medicine type must have a non-zero count"
  });

export const usageEventSchema = z.object({
  id: z
    .string()
    .min(1)
    .max(128)
    .refine((id) => id.trim() === id, { message: "Event id must not start or end with whitespace" }),
  date: dateField,
  timestamp: z.string().datetime({ offset: true, message: "Timestamp must be an ISO 8601 datetime" }),
  type: z.enum(MEDICINE_TYPES),
  count: z.number().int().min(1),
  preventive: z.boolean().default(false)
});

export const codeBodySchema = z.object({
  code: z.string().min(1).optional()
});

export type ValidationOutcome<T> = { ok: true; value: T } | { ok: false; error: string };

export function validate<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  input: unknown,
  root: string
): ValidationOutcome<Output> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }

  const issue = parsed.error.issues[0];
  const field = issue?.path[0] ?? root;
  const message = issue?.message ?? "Invalid input";
  return { ok: false, error: `Validation error in '${String(field)}': ${message}` };
}
