import { v5 as uuidv5 } from "uuid";

import type { MedicineType } from "../db/types.js";

/**
 * Namespace for ids of events converted from legacy logs. Changing it would
 * make a re-run of the migration duplicate every converted event.
 */
export const LEGACY_EVENT_NAMESPACE_V1 = "6f1c2b9e-4d3a-5e7f-8a1b-2c3d4e5f6a7b";

export function deriveLegacyEventId(code: string, date: string, type: MedicineType): string {
  return uuidv5(`${code}:${date}:${type}`, LEGACY_EVENT_NAMESPACE_V1);
}
