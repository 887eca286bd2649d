export const MEDICINE_TYPES = ["spray", "ventoline"] as const;

export type MedicineType = (typeof MEDICINE_TYPES)[number];

export interface CredentialRecord {
  code: string;
  created_at: string;
  token?: string;
  token_generated_at?: string;
  last_login_at?: string;
}

export interface LegacyLog {
  date: string;
  spray?: number | null;
  ventoline?: number | null;
  preventive?: boolean | null;
}

export interface LegacyLogRecord {
  code: string;
  log: LegacyLog;
  received_at?: string;
}

export interface UsageEvent {
  id: string;
  date: string;
  timestamp: string;
  type: MedicineType;
  count: number;
  preventive: boolean;
}

export interface EventRecord {
  code: string;
  event: UsageEvent;
  received_at: string;
}

export interface StoreSnapshot {
  codes: CredentialRecord[];
  logs: LegacyLogRecord[];
  events: EventRecord[];
}

export type StoredRecord =
  | { kind: "legacy_log"; record: LegacyLogRecord }
  | { kind: "event"; record: EventRecord };

export interface StoredEvent extends UsageEvent {
  received_at: string;
}

export interface LegacyLogView {
  date: string;
  spray: number;
  ventoline: number;
  preventive: boolean;
  received_at: string | null;
}

export function emptySnapshot(): StoreSnapshot {
  return { codes: [], logs: [], events: [] };
}
