import type { FieldInput } from "../dns/validation/record-validation.types";

export type ZoneId = string;

/** Secondary zones are transferred from elsewhere and never edited here. */
export type ZoneKind = "PRIMARY" | "SECONDARY" | "NATIVE";

export interface Zone {
  id: ZoneId;
  name: string;
  kind: ZoneKind;
}

export interface RecordKey {
  zoneId: ZoneId;
  name: string;
  type: string;
  content: string;
}

export interface DnsRecord extends RecordKey {
  id: string;
  ttl: number;
  prio: number;
  disabled: boolean;
}

export interface NewRecord {
  name: string;
  type: string;
  content: string;
  ttl: number;
  prio: number;
  disabled?: boolean;
}

/** A comment belongs to the rrset (zone, name, type), not a single record. */
export interface CommentKey {
  zoneId: ZoneId;
  name: string;
  type: string;
}

export interface RecordActor {
  author: string;
  clientAddress: string;
}

export interface RecordInput {
  /** Relative (`www`, `@`) or fully qualified owner name. */
  name: string;
  type: string;
  content: string;
  ttl?: FieldInput;
  prio?: FieldInput;
  comment?: string;
}

export type AddRecordOutcome =
  | { status: "created" }
  | { status: "invalid"; errors: string[] }
  | { status: "read-only"; zoneName: string }
  | { status: "not-found" }
  | { status: "failed" };

export type EditRecordOutcome =
  | { status: "updated"; record: DnsRecord }
  | { status: "invalid"; errors: string[] }
  | { status: "read-only"; zoneName: string }
  | { status: "not-found" }
  | { status: "failed" };
