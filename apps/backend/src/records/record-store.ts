import type {
  CommentKey,
  DnsRecord,
  NewRecord,
  Zone,
  ZoneId,
} from "./records.types";

export const RECORD_STORE_TOKEN = "RECORD_STORE";

/**
 * Persistence boundary of the record engine. Every call is a single
 * request/response; implementations throw on failure.
 */
export interface RecordStore {
  listZones(): Promise<Zone[]>;
  getZone(zoneId: ZoneId): Promise<Zone | undefined>;
  /** Zone with the longest name that `name` equals or lies below. */
  findBestMatchingZoneId(name: string): Promise<ZoneId | undefined>;
  /** Zone whose name equals `name`, ignoring case and trailing dot. */
  findZoneIdByName(name: string): Promise<ZoneId | undefined>;
  getRecord(recordId: string): Promise<DnsRecord | undefined>;
  addRecord(zoneId: ZoneId, record: NewRecord): Promise<DnsRecord>;
  replaceRecord(existing: DnsRecord, record: NewRecord): Promise<DnsRecord>;
  setComment(key: CommentKey, content: string, account: string): Promise<void>;
  moveComment(
    from: CommentKey,
    to: CommentKey,
    content: string,
    account: string,
  ): Promise<void>;
  clearComment(key: CommentKey): Promise<void>;
  rectifyZone(zoneId: ZoneId): Promise<void>;
}
