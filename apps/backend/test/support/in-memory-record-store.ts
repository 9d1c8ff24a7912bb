import { findBestMatchingZone, namesEqual } from "../../src/dns/name-rules.util";
import { decodeRecordId, encodeRecordId } from "../../src/records/record-id.util";
import type { RecordStore } from "../../src/records/record-store";
import type {
  CommentKey,
  DnsRecord,
  NewRecord,
  Zone,
  ZoneId,
} from "../../src/records/records.types";

export interface StoredComment extends CommentKey {
  content: string;
  account: string;
}

/** Process-local stand-in for the PowerDNS API. */
export class InMemoryRecordStore implements RecordStore {
  readonly records: DnsRecord[] = [];
  readonly comments: StoredComment[] = [];
  readonly rectified: ZoneId[] = [];
  failWrites = false;

  constructor(readonly zones: Zone[] = []) {}

  async listZones(): Promise<Zone[]> {
    return [...this.zones];
  }

  async getZone(zoneId: ZoneId): Promise<Zone | undefined> {
    return this.zones.find((zone) => zone.id === zoneId);
  }

  async findBestMatchingZoneId(name: string): Promise<ZoneId | undefined> {
    return findBestMatchingZone(name, this.zones)?.id;
  }

  async findZoneIdByName(name: string): Promise<ZoneId | undefined> {
    return this.zones.find((zone) => namesEqual(zone.name, name))?.id;
  }

  async getRecord(recordId: string): Promise<DnsRecord | undefined> {
    const key = decodeRecordId(recordId);
    if (!key) {
      return undefined;
    }
    return this.records.find(
      (record) =>
        record.zoneId === key.zoneId &&
        record.type === key.type &&
        record.content === key.content &&
        namesEqual(record.name, key.name),
    );
  }

  async addRecord(zoneId: ZoneId, record: NewRecord): Promise<DnsRecord> {
    if (this.failWrites) {
      throw new Error("store rejected the write");
    }
    const key = {
      zoneId,
      name: record.name,
      type: record.type,
      content: record.content,
    };
    const stored: DnsRecord = {
      ...key,
      id: encodeRecordId(key),
      ttl: record.ttl,
      prio: record.prio,
      disabled: record.disabled ?? false,
    };
    this.records.push(stored);
    return stored;
  }

  async replaceRecord(
    existing: DnsRecord,
    record: NewRecord,
  ): Promise<DnsRecord> {
    if (this.failWrites) {
      throw new Error("store rejected the write");
    }
    const index = this.records.findIndex((item) => item.id === existing.id);
    if (index >= 0) {
      this.records.splice(index, 1);
    }
    return this.addRecord(existing.zoneId, record);
  }

  async setComment(
    key: CommentKey,
    content: string,
    account: string,
  ): Promise<void> {
    await this.clearComment(key);
    this.comments.push({ ...key, content, account });
  }

  async moveComment(
    from: CommentKey,
    to: CommentKey,
    content: string,
    account: string,
  ): Promise<void> {
    await this.clearComment(from);
    await this.setComment(to, content, account);
  }

  async clearComment(key: CommentKey): Promise<void> {
    const index = this.comments.findIndex(
      (comment) =>
        comment.zoneId === key.zoneId &&
        comment.type === key.type &&
        namesEqual(comment.name, key.name),
    );
    if (index >= 0) {
      this.comments.splice(index, 1);
    }
  }

  async rectifyZone(zoneId: ZoneId): Promise<void> {
    this.rectified.push(zoneId);
  }
}
