import {
  HttpException,
  Inject,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from "@nestjs/common";
import axios, { AxiosError, AxiosRequestConfig, AxiosResponse } from "axios";
import { APP_CONFIG_TOKEN, type AppConfig } from "../config/app-config";
import { findBestMatchingZone, namesEqual } from "../dns/name-rules.util";
import { decodeRecordId, encodeRecordId } from "../records/record-id.util";
import type { RecordStore } from "../records/record-store";
import type {
  CommentKey,
  DnsRecord,
  NewRecord,
  Zone,
  ZoneId,
} from "../records/records.types";
import {
  fromCanonicalName,
  fromWireContent,
  toCanonicalName,
  toWireContent,
  toZoneKind,
} from "./powerdns-wire.util";
import type {
  PowerDnsRRSet,
  PowerDnsRRSetChange,
  PowerDnsRecordEntry,
  PowerDnsZoneDetail,
  PowerDnsZoneSummary,
} from "./powerdns.types";

@Injectable()
export class PowerDnsRecordStore implements RecordStore {
  private readonly logger = new Logger(PowerDnsRecordStore.name);

  constructor(@Inject(APP_CONFIG_TOKEN) private readonly config: AppConfig) {}

  async listZones(): Promise<Zone[]> {
    const zones = await this.request<PowerDnsZoneSummary[]>({
      method: "GET",
      url: "/zones",
    });
    return zones.map((zone) => this.toZone(zone));
  }

  async getZone(zoneId: ZoneId): Promise<Zone | undefined> {
    try {
      const zone = await this.request<PowerDnsZoneSummary>({
        method: "GET",
        url: this.zonePath(zoneId),
        params: { rrsets: false },
      });
      return this.toZone(zone);
    } catch (error) {
      if (this.isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async findBestMatchingZoneId(name: string): Promise<ZoneId | undefined> {
    return findBestMatchingZone(name, await this.listZones())?.id;
  }

  async findZoneIdByName(name: string): Promise<ZoneId | undefined> {
    const zones = await this.listZones();
    return zones.find((zone) => namesEqual(zone.name, name))?.id;
  }

  async getRecord(recordId: string): Promise<DnsRecord | undefined> {
    const key = decodeRecordId(recordId);
    if (!key) {
      return undefined;
    }

    let rrset: PowerDnsRRSet | undefined;
    try {
      rrset = await this.fetchRRSet(key.zoneId, key.name, key.type);
    } catch (error) {
      if (this.isNotFound(error)) {
        return undefined;
      }
      throw error;
    }

    if (!rrset) {
      return undefined;
    }
    const { ttl } = rrset;
    return rrset.records
      .map((entry) => this.toRecord(key.zoneId, ttl, key, entry))
      .find((record) => record.content === key.content);
  }

  async addRecord(zoneId: ZoneId, record: NewRecord): Promise<DnsRecord> {
    const existing = await this.fetchRRSet(zoneId, record.name, record.type);
    const entry = this.toEntry(record);
    const entries = (existing?.records ?? []).filter(
      (current) => current.content !== entry.content,
    );

    await this.patchZone(zoneId, [
      this.replaceChange(record.name, record.type, record.ttl, [
        ...entries,
        entry,
      ]),
    ]);

    return this.created(zoneId, record);
  }

  async replaceRecord(
    existing: DnsRecord,
    record: NewRecord,
  ): Promise<DnsRecord> {
    const { zoneId } = existing;
    const oldWire = toWireContent(existing.type, existing.content, existing.prio);
    const entry = this.toEntry(record);
    const sameRRSet =
      namesEqual(existing.name, record.name) && existing.type === record.type;

    const oldRRSet = await this.fetchRRSet(zoneId, existing.name, existing.type);
    const remaining = (oldRRSet?.records ?? []).filter(
      (current) => current.content !== oldWire,
    );

    if (sameRRSet) {
      const entries = remaining.filter(
        (current) => current.content !== entry.content,
      );
      await this.patchZone(zoneId, [
        this.replaceChange(record.name, record.type, record.ttl, [
          ...entries,
          entry,
        ]),
      ]);
      return this.created(zoneId, record);
    }

    const target = await this.fetchRRSet(zoneId, record.name, record.type);
    const targetEntries = (target?.records ?? []).filter(
      (current) => current.content !== entry.content,
    );

    const changes: PowerDnsRRSetChange[] = [
      remaining.length > 0
        ? this.replaceChange(
            existing.name,
            existing.type,
            oldRRSet?.ttl ?? existing.ttl,
            remaining,
          )
        : {
            name: toCanonicalName(existing.name),
            type: existing.type,
            changetype: "DELETE",
          },
      this.replaceChange(record.name, record.type, record.ttl, [
        ...targetEntries,
        entry,
      ]),
    ];
    await this.patchZone(zoneId, changes);

    return this.created(zoneId, record);
  }

  async setComment(
    key: CommentKey,
    content: string,
    account: string,
  ): Promise<void> {
    await this.patchZone(key.zoneId, [
      this.commentChange(key, [{ content, account }]),
    ]);
  }

  async moveComment(
    from: CommentKey,
    to: CommentKey,
    content: string,
    account: string,
  ): Promise<void> {
    const comment = [{ content, account }];
    const sameSlot =
      from.zoneId === to.zoneId &&
      from.type === to.type &&
      namesEqual(from.name, to.name);

    if (sameSlot) {
      await this.patchZone(to.zoneId, [this.commentChange(to, comment)]);
      return;
    }

    if (from.zoneId === to.zoneId) {
      await this.patchZone(to.zoneId, [
        this.commentChange(from, []),
        this.commentChange(to, comment),
      ]);
      return;
    }

    await this.patchZone(from.zoneId, [this.commentChange(from, [])]);
    await this.patchZone(to.zoneId, [this.commentChange(to, comment)]);
  }

  async clearComment(key: CommentKey): Promise<void> {
    await this.patchZone(key.zoneId, [this.commentChange(key, [])]);
  }

  async rectifyZone(zoneId: ZoneId): Promise<void> {
    await this.request<unknown>({
      method: "PUT",
      url: `${this.zonePath(zoneId)}/rectify`,
    });
  }

  private async fetchRRSet(
    zoneId: ZoneId,
    name: string,
    type: string,
  ): Promise<PowerDnsRRSet | undefined> {
    const canonical = toCanonicalName(name);
    const zone = await this.request<PowerDnsZoneDetail>({
      method: "GET",
      url: this.zonePath(zoneId),
      params: { rrset_name: canonical, rrset_type: type },
    });

    return (zone.rrsets ?? []).find(
      (rrset) => rrset.type === type && namesEqual(rrset.name, canonical),
    );
  }

  private async patchZone(
    zoneId: ZoneId,
    rrsets: PowerDnsRRSetChange[],
  ): Promise<void> {
    await this.request<unknown>({
      method: "PATCH",
      url: this.zonePath(zoneId),
      data: { rrsets },
    });
  }

  private replaceChange(
    name: string,
    type: string,
    ttl: number,
    records: PowerDnsRecordEntry[],
  ): PowerDnsRRSetChange {
    return {
      name: toCanonicalName(name),
      type,
      changetype: "REPLACE",
      ttl,
      records,
    };
  }

  private commentChange(
    key: CommentKey,
    comments: { content: string; account: string }[],
  ): PowerDnsRRSetChange {
    return {
      name: toCanonicalName(key.name),
      type: key.type,
      changetype: "REPLACE",
      comments,
    };
  }

  private toEntry(record: NewRecord): PowerDnsRecordEntry {
    return {
      content: toWireContent(record.type, record.content, record.prio),
      disabled: record.disabled ?? false,
    };
  }

  private toZone(zone: PowerDnsZoneSummary): Zone {
    return {
      id: zone.id,
      name: fromCanonicalName(zone.name),
      kind: toZoneKind(zone.kind),
    };
  }

  private toRecord(
    zoneId: ZoneId,
    ttl: number,
    owner: { name: string; type: string },
    entry: PowerDnsRecordEntry,
  ): DnsRecord {
    const { content, prio } = fromWireContent(owner.type, entry.content);
    const key = {
      zoneId,
      name: fromCanonicalName(owner.name),
      type: owner.type,
      content,
    };
    return {
      ...key,
      id: encodeRecordId(key),
      ttl,
      prio,
      disabled: entry.disabled,
    };
  }

  private created(zoneId: ZoneId, record: NewRecord): DnsRecord {
    return this.toRecord(zoneId, record.ttl, record, this.toEntry(record));
  }

  private zonePath(zoneId: ZoneId): string {
    return `/zones/${encodeURIComponent(zoneId)}`;
  }

  private async request<T>(config: AxiosRequestConfig): Promise<T> {
    const { baseUrl, apiKey, serverId, timeoutMs } = this.config.powerdns;
    try {
      const response: AxiosResponse<T> = await axios.request<T>({
        baseURL: `${baseUrl}/api/v1/servers/${encodeURIComponent(serverId)}`,
        timeout: timeoutMs,
        ...config,
        headers: {
          Accept: "application/json",
          ...(apiKey ? { "X-API-Key": apiKey } : {}),
        },
      });
      return response.data;
    } catch (error) {
      throw this.normalizeAxiosError(error);
    }
  }

  private isNotFound(error: unknown): boolean {
    return error instanceof HttpException && error.getStatus() === 404;
  }

  private normalizeAxiosError(error: unknown): HttpException {
    if (this.isAxiosError(error)) {
      if (error.response) {
        const { status, data, statusText } = error.response;
        const message = this.readErrorMessage(data) ?? statusText;

        return new HttpException(
          {
            message: message || "PowerDNS API request failed",
            details: data,
          },
          status || 500,
        );
      }

      this.logger.error(
        `Network error while contacting the PowerDNS API at "${this.config.powerdns.baseUrl}": ${error.message}`,
      );
      return new ServiceUnavailableException(
        "Unable to reach the PowerDNS API. Check connectivity and the API key.",
      );
    }

    this.logger.error(
      "Unexpected error while contacting the PowerDNS API",
      error instanceof Error ? error.stack : String(error),
    );
    return new ServiceUnavailableException(
      "Unexpected error while contacting the PowerDNS API.",
    );
  }

  private readErrorMessage(data: unknown): string | undefined {
    if (typeof data === "string") {
      return data || undefined;
    }
    if (data && typeof data === "object" && "error" in data) {
      return typeof data.error === "string" ? data.error : undefined;
    }
    return undefined;
  }

  private isAxiosError(error: unknown): error is AxiosError {
    return !!error && typeof error === "object" && "isAxiosError" in error;
  }
}
