import { Inject, Injectable, Logger } from "@nestjs/common";
import { APP_CONFIG_TOKEN, type AppConfig } from "../config/app-config";
import { restoreZoneSuffix, stripZoneSuffix } from "../dns/name-rules.util";
import type { ValidationResult } from "../dns/validation/record-validation.types";
import { RecordValidatorRegistry } from "../dns/validation/record-validator.registry";
import { AuditLogService } from "./audit-log.service";
import { DnssecService } from "./dnssec.service";
import { RecordCommentSyncService } from "./record-comment-sync.service";
import { RECORD_STORE_TOKEN, type RecordStore } from "./record-store";
import type {
  AddRecordOutcome,
  DnsRecord,
  EditRecordOutcome,
  NewRecord,
  RecordActor,
  RecordInput,
  Zone,
  ZoneId,
} from "./records.types";

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function hasComment(comment: string | undefined): comment is string {
  return comment !== undefined && comment.trim() !== "";
}

@Injectable()
export class RecordManagerService {
  private readonly logger = new Logger(RecordManagerService.name);

  constructor(
    @Inject(RECORD_STORE_TOKEN) private readonly store: RecordStore,
    @Inject(APP_CONFIG_TOKEN) private readonly config: AppConfig,
    private readonly validators: RecordValidatorRegistry,
    private readonly audit: AuditLogService,
    private readonly dnssec: DnssecService,
    private readonly commentSync: RecordCommentSyncService,
  ) {}

  /**
   * Persists an already validated record, then runs the audit log, the
   * DNSSEC rectify and the comment sync. Returns `false` only when the zone
   * cannot be resolved or the store rejects the write; nothing after the
   * write changes the result.
   */
  async createRecord(
    zoneId: ZoneId,
    name: string,
    type: string,
    content: string,
    ttl: number,
    prio: number,
    comment: string | undefined,
    author: string,
    clientAddress: string,
  ): Promise<boolean> {
    const zone = await this.persistRecord(zoneId, {
      name,
      type,
      content,
      ttl,
      prio,
    });
    if (!zone) {
      return false;
    }

    try {
      this.audit.logRecordCreation(
        { author, clientAddress },
        { name, type, content, ttl, prio },
      );
    } catch (error) {
      this.logger.warn(`Audit log entry for ${name} not written: ${describeError(error)}`);
    }

    await this.dnssec.rectifyIfEnabled(zoneId);

    if (hasComment(comment)) {
      try {
        await this.commentSync.createComments({
          zoneId,
          name,
          type,
          content,
          comment,
          author,
        });
      } catch (error) {
        this.logger.error(
          `Record ${name} was added to ${zone.name} but its comment could not be saved: ${describeError(error)}`,
        );
      }
    }

    return true;
  }

  async addRecord(
    zoneId: ZoneId,
    input: RecordInput,
    actor: RecordActor,
  ): Promise<AddRecordOutcome> {
    let zone: Zone | undefined;
    try {
      zone = await this.store.getZone(zoneId);
    } catch (error) {
      this.logger.error(`Failed to load zone "${zoneId}": ${describeError(error)}`);
      return { status: "failed" };
    }

    if (!zone) {
      return { status: "not-found" };
    }
    if (zone.kind === "SECONDARY") {
      return { status: "read-only", zoneName: zone.name };
    }

    const type = input.type.trim().toUpperCase();
    const result = this.validateInZone(zone, { ...input, type });
    if (!result.valid) {
      return { status: "invalid", errors: result.errors };
    }

    const { name, content, ttl, prio } = result.data;
    const created = await this.createRecord(
      zoneId,
      name,
      type,
      content,
      ttl,
      prio,
      input.comment,
      actor.author,
      actor.clientAddress,
    );
    return created ? { status: "created" } : { status: "failed" };
  }

  async editRecord(
    recordId: string,
    input: RecordInput,
    actor: RecordActor,
  ): Promise<EditRecordOutcome> {
    let existing: DnsRecord | undefined;
    let zone: Zone | undefined;
    try {
      existing = await this.store.getRecord(recordId);
      zone = existing ? await this.store.getZone(existing.zoneId) : undefined;
    } catch (error) {
      this.logger.error(`Failed to load record "${recordId}": ${describeError(error)}`);
      return { status: "failed" };
    }

    if (!existing || !zone) {
      return { status: "not-found" };
    }
    if (zone.kind === "SECONDARY") {
      return { status: "read-only", zoneName: zone.name };
    }

    const type = input.type.trim().toUpperCase();
    const result = this.validateInZone(zone, { ...input, type });
    if (!result.valid) {
      return { status: "invalid", errors: result.errors };
    }

    const { name, content, ttl, prio } = result.data;
    let updated: DnsRecord;
    try {
      updated = await this.store.replaceRecord(existing, {
        name,
        type,
        content,
        ttl,
        prio,
        disabled: existing.disabled,
      });
    } catch (error) {
      this.logger.error(
        `Failed to update ${existing.type} record ${existing.name}: ${describeError(error)}`,
      );
      return { status: "failed" };
    }

    try {
      this.audit.logRecordEdit(actor, existing, { name, type, content, ttl, prio });
    } catch (error) {
      this.logger.warn(`Audit log entry for ${name} not written: ${describeError(error)}`);
    }

    await this.dnssec.rectifyIfEnabled(zone.id);

    try {
      await this.commentSync.updateComments({
        zoneId: zone.id,
        previous: existing,
        current: { name, type, content },
        comment: input.comment ?? "",
        author: actor.author,
      });
    } catch (error) {
      this.logger.error(
        `Record ${name} was updated but its comment could not be saved: ${describeError(error)}`,
      );
    }

    return { status: "updated", record: updated };
  }

  /** Validates without writing; the name comes back fully qualified. */
  async validateRecord(
    zoneId: ZoneId,
    input: RecordInput,
  ): Promise<ValidationResult | undefined> {
    const zone = await this.store.getZone(zoneId);
    return zone ? this.validateInZone(zone, input) : undefined;
  }

  toRelativeName(name: string, zoneName: string): string {
    return stripZoneSuffix(name, zoneName);
  }

  private async persistRecord(
    zoneId: ZoneId,
    record: NewRecord,
  ): Promise<Zone | undefined> {
    try {
      const zone = await this.store.getZone(zoneId);
      if (!zone) {
        this.logger.warn(
          `Cannot add ${record.type} ${record.name}: zone "${zoneId}" not found.`,
        );
        return undefined;
      }
      await this.store.addRecord(zoneId, record);
      return zone;
    } catch (error) {
      this.logger.error(
        `Failed to add ${record.type} record ${record.name} to zone "${zoneId}": ${describeError(error)}`,
      );
      return undefined;
    }
  }

  private validateInZone(zone: Zone, input: RecordInput): ValidationResult {
    return this.validators.validate(
      input.type,
      input.content,
      restoreZoneSuffix(input.name, zone.name),
      input.prio,
      input.ttl,
      this.config.dns.defaultTtl,
    );
  }
}
