import { Inject, Injectable, Logger } from "@nestjs/common";
import { APP_CONFIG_TOKEN, type AppConfig } from "../config/app-config";
import {
  UnsupportedDomainNameError,
  addressToPtrName,
  getRegisteredDomain,
  namesEqual,
  stripTrailingDot,
} from "../dns/name-rules.util";
import { RECORD_STORE_TOKEN, type RecordStore } from "./record-store";
import type { CommentKey, ZoneId } from "./records.types";

export interface CommentedRecord {
  zoneId: ZoneId;
  name: string;
  type: string;
  content: string;
  comment: string;
  author: string;
}

export interface RecordSnapshot {
  name: string;
  type: string;
  content: string;
}

export interface CommentUpdate {
  zoneId: ZoneId;
  previous: RecordSnapshot;
  current: RecordSnapshot;
  comment: string;
  author: string;
}

function sameSlot(a: CommentKey, b: CommentKey): boolean {
  return a.zoneId === b.zoneId && a.type === b.type && namesEqual(a.name, b.name);
}

function isAddressType(type: string): type is "A" | "AAAA" {
  return type === "A" || type === "AAAA";
}

/**
 * Keeps the comment of a forward record and its PTR in step. Lookup misses
 * fall back to commenting only the edited record. The two writes are not
 * atomic: if the second one fails the first stays and the error propagates.
 */
@Injectable()
export class RecordCommentSyncService {
  private readonly logger = new Logger(RecordCommentSyncService.name);

  constructor(
    @Inject(RECORD_STORE_TOKEN) private readonly store: RecordStore,
    @Inject(APP_CONFIG_TOKEN) private readonly config: AppConfig,
  ) {}

  get enabled(): boolean {
    return this.config.misc.recordCommentsSync;
  }

  /** Writes the comment(s) for a new record and returns the slots written. */
  async createComments(record: CommentedRecord): Promise<CommentKey[]> {
    const own: CommentKey = {
      zoneId: record.zoneId,
      name: record.name,
      type: record.type,
    };

    const paired = this.enabled ? await this.findPairedSlot(record) : undefined;
    const written = paired ? [own, paired] : [own];

    for (const key of written) {
      await this.store.setComment(key, record.comment, record.author);
    }
    return written;
  }

  /**
   * Moves the comments of an edited record (and its pair) to the new names.
   * A blank comment clears them instead.
   */
  async updateComments(update: CommentUpdate): Promise<void> {
    const { zoneId, previous, current, comment, author } = update;

    await this.relocate(
      { zoneId, name: previous.name, type: previous.type },
      { zoneId, name: current.name, type: current.type },
      comment,
      author,
    );

    if (!this.enabled) {
      return;
    }

    if (isAddressType(current.type)) {
      await this.movePtrComment(previous, current, comment, author);
    } else if (current.type === "PTR") {
      await this.moveForwardComment(previous, current, comment, author);
    }
  }

  private async findPairedSlot(
    record: CommentedRecord,
  ): Promise<CommentKey | undefined> {
    if (isAddressType(record.type)) {
      const ptrName = addressToPtrName(record.type, record.content);
      const ptrZoneId = ptrName
        ? await this.findReverseZoneId(ptrName)
        : undefined;
      return ptrName && ptrZoneId
        ? { zoneId: ptrZoneId, name: ptrName, type: "PTR" }
        : undefined;
    }

    if (record.type === "PTR") {
      const target = stripTrailingDot(record.content);
      const domainId = await this.findForwardZoneId(target);
      return domainId
        ? { zoneId: domainId, name: target, type: "A" }
        : undefined;
    }

    return undefined;
  }

  private async movePtrComment(
    previous: RecordSnapshot,
    current: RecordSnapshot,
    comment: string,
    author: string,
  ): Promise<void> {
    const newPtrName = isAddressType(current.type)
      ? addressToPtrName(current.type, current.content)
      : null;
    if (!newPtrName) {
      return;
    }
    const oldPtrName =
      (isAddressType(previous.type)
        ? addressToPtrName(previous.type, previous.content)
        : null) ?? newPtrName;

    const newZoneId = await this.findReverseZoneId(newPtrName);
    if (!newZoneId) {
      return;
    }
    const oldZoneId =
      oldPtrName === newPtrName
        ? newZoneId
        : await this.findReverseZoneId(oldPtrName);

    const to: CommentKey = { zoneId: newZoneId, name: newPtrName, type: "PTR" };
    const from: CommentKey = oldZoneId
      ? { zoneId: oldZoneId, name: oldPtrName, type: "PTR" }
      : to;
    await this.relocate(from, to, comment, author);
  }

  private async moveForwardComment(
    previous: RecordSnapshot,
    current: RecordSnapshot,
    comment: string,
    author: string,
  ): Promise<void> {
    const newTarget = stripTrailingDot(current.content);
    const oldTarget =
      previous.type === "PTR" ? stripTrailingDot(previous.content) : newTarget;

    const newZoneId = await this.findForwardZoneId(newTarget);
    if (!newZoneId) {
      return;
    }
    const oldZoneId =
      oldTarget === newTarget
        ? newZoneId
        : await this.findForwardZoneId(oldTarget);

    const to: CommentKey = { zoneId: newZoneId, name: newTarget, type: "A" };
    const from: CommentKey = oldZoneId
      ? { zoneId: oldZoneId, name: oldTarget, type: "A" }
      : to;
    await this.relocate(from, to, comment, author);
  }

  private async relocate(
    from: CommentKey,
    to: CommentKey,
    comment: string,
    author: string,
  ): Promise<void> {
    if (comment.trim() !== "") {
      await this.store.moveComment(from, to, comment, author);
      return;
    }

    await this.store.clearComment(from);
    if (!sameSlot(from, to)) {
      await this.store.clearComment(to);
    }
  }

  private async findReverseZoneId(ptrName: string): Promise<ZoneId | undefined> {
    const zoneId = await this.store.findBestMatchingZoneId(ptrName);
    if (!zoneId) {
      this.logger.debug(`No reverse zone holds ${ptrName}; commenting one side only.`);
    }
    return zoneId;
  }

  private async findForwardZoneId(target: string): Promise<ZoneId | undefined> {
    let domain: string;
    try {
      domain = getRegisteredDomain(target);
    } catch (error) {
      if (error instanceof UnsupportedDomainNameError) {
        this.logger.debug(`PTR target "${target}" has no registered domain.`);
        return undefined;
      }
      throw error;
    }

    const zoneId = await this.store.findZoneIdByName(domain);
    if (!zoneId) {
      this.logger.debug(`No zone named ${domain}; commenting one side only.`);
    }
    return zoneId;
  }
}
