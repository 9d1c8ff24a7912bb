import { Injectable, Logger } from "@nestjs/common";
import type { RecordActor } from "./records.types";

export interface AuditedRecord {
  name: string;
  type: string;
  content: string;
  ttl: number;
  prio: number;
}

/** One line per record mutation, written to the `Audit` logger context. */
@Injectable()
export class AuditLogService {
  private readonly logger = new Logger("Audit");

  logRecordCreation(actor: RecordActor, record: AuditedRecord): string {
    const line =
      `client_ip:${actor.clientAddress} user:${actor.author} operation:add_record ` +
      `record_type:${record.type} record:${record.name} content:${record.content} ` +
      `ttl:${record.ttl} priority:${record.prio}`;
    this.logger.log(line);
    return line;
  }

  logRecordEdit(
    actor: RecordActor,
    before: AuditedRecord,
    after: AuditedRecord,
  ): string {
    const line =
      `client_ip:${actor.clientAddress} user:${actor.author} operation:edit_record ` +
      `old_record_type:${before.type} old_record:${before.name} old_content:${before.content} ` +
      `old_ttl:${before.ttl} old_priority:${before.prio} ` +
      `record_type:${after.type} record:${after.name} content:${after.content} ` +
      `ttl:${after.ttl} priority:${after.prio}`;
    this.logger.log(line);
    return line;
  }
}
