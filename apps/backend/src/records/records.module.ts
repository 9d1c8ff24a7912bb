import { Module } from "@nestjs/common";
import { RecordValidatorRegistry } from "../dns/validation/record-validator.registry";
import { PowerDnsModule } from "../powerdns/powerdns.module";
import { AuditLogService } from "./audit-log.service";
import { DnssecService } from "./dnssec.service";
import { RecordCommentSyncService } from "./record-comment-sync.service";
import { RecordManagerService } from "./record-manager.service";
import { RecordsController } from "./records.controller";

@Module({
  imports: [PowerDnsModule],
  controllers: [RecordsController],
  providers: [
    RecordValidatorRegistry,
    AuditLogService,
    DnssecService,
    RecordCommentSyncService,
    RecordManagerService,
  ],
  exports: [RecordManagerService],
})
export class RecordsModule {}
