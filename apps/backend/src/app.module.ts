import { Module } from "@nestjs/common";
import { AppController } from "./app.controller";
import { AppService } from "./app.service";
import { PowerDnsModule } from "./powerdns/powerdns.module";
import { RecordsModule } from "./records/records.module";

@Module({
  imports: [PowerDnsModule, RecordsModule],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
