import { Module } from "@nestjs/common";
import { APP_CONFIG_TOKEN, loadAppConfig } from "../config/app-config";
import { RECORD_STORE_TOKEN } from "../records/record-store";
import { PowerDnsRecordStore } from "./powerdns-record-store";

@Module({
  providers: [
    {
      provide: APP_CONFIG_TOKEN,
      useFactory: () => loadAppConfig(process.env),
    },
    { provide: RECORD_STORE_TOKEN, useClass: PowerDnsRecordStore },
  ],
  exports: [APP_CONFIG_TOKEN, RECORD_STORE_TOKEN],
})
export class PowerDnsModule {}
