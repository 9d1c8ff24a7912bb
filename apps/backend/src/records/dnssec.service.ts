import { Inject, Injectable, Logger } from "@nestjs/common";
import { APP_CONFIG_TOKEN, type AppConfig } from "../config/app-config";
import { RECORD_STORE_TOKEN, type RecordStore } from "./record-store";
import type { ZoneId } from "./records.types";

@Injectable()
export class DnssecService {
  private readonly logger = new Logger(DnssecService.name);

  constructor(
    @Inject(APP_CONFIG_TOKEN) private readonly config: AppConfig,
    @Inject(RECORD_STORE_TOKEN) private readonly store: RecordStore,
  ) {}

  /**
   * Rectifies the zone when DNSSEC support is enabled. A failed rectify is
   * logged and reported as `false`; the record write it follows stands.
   */
  async rectifyIfEnabled(zoneId: ZoneId): Promise<boolean> {
    if (!this.config.dnssec.enabled) {
      return false;
    }

    try {
      await this.store.rectifyZone(zoneId);
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to rectify zone "${zoneId}": ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }
}
