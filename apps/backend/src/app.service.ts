import { Inject, Injectable } from "@nestjs/common";
import { RECORD_STORE_TOKEN, type RecordStore } from "./records/record-store";

export interface HealthCheckBasic {
  status: "ok";
  timestamp: string;
  uptime: number;
}

export interface PowerDnsHealthStatus {
  status: "healthy" | "unhealthy";
  responseTime: number;
  zones?: number;
  error?: string;
}

export interface HealthCheckDetailed extends HealthCheckBasic {
  environment: string;
  powerdns: PowerDnsHealthStatus;
}

@Injectable()
export class AppService {
  private readonly startTime = Date.now();

  constructor(
    @Inject(RECORD_STORE_TOKEN) private readonly store: RecordStore,
  ) {}

  getBasicHealth(): HealthCheckBasic {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
    };
  }

  async getDetailedHealth(): Promise<HealthCheckDetailed> {
    const startTime = Date.now();
    let powerdns: PowerDnsHealthStatus;
    try {
      const zones = await this.store.listZones();
      powerdns = {
        status: "healthy",
        responseTime: Date.now() - startTime,
        zones: zones.length,
      };
    } catch (error) {
      powerdns = {
        status: "unhealthy",
        responseTime: Date.now() - startTime,
        error: error instanceof Error ? error.message : "Unknown error",
      };
    }

    return {
      ...this.getBasicHealth(),
      environment: process.env.NODE_ENV || "development",
      powerdns,
    };
  }
}
