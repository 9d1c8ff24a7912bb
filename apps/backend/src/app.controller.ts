import { Controller, Get, Query } from "@nestjs/common";
import { AppService } from "./app.service";
import type { HealthCheckBasic, HealthCheckDetailed } from "./app.service";

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get("health")
  getHealth(
    @Query("detailed") detailed?: string,
  ): HealthCheckBasic | Promise<HealthCheckDetailed> {
    // Basic health check (fast, for Docker health checks)
    if (detailed !== "true") {
      return this.appService.getBasicHealth();
    }
    return this.appService.getDetailedHealth();
  }
}
