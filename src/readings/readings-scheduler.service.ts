import { Inject, Injectable, Logger } from "@nestjs/common";
import { Cron, CronExpression } from "@nestjs/schedule";
import { APP_CONFIG, AppConfig } from "../config/app.config";
import { IngestionService } from "./ingestion.service";
import { IngestionResult, ReadingKind } from "./readings.types";

/**
 * Scheduled ingestion, off unless INGESTION_SCHEDULE_ENABLED=true.
 * External schedulers can call the store endpoints instead.
 */
@Injectable()
export class ReadingsSchedulerService {
  private readonly logger = new Logger(ReadingsSchedulerService.name);

  constructor(
    private readonly ingestionService: IngestionService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  @Cron(CronExpression.EVERY_5_MINUTES)
  async ingestOccupancy(): Promise<IngestionResult | null> {
    return this.run("occupancy");
  }

  /**
   * Forecasts only change once per day
   */
  @Cron("0 4 * * *") // 04:00
  async ingestAttendance(): Promise<IngestionResult | null> {
    return this.run("attendance");
  }

  private async run(kind: ReadingKind): Promise<IngestionResult | null> {
    if (!this.config.scheduleEnabled) {
      return null;
    }

    const result = await this.ingestionService.runIngestionCycle(kind);
    if (!result.ok) {
      this.logger.warn(
        `Scheduled ${kind} ingestion reported: ${result.errors
          .map((error) => error.message)
          .join("; ")}`,
      );
    }
    return result;
  }
}
