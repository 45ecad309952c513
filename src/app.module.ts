import { DynamicModule, Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { ScheduleModule } from "@nestjs/schedule";
import { AppConfigModule } from "./config/app-config.module";
import { getStorageBackend } from "./config/app.config";
import { getDatabaseConfig } from "./config/database.config";
import { ReadingsModule } from "./readings/readings.module";
import { AppController } from "./app.controller";
import { AppService } from "./app.service";

@Module({})
export class AppModule {
  /**
   * Builds the root module. Configuration errors (unknown backend, missing
   * DB_* variables) surface here, before anything connects.
   */
  static register(): DynamicModule {
    // Global config module (loads .env into process.env first)
    const configModule = ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      cache: true,
    });

    // forRoot loads .env into process.env synchronously, before its first
    // await; the backend read below relies on that ordering
    const backend = getStorageBackend();
    if (backend === "database") {
      getDatabaseConfig();
    }

    return {
      module: AppModule,
      imports: [
        configModule,
        AppConfigModule,

        // Cron jobs (no-ops unless INGESTION_SCHEDULE_ENABLED=true)
        ScheduleModule.forRoot(),

        ReadingsModule.forRoot({ backend }),
      ],
      controllers: [AppController],
      providers: [AppService],
    };
  }
}
