import { DynamicModule, Module, Provider } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { StorageBackend } from "../config/app.config";
import { typeOrmConfig } from "../config/typeorm.config";
import { OccupancyModule } from "../external-apis/occupancy/occupancy.module";
import { BranchData } from "./entities/branch-data.entity";
import { ExpectedAttendance } from "./entities/expected-attendance.entity";
import { IngestionService } from "./ingestion.service";
import { ReadingsController } from "./readings.controller";
import { ReadingsSchedulerService } from "./readings-scheduler.service";
import { ReadingsService } from "./readings.service";
import { InMemoryReadingStore } from "./storage/in-memory-reading.store";
import { READING_STORE } from "./storage/reading-store.interface";
import { TypeOrmReadingStore } from "./storage/typeorm-reading.store";

export interface ReadingsModuleOptions {
  backend: StorageBackend;
}

/**
 * Readings Module
 *
 * Ingestion pipeline and query endpoints for branch occupancy and
 * expected attendance. The storage backend is fixed at startup:
 * - memory: process-local store, no database connection
 * - database: TypeORM (PostgreSQL) with the branch_data and
 *   expected_attendance tables
 */
@Module({})
export class ReadingsModule {
  static forRoot(options: ReadingsModuleOptions): DynamicModule {
    const storeProvider: Provider =
      options.backend === "database"
        ? { provide: READING_STORE, useClass: TypeOrmReadingStore }
        : { provide: READING_STORE, useClass: InMemoryReadingStore };

    return {
      module: ReadingsModule,
      imports: [
        OccupancyModule,
        ...(options.backend === "database"
          ? [
              TypeOrmModule.forRootAsync(typeOrmConfig),
              TypeOrmModule.forFeature([BranchData, ExpectedAttendance]),
            ]
          : []),
      ],
      controllers: [ReadingsController],
      providers: [
        storeProvider,
        ReadingsService,
        IngestionService,
        ReadingsSchedulerService,
      ],
      exports: [ReadingsService, IngestionService],
    };
  }
}
