import { TypeOrmModuleAsyncOptions } from "@nestjs/typeorm";
import { getDatabaseConfig } from "./database.config";
import { BranchData } from "../readings/entities/branch-data.entity";
import { ExpectedAttendance } from "../readings/entities/expected-attendance.entity";

export const typeOrmConfig: TypeOrmModuleAsyncOptions = {
  useFactory: () => {
    const dbConfig = getDatabaseConfig();

    return {
      type: "postgres" as const,
      host: dbConfig.host,
      port: dbConfig.port,
      username: dbConfig.username,
      password: dbConfig.password,
      database: dbConfig.database,
      entities: [BranchData, ExpectedAttendance],
      synchronize: dbConfig.synchronize, // Auto-sync schema (dev only!)
      logging: dbConfig.logging,
      extra: {
        max: 10, // Connection pool size
        connectionTimeoutMillis: 5000,
      },
    };
  },
};
