import { Inject, Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { Repository } from "typeorm";
import { addHours } from "date-fns";
import {
  Branch,
  createBranchRecord,
  getBranchByStorageId,
} from "../../branches/branch-registry";
import { APP_CONFIG, AppConfig } from "../../config/app.config";
import {
  IngestionError,
  describeError,
} from "../../common/errors/ingestion.error";
import { BranchData } from "../entities/branch-data.entity";
import { ExpectedAttendance } from "../entities/expected-attendance.entity";
import type {
  ExpectedAttendanceSlot,
  OccupancyReading,
  ReadingKind,
  ReadingsByBranch,
} from "../readings.types";
import { ReadingStore } from "./reading-store.interface";

/**
 * TypeORM Reading Store
 *
 * Relational backend. All statements go through the repository API, so
 * values are always bound as parameters.
 */
@Injectable()
export class TypeOrmReadingStore implements ReadingStore {
  private readonly logger = new Logger(TypeOrmReadingStore.name);
  readonly backend = "database" as const;

  constructor(
    @InjectRepository(BranchData)
    private readonly branchDataRepository: Repository<BranchData>,
    @InjectRepository(ExpectedAttendance)
    private readonly attendanceRepository: Repository<ExpectedAttendance>,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async record(branch: Branch, reading: OccupancyReading): Promise<void> {
    try {
      await this.branchDataRepository.insert({
        branchId: branch.storageId,
        lastUpdated: addHours(
          reading.lastUpdated,
          this.config.timestampOffsetHours,
        ),
        name: reading.name,
        status: reading.status,
        currentPercentage: reading.currentPercentage,
      });
    } catch (error) {
      throw this.persistenceError(branch, "insert occupancy reading", error);
    }
  }

  /**
   * Deletes the branch's forecast and inserts the new slots in one
   * transaction, so a concurrent refresh never leaves mixed rows.
   */
  async replaceAll(
    branch: Branch,
    slots: ExpectedAttendanceSlot[],
  ): Promise<void> {
    try {
      await this.attendanceRepository.manager.transaction(async (manager) => {
        const repository = manager.getRepository(ExpectedAttendance);
        await repository.delete({ branchId: branch.storageId });
        if (slots.length > 0) {
          await repository.insert(
            slots.map((slot) => ({
              branchId: branch.storageId,
              hour: slot.hour,
              percentage: slot.percentage,
              remaining: slot.remaining ?? null,
            })),
          );
        }
      });
    } catch (error) {
      throw this.persistenceError(branch, "replace attendance forecast", error);
    }
  }

  async clearAttendance(): Promise<void> {
    try {
      await this.attendanceRepository.createQueryBuilder().delete().execute();
    } catch (error) {
      const message = `Failed to clear expected attendance: ${describeError(error)}`;
      this.logger.error(`❌ ${message}`);
      throw new IngestionError("persistence", message, undefined, {
        cause: error,
      });
    }
  }

  readAll(kind: "occupancy"): Promise<ReadingsByBranch<"occupancy">>;
  readAll(kind: "attendance"): Promise<ReadingsByBranch<"attendance">>;
  readAll(
    kind: ReadingKind,
  ): Promise<ReadingsByBranch<"occupancy"> | ReadingsByBranch<"attendance">>;
  async readAll(
    kind: ReadingKind,
  ): Promise<ReadingsByBranch<"occupancy"> | ReadingsByBranch<"attendance">> {
    try {
      if (kind === "occupancy") {
        return await this.readOccupancy();
      }
      return await this.readAttendance();
    } catch (error) {
      const message = `Failed to read ${kind} rows: ${describeError(error)}`;
      this.logger.error(`❌ ${message}`);
      throw new IngestionError("persistence", message, undefined, {
        cause: error,
      });
    }
  }

  private async readOccupancy(): Promise<ReadingsByBranch<"occupancy">> {
    const rows = await this.branchDataRepository.find({ order: { id: "ASC" } });
    const grouped: ReadingsByBranch<"occupancy"> = createBranchRecord(() => []);

    for (const row of rows) {
      const branch = this.resolveBranch(row.branchId, "branch_data", row.id);
      if (!branch) continue;
      grouped[branch.name].push({
        lastUpdated: row.lastUpdated,
        name: row.name,
        status: row.status,
        currentPercentage: row.currentPercentage,
      });
    }

    return grouped;
  }

  private async readAttendance(): Promise<ReadingsByBranch<"attendance">> {
    const rows = await this.attendanceRepository.find({ order: { id: "ASC" } });
    const grouped: ReadingsByBranch<"attendance"> = createBranchRecord(
      () => [],
    );

    for (const row of rows) {
      const branch = this.resolveBranch(
        row.branchId,
        "expected_attendance",
        row.id,
      );
      if (!branch) continue;
      grouped[branch.name].push({
        hour: row.hour,
        percentage: row.percentage,
        ...(row.remaining !== null && { remaining: row.remaining }),
      });
    }

    return grouped;
  }

  private resolveBranch(
    storageId: number,
    table: string,
    rowId: number,
  ): Branch | undefined {
    const branch = getBranchByStorageId(storageId);
    if (!branch) {
      this.logger.warn(
        `Skipping ${table} row ${rowId}: unknown branch_id ${storageId}`,
      );
    }
    return branch;
  }

  private persistenceError(
    branch: Branch,
    action: string,
    error: unknown,
  ): IngestionError {
    const message = `Failed to ${action} for ${branch.name}: ${describeError(error)}`;
    this.logger.error(`❌ ${message}`);
    return new IngestionError("persistence", message, branch.name, {
      cause: error,
    });
  }
}
