import { Injectable, Logger } from "@nestjs/common";
import {
  Branch,
  BranchName,
  createBranchRecord,
} from "../../branches/branch-registry";
import type {
  ExpectedAttendanceSlot,
  OccupancyReading,
  ReadingKind,
  ReadingsByBranch,
} from "../readings.types";
import { ReadingStore } from "./reading-store.interface";

function copyReading(reading: OccupancyReading): OccupancyReading {
  return { ...reading, lastUpdated: new Date(reading.lastUpdated.getTime()) };
}

/**
 * In-Memory Reading Store
 *
 * Process-local state for deployments without a database. Every operation
 * runs through one lock guarding both maps, and reads hand out copies so
 * callers never observe a half-applied replace.
 *
 * NOTE: occupancy readings accumulate without eviction for the lifetime
 * of the process.
 */
@Injectable()
export class InMemoryReadingStore implements ReadingStore {
  private readonly logger = new Logger(InMemoryReadingStore.name);
  readonly backend = "memory" as const;

  private occupancy: Record<BranchName, OccupancyReading[]> =
    createBranchRecord(() => []);
  private attendance: Record<BranchName, ExpectedAttendanceSlot[]> =
    createBranchRecord(() => []);

  private tail: Promise<void> = Promise.resolve();

  private exclusive<T>(task: () => T): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  record(branch: Branch, reading: OccupancyReading): Promise<void> {
    return this.exclusive(() => {
      this.occupancy[branch.name].push(copyReading(reading));
    });
  }

  replaceAll(branch: Branch, slots: ExpectedAttendanceSlot[]): Promise<void> {
    return this.exclusive(() => {
      this.attendance[branch.name] = slots.map((slot) => ({ ...slot }));
      this.logger.debug(
        `Replaced ${slots.length} attendance slots for ${branch.name}`,
      );
    });
  }

  clearAttendance(): Promise<void> {
    return this.exclusive(() => {
      this.attendance = createBranchRecord(() => []);
    });
  }

  readAll(kind: "occupancy"): Promise<ReadingsByBranch<"occupancy">>;
  readAll(kind: "attendance"): Promise<ReadingsByBranch<"attendance">>;
  readAll(
    kind: ReadingKind,
  ): Promise<ReadingsByBranch<"occupancy"> | ReadingsByBranch<"attendance">>;
  readAll(
    kind: ReadingKind,
  ): Promise<ReadingsByBranch<"occupancy"> | ReadingsByBranch<"attendance">> {
    return this.exclusive(() => {
      if (kind === "occupancy") {
        const occupancy = this.occupancy;
        return createBranchRecord((name) =>
          occupancy[name].map(copyReading),
        );
      }
      const attendance = this.attendance;
      return createBranchRecord((name) =>
        attendance[name].map((slot) => ({ ...slot })),
      );
    });
  }
}
