import type { Branch } from "../../branches/branch-registry";
import type { StorageBackend } from "../../config/app.config";
import type {
  ExpectedAttendanceSlot,
  OccupancyReading,
  ReadingKind,
  ReadingsByBranch,
} from "../readings.types";

export const READING_STORE = "READING_STORE";

/**
 * Storage backend for branch readings.
 *
 * Occupancy is append-only; attendance forecasts are replaced as a whole
 * per branch. Implementations raise IngestionError("persistence") on
 * failure.
 */
export interface ReadingStore {
  readonly backend: StorageBackend;

  record(branch: Branch, reading: OccupancyReading): Promise<void>;

  replaceAll(branch: Branch, slots: ExpectedAttendanceSlot[]): Promise<void>;

  /** Removes the attendance forecast of every branch */
  clearAttendance(): Promise<void>;

  readAll(kind: "occupancy"): Promise<ReadingsByBranch<"occupancy">>;
  readAll(kind: "attendance"): Promise<ReadingsByBranch<"attendance">>;
  readAll(
    kind: ReadingKind,
  ): Promise<ReadingsByBranch<"occupancy"> | ReadingsByBranch<"attendance">>;
}
