import type { BranchName } from "../branches/branch-registry";
import type { IngestionErrorKind } from "../common/errors/ingestion.error";

/**
 * Point-in-time occupancy snapshot of one branch, as reported upstream.
 */
export interface OccupancyReading {
  lastUpdated: Date;
  name: string;
  status: string;
  /** 0-100 */
  currentPercentage: number;
}

/**
 * One hour-of-day forecast entry. Upstream returns 16 per branch.
 */
export interface ExpectedAttendanceSlot {
  hour: number;
  percentage: number;
  remaining?: number;
}

export interface ReadingsByKind {
  occupancy: OccupancyReading;
  attendance: ExpectedAttendanceSlot;
}

export type ReadingKind = keyof ReadingsByKind;

export const READING_KINDS: readonly ReadingKind[] = ["occupancy", "attendance"];

export type ReadingsByBranch<K extends ReadingKind> = Record<
  BranchName,
  ReadingsByKind[K][]
>;

export const EXPECTED_ATTENDANCE_SLOTS = 16;

export interface BranchIngestionError {
  /** null when the failure is not tied to one branch (e.g. the global delete) */
  branch: BranchName | null;
  kind: IngestionErrorKind;
  message: string;
}

export interface IngestionResult {
  kind: ReadingKind;
  ok: boolean;
  stored: BranchName[];
  errors: BranchIngestionError[];
  startedAt: Date;
  finishedAt: Date;
}
