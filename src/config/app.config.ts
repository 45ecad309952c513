import { ConfigurationError } from "../common/errors/ingestion.error";

export const APP_CONFIG = "APP_CONFIG";

export type StorageBackend = "memory" | "database";

/**
 * - branch: each attendance refresh deletes only that branch's rows
 * - all: one delete of the whole table before the per-branch inserts
 */
export type AttendanceDeleteScope = "branch" | "all";

export interface UpstreamConfig {
  occupancyUrl: string;
  attendanceUrl: string;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  projectId: string | null;
  storageBackend: StorageBackend;
  upstream: UpstreamConfig;
  /** Added to upstream timestamps before they are written to the database */
  timestampOffsetHours: number;
  attendanceDeleteScope: AttendanceDeleteScope;
  shutdownGraceMs: number;
  scheduleEnabled: boolean;
}

export const DEFAULT_OCCUPANCY_URL =
  "https://portal.urbanclimb.com.au/uc-services/ajax/gym/occupancy.ashx?branch=";
export const DEFAULT_ATTENDANCE_URL =
  "https://api-prod.urbanclimb.com.au/widgets/trendline-data?branch=";

function readNumber(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readChoice<T extends string>(
  env: NodeJS.ProcessEnv,
  key: string,
  choices: readonly T[],
  fallback: T,
): T {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const match = choices.find((choice) => choice === raw.trim());
  if (!match) {
    throw new ConfigurationError(
      `${key} must be one of ${choices.join(", ")}, got "${raw}"`,
    );
  }
  return match;
}

export const getStorageBackend = (
  env: NodeJS.ProcessEnv = process.env,
): StorageBackend =>
  readChoice(env, "STORAGE_BACKEND", ["memory", "database"], "memory");

export const getAppConfig = (
  env: NodeJS.ProcessEnv = process.env,
): AppConfig => {
  const timeoutMs = readNumber(env, "UPSTREAM_TIMEOUT_MS", 10000);
  if (timeoutMs <= 0) {
    throw new ConfigurationError("UPSTREAM_TIMEOUT_MS must be positive");
  }

  return {
    port: readNumber(env, "PORT", 8080),
    projectId: env.GOOGLE_CLOUD_PROJECT || null,
    storageBackend: getStorageBackend(env),
    upstream: {
      occupancyUrl: env.UPSTREAM_OCCUPANCY_URL || DEFAULT_OCCUPANCY_URL,
      attendanceUrl: env.UPSTREAM_ATTENDANCE_URL || DEFAULT_ATTENDANCE_URL,
      timeoutMs,
    },
    timestampOffsetHours: readNumber(env, "TIMESTAMP_OFFSET_HOURS", 0),
    attendanceDeleteScope: readChoice(
      env,
      "ATTENDANCE_DELETE_SCOPE",
      ["branch", "all"],
      "branch",
    ),
    shutdownGraceMs: readNumber(env, "SHUTDOWN_GRACE_MS", 10000),
    scheduleEnabled: env.INGESTION_SCHEDULE_ENABLED === "true",
  };
};
