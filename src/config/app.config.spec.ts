import {
  DEFAULT_ATTENDANCE_URL,
  DEFAULT_OCCUPANCY_URL,
  getAppConfig,
  getStorageBackend,
} from "./app.config";
import { ConfigurationError } from "../common/errors/ingestion.error";

describe("getAppConfig", () => {
  it("should fall back to defaults on an empty environment", () => {
    expect(getAppConfig({})).toEqual({
      port: 8080,
      projectId: null,
      storageBackend: "memory",
      upstream: {
        occupancyUrl: DEFAULT_OCCUPANCY_URL,
        attendanceUrl: DEFAULT_ATTENDANCE_URL,
        timeoutMs: 10000,
      },
      timestampOffsetHours: 0,
      attendanceDeleteScope: "branch",
      shutdownGraceMs: 10000,
      scheduleEnabled: false,
    });
  });

  it("should read every override", () => {
    const config = getAppConfig({
      PORT: "3000",
      GOOGLE_CLOUD_PROJECT: "test-project",
      STORAGE_BACKEND: "database",
      UPSTREAM_OCCUPANCY_URL: "http://localhost:4000/occupancy?branch=",
      UPSTREAM_ATTENDANCE_URL: "http://localhost:4000/trend?branch=",
      UPSTREAM_TIMEOUT_MS: "2500",
      TIMESTAMP_OFFSET_HOURS: "10",
      ATTENDANCE_DELETE_SCOPE: "all",
      SHUTDOWN_GRACE_MS: "500",
      INGESTION_SCHEDULE_ENABLED: "true",
    });

    expect(config).toEqual({
      port: 3000,
      projectId: "test-project",
      storageBackend: "database",
      upstream: {
        occupancyUrl: "http://localhost:4000/occupancy?branch=",
        attendanceUrl: "http://localhost:4000/trend?branch=",
        timeoutMs: 2500,
      },
      timestampOffsetHours: 10,
      attendanceDeleteScope: "all",
      shutdownGraceMs: 500,
      scheduleEnabled: true,
    });
  });

  it("should reject a non-numeric timeout", () => {
    expect(() => getAppConfig({ UPSTREAM_TIMEOUT_MS: "soon" })).toThrow(
      'UPSTREAM_TIMEOUT_MS must be a number, got "soon"',
    );
  });

  it("should reject a zero timeout", () => {
    expect(() => getAppConfig({ UPSTREAM_TIMEOUT_MS: "0" })).toThrow(
      ConfigurationError,
    );
  });

  it("should reject an unknown delete scope", () => {
    expect(() => getAppConfig({ ATTENDANCE_DELETE_SCOPE: "table" })).toThrow(
      'ATTENDANCE_DELETE_SCOPE must be one of branch, all, got "table"',
    );
  });
});

describe("getStorageBackend", () => {
  it("should default to memory", () => {
    expect(getStorageBackend({})).toBe("memory");
  });

  it("should reject an unknown backend", () => {
    expect(() => getStorageBackend({ STORAGE_BACKEND: "redis" })).toThrow(
      'STORAGE_BACKEND must be one of memory, database, got "redis"',
    );
  });
});
