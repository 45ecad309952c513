import { Inject, Injectable, Logger } from "@nestjs/common";
import axios, { AxiosInstance, isAxiosError } from "axios";
import { plainToInstance } from "class-transformer";
import { ValidationError, validateSync } from "class-validator";
import { Branch } from "../../branches/branch-registry";
import { APP_CONFIG, AppConfig } from "../../config/app.config";
import {
  IngestionError,
  describeError,
} from "../../common/errors/ingestion.error";
import {
  EXPECTED_ATTENDANCE_SLOTS,
  ExpectedAttendanceSlot,
  OccupancyReading,
} from "../../readings/readings.types";
import { UpstreamAttendanceSlot, UpstreamOccupancy } from "./occupancy.types";

type Endpoint = "occupancy" | "attendance";

/**
 * Gym Occupancy API Client
 *
 * Two vendor endpoints, both keyed by the branch's upstream id appended to
 * a configured base URL:
 * - occupancy: current fill level (single object)
 * - attendance: expected attendance trend line (16 hourly slots)
 *
 * Every call carries an explicit timeout and an optional AbortSignal.
 * Failures are logged here and rethrown as IngestionError with kind
 * "upstream" or "decode"; no retries.
 */
@Injectable()
export class OccupancyClient {
  private readonly logger = new Logger(OccupancyClient.name);
  private readonly client: AxiosInstance;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {
    this.client = axios.create({
      timeout: config.upstream.timeoutMs,
      responseType: "json",
      headers: {
        Accept: "application/json",
        "User-Agent": "gym-occupancy-api/1.0",
      },
    });
  }

  /**
   * GET {occupancyUrl}{upstreamId}
   */
  async fetchOccupancy(
    branch: Branch,
    signal?: AbortSignal,
  ): Promise<OccupancyReading> {
    const data = await this.get(branch, "occupancy", signal);

    if (!isPlainObject(data)) {
      throw this.decodeError(branch, "occupancy", "expected a JSON object");
    }

    const payload = plainToInstance(UpstreamOccupancy, data);
    this.validate(branch, "occupancy", payload);

    // Week and ordinal dates pass ISO 8601 validation but not Date parsing
    const lastUpdated = new Date(payload.LastUpdated);
    if (Number.isNaN(lastUpdated.getTime())) {
      throw this.decodeError(
        branch,
        "occupancy",
        "LastUpdated is not a valid timestamp",
      );
    }

    return {
      lastUpdated,
      name: payload.Name,
      status: payload.Status,
      currentPercentage: payload.CurrentPercentage,
    };
  }

  /**
   * GET {attendanceUrl}{upstreamId}
   *
   * @returns exactly 16 slots in upstream order
   */
  async fetchExpectedAttendance(
    branch: Branch,
    signal?: AbortSignal,
  ): Promise<ExpectedAttendanceSlot[]> {
    const data = await this.get(branch, "attendance", signal);

    if (!Array.isArray(data)) {
      throw this.decodeError(branch, "attendance", "expected a JSON array");
    }
    if (data.length !== EXPECTED_ATTENDANCE_SLOTS) {
      throw this.decodeError(
        branch,
        "attendance",
        `expected ${EXPECTED_ATTENDANCE_SLOTS} slots, got ${data.length}`,
      );
    }

    return data.map((item: unknown, index) => {
      if (!isPlainObject(item)) {
        throw this.decodeError(
          branch,
          "attendance",
          `slot ${index} is not a JSON object`,
        );
      }
      const slot = plainToInstance(UpstreamAttendanceSlot, item);
      this.validate(branch, "attendance", slot, `slot ${index}: `);

      return {
        hour: slot.hour,
        percentage: slot.percantage,
        ...(slot.remaining !== undefined && { remaining: slot.remaining }),
      };
    });
  }

  buildUrl(branch: Branch, endpoint: Endpoint): string {
    const base =
      endpoint === "occupancy"
        ? this.config.upstream.occupancyUrl
        : this.config.upstream.attendanceUrl;
    return `${base}${encodeURIComponent(branch.upstreamId)}`;
  }

  private async get(
    branch: Branch,
    endpoint: Endpoint,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const url = this.buildUrl(branch, endpoint);
    this.logger.debug(`Fetching ${endpoint} for ${branch.name}`);

    try {
      const response = await this.client.get<unknown>(url, { signal });
      return response.data;
    } catch (error) {
      const message = `Failed to fetch ${endpoint} for ${branch.name}: ${this.describeRequestError(error)}`;
      this.logger.error(`❌ ${message}`);
      throw new IngestionError("upstream", message, branch.name, {
        cause: error,
      });
    }
  }

  private describeRequestError(error: unknown): string {
    if (!isAxiosError(error)) {
      return describeError(error);
    }
    if (error.response) {
      return `HTTP ${error.response.status}`;
    }
    switch (error.code) {
      case "ECONNABORTED":
      case "ETIMEDOUT":
        return `timed out after ${this.config.upstream.timeoutMs}ms`;
      case "ERR_CANCELED":
        return "request aborted";
      default:
        return error.message;
    }
  }

  private validate(
    branch: Branch,
    endpoint: Endpoint,
    payload: object,
    prefix = "",
  ): void {
    const errors = validateSync(payload);
    if (errors.length > 0) {
      throw this.decodeError(
        branch,
        endpoint,
        `${prefix}${formatValidationErrors(errors)}`,
      );
    }
  }

  private decodeError(
    branch: Branch,
    endpoint: Endpoint,
    detail: string,
  ): IngestionError {
    const message = `Unexpected ${endpoint} payload for ${branch.name}: ${detail}`;
    this.logger.error(`❌ ${message}`);
    return new IngestionError("decode", message, branch.name);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map((error) =>
      Object.values(error.constraints ?? {}).join(", ") || error.property,
    )
    .join("; ");
}
