import { Test, TestingModule } from "@nestjs/testing";
import axios, {
  AxiosError,
  AxiosHeaders,
  AxiosInstance,
  AxiosResponse,
} from "axios";
import { OccupancyClient } from "./occupancy.client";
import {
  APP_CONFIG,
  DEFAULT_ATTENDANCE_URL,
  DEFAULT_OCCUPANCY_URL,
} from "../../config/app.config";
import { getBranch } from "../../branches/branch-registry";
import { buildTestConfig } from "../../../test/fixtures/config.fixtures";
import {
  buildUpstreamAttendance,
  buildUpstreamOccupancy,
} from "../../../test/fixtures/readings.fixtures";

describe("OccupancyClient", () => {
  let client: OccupancyClient;
  let mockAxiosInstance: { get: jest.Mock };

  const westend = getBranch("westend");
  const milton = getBranch("milton");

  const httpError = (status: number): AxiosError => {
    const response: AxiosResponse = {
      status,
      statusText: "Service Unavailable",
      data: "",
      headers: {},
      config: { headers: new AxiosHeaders() },
    };
    return new AxiosError(
      `Request failed with status code ${status}`,
      "ERR_BAD_RESPONSE",
      undefined,
      undefined,
      response,
    );
  };

  beforeEach(async () => {
    mockAxiosInstance = { get: jest.fn() };
    jest
      .spyOn(axios, "create")
      .mockReturnValue(mockAxiosInstance as unknown as AxiosInstance);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        OccupancyClient,
        { provide: APP_CONFIG, useValue: buildTestConfig() },
      ],
    }).compile();

    client = module.get<OccupancyClient>(OccupancyClient);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should create the axios instance with the configured timeout", () => {
    expect(axios.create).toHaveBeenCalledWith(
      expect.objectContaining({ timeout: 10000 }),
    );
  });

  describe("fetchOccupancy", () => {
    it("should decode the westend reading", async () => {
      mockAxiosInstance.get.mockResolvedValue({
        data: buildUpstreamOccupancy(),
      });

      const reading = await client.fetchOccupancy(westend);

      expect(reading).toEqual({
        lastUpdated: new Date("2024-05-01T08:15:00Z"),
        name: "West End",
        status: "Quiet",
        currentPercentage: 42.5,
      });
      expect(mockAxiosInstance.get).toHaveBeenCalledWith(
        `${DEFAULT_OCCUPANCY_URL}D969F1B2-0C9F-49A9-B2AC-D7775642F298`,
        { signal: undefined },
      );
    });

    it("should pass the abort signal to the request", async () => {
      mockAxiosInstance.get.mockResolvedValue({
        data: buildUpstreamOccupancy(),
      });
      const controller = new AbortController();

      await client.fetchOccupancy(westend, controller.signal);

      expect(mockAxiosInstance.get).toHaveBeenCalledWith(expect.any(String), {
        signal: controller.signal,
      });
    });

    it("should ignore extra vendor fields", async () => {
      mockAxiosInstance.get.mockResolvedValue({
        data: buildUpstreamOccupancy({ Capacity: 120 }),
      });

      const reading = await client.fetchOccupancy(westend);

      expect(reading.currentPercentage).toBe(42.5);
    });

    it("should reject a body that is not JSON", async () => {
      // axios hands back the raw string when JSON parsing fails
      mockAxiosInstance.get.mockResolvedValue({ data: "<html>error</html>" });

      await expect(client.fetchOccupancy(westend)).rejects.toMatchObject({
        kind: "decode",
        branch: "westend",
        message:
          "Unexpected occupancy payload for westend: expected a JSON object",
      });
    });

    it("should reject a payload with a missing timestamp", async () => {
      mockAxiosInstance.get.mockResolvedValue({
        data: buildUpstreamOccupancy({ LastUpdated: undefined }),
      });

      await expect(client.fetchOccupancy(westend)).rejects.toThrow(
        "LastUpdated must be a valid ISO 8601 date string",
      );
    });

    it("should reject an ISO week date that does not parse as a timestamp", async () => {
      mockAxiosInstance.get.mockResolvedValue({
        data: buildUpstreamOccupancy({ LastUpdated: "2024-W18-3" }),
      });

      await expect(client.fetchOccupancy(westend)).rejects.toMatchObject({
        kind: "decode",
        message:
          "Unexpected occupancy payload for westend: LastUpdated is not a valid timestamp",
      });
    });

    it("should reject an ordinal date that does not parse as a timestamp", async () => {
      mockAxiosInstance.get.mockResolvedValue({
        data: buildUpstreamOccupancy({ LastUpdated: "2024-122" }),
      });

      await expect(client.fetchOccupancy(westend)).rejects.toMatchObject({
        kind: "decode",
        branch: "westend",
      });
    });

    it("should reject an impossible calendar date", async () => {
      mockAxiosInstance.get.mockResolvedValue({
        data: buildUpstreamOccupancy({ LastUpdated: "2024-02-31T10:00:00Z" }),
      });

      await expect(client.fetchOccupancy(westend)).rejects.toMatchObject({
        kind: "decode",
        message:
          "Unexpected occupancy payload for westend: LastUpdated must be a valid ISO 8601 date string",
      });
    });

    it("should reject a percentage above 100", async () => {
      mockAxiosInstance.get.mockResolvedValue({
        data: buildUpstreamOccupancy({ CurrentPercentage: 142 }),
      });

      await expect(client.fetchOccupancy(westend)).rejects.toThrow(
        "CurrentPercentage must not be greater than 100",
      );
    });

    it("should report a timeout as an upstream error", async () => {
      mockAxiosInstance.get.mockRejectedValue(
        new AxiosError("timeout of 10000ms exceeded", "ECONNABORTED"),
      );

      await expect(client.fetchOccupancy(milton)).rejects.toMatchObject({
        kind: "upstream",
        branch: "milton",
        message: "Failed to fetch occupancy for milton: timed out after 10000ms",
      });
    });

    it("should report a non-2xx status as an upstream error", async () => {
      mockAxiosInstance.get.mockRejectedValue(httpError(503));

      await expect(client.fetchOccupancy(milton)).rejects.toMatchObject({
        kind: "upstream",
        message: "Failed to fetch occupancy for milton: HTTP 503",
      });
    });

    it("should report an aborted request", async () => {
      mockAxiosInstance.get.mockRejectedValue(
        new AxiosError("canceled", "ERR_CANCELED"),
      );

      await expect(client.fetchOccupancy(milton)).rejects.toMatchObject({
        kind: "upstream",
        message: "Failed to fetch occupancy for milton: request aborted",
      });
    });
  });

  describe("fetchExpectedAttendance", () => {
    it("should decode 16 slots and rename the vendor's percentage field", async () => {
      mockAxiosInstance.get.mockResolvedValue({
        data: buildUpstreamAttendance(10),
      });

      const slots = await client.fetchExpectedAttendance(milton);

      expect(slots).toHaveLength(16);
      expect(slots[0]).toEqual({ hour: 6, percentage: 10, remaining: 90 });
      expect(slots[15]).toEqual({ hour: 21, percentage: 25, remaining: 75 });
      expect(mockAxiosInstance.get).toHaveBeenCalledWith(
        `${DEFAULT_ATTENDANCE_URL}690326F9-98CE-4249-BD91-53A0676A137B`,
        { signal: undefined },
      );
    });

    it("should omit remaining when the vendor leaves it out", async () => {
      const payload = buildUpstreamAttendance(10).map(
        ({ hour, percantage }) => ({ hour, percantage }),
      );
      mockAxiosInstance.get.mockResolvedValue({ data: payload });

      const slots = await client.fetchExpectedAttendance(milton);

      expect(slots[0]).toEqual({ hour: 6, percentage: 10 });
    });

    it("should reject a trend line without exactly 16 slots", async () => {
      mockAxiosInstance.get.mockResolvedValue({
        data: buildUpstreamAttendance(10).slice(1),
      });

      await expect(client.fetchExpectedAttendance(milton)).rejects.toMatchObject({
        kind: "decode",
        message:
          "Unexpected attendance payload for milton: expected 16 slots, got 15",
      });
    });

    it("should reject an hour outside 0-23", async () => {
      const payload = buildUpstreamAttendance(10);
      payload[3] = { ...payload[3], hour: 24 };
      mockAxiosInstance.get.mockResolvedValue({ data: payload });

      await expect(client.fetchExpectedAttendance(milton)).rejects.toThrow(
        "Unexpected attendance payload for milton: slot 3: hour must not be greater than 23",
      );
    });

    it("should reject an object where an array is expected", async () => {
      mockAxiosInstance.get.mockResolvedValue({ data: { error: "unknown branch" } });

      await expect(client.fetchExpectedAttendance(milton)).rejects.toMatchObject({
        kind: "decode",
        message: "Unexpected attendance payload for milton: expected a JSON array",
      });
    });
  });

  describe("buildUrl", () => {
    it("should append the upstream id to the configured base", () => {
      expect(client.buildUrl(getBranch("newstead"), "occupancy")).toBe(
        `${DEFAULT_OCCUPANCY_URL}A3010228-DFC6-4317-86C0-3839FFDF3FD0`,
      );
    });
  });
});
