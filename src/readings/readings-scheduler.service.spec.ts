import { Test, TestingModule } from "@nestjs/testing";
import { ReadingsSchedulerService } from "./readings-scheduler.service";
import { IngestionService } from "./ingestion.service";
import { IngestionResult } from "./readings.types";
import { APP_CONFIG, AppConfig } from "../config/app.config";
import { buildTestConfig } from "../../test/fixtures/config.fixtures";

describe("ReadingsSchedulerService", () => {
  let scheduler: ReadingsSchedulerService;
  let ingestionService: { runIngestionCycle: jest.Mock };

  const okResult: IngestionResult = {
    kind: "occupancy",
    ok: true,
    stored: ["westend", "milton", "newstead"],
    errors: [],
    startedAt: new Date("2024-05-01T08:15:00Z"),
    finishedAt: new Date("2024-05-01T08:15:01Z"),
  };

  const createScheduler = async (overrides: Partial<AppConfig>) => {
    ingestionService = { runIngestionCycle: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReadingsSchedulerService,
        { provide: IngestionService, useValue: ingestionService },
        { provide: APP_CONFIG, useValue: buildTestConfig(overrides) },
      ],
    }).compile();

    scheduler = module.get<ReadingsSchedulerService>(ReadingsSchedulerService);
  };

  it("should do nothing while scheduling is disabled", async () => {
    await createScheduler({ scheduleEnabled: false });

    await expect(scheduler.ingestOccupancy()).resolves.toBeNull();
    await expect(scheduler.ingestAttendance()).resolves.toBeNull();
    expect(ingestionService.runIngestionCycle).not.toHaveBeenCalled();
  });

  it("should run an occupancy cycle when enabled", async () => {
    await createScheduler({ scheduleEnabled: true });
    ingestionService.runIngestionCycle.mockResolvedValue(okResult);

    const result = await scheduler.ingestOccupancy();

    expect(result).toBe(okResult);
    expect(ingestionService.runIngestionCycle).toHaveBeenCalledWith(
      "occupancy",
    );
  });

  it("should return a failed attendance result without throwing", async () => {
    await createScheduler({ scheduleEnabled: true });
    const failed: IngestionResult = {
      ...okResult,
      kind: "attendance",
      ok: false,
      stored: ["westend", "milton"],
      errors: [
        {
          branch: "newstead",
          kind: "upstream",
          message: "Failed to fetch attendance for newstead: HTTP 502",
        },
      ],
    };
    ingestionService.runIngestionCycle.mockResolvedValue(failed);

    const result = await scheduler.ingestAttendance();

    expect(result).toBe(failed);
    expect(ingestionService.runIngestionCycle).toHaveBeenCalledWith(
      "attendance",
    );
  });
});
