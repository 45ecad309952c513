import { Controller, Get, HttpCode, HttpStatus, Post, Res } from "@nestjs/common";
import {
  ApiOkResponse,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from "@nestjs/swagger";
import { Response } from "express";
import { abortOnClientDisconnect } from "../common/utils/request.util";
import { ErrorEnvelopeDto } from "../common/dto/error-envelope.dto";
import { IngestionService } from "./ingestion.service";
import { ReadingsService } from "./readings.service";
import { IngestionFailedException } from "./ingestion-failed.exception";
import { AttendanceStateDto, OccupancyStateDto } from "./dto/reading-state.dto";
import { StoreResponseDto } from "./dto/ingestion-result.dto";
import { ReadingKind } from "./readings.types";

/**
 * Readings Controller
 *
 * Read endpoints return the store's state grouped by branch. The store
 * endpoints trigger one ingestion cycle; POST is the primary verb, the GET
 * aliases keep older cron callers working.
 */
@Controller()
export class ReadingsController {
  constructor(
    private readonly readingsService: ReadingsService,
    private readonly ingestionService: IngestionService,
  ) {}

  /**
   * GET /branches
   */
  @Get("branches")
  @ApiTags("branches")
  @ApiOperation({
    summary: "Current occupancy readings",
    description: "Occupancy readings recorded so far, grouped by branch.",
  })
  @ApiOkResponse({ type: OccupancyStateDto })
  async getOccupancy(): Promise<OccupancyStateDto> {
    return this.readingsService.getCurrentState("occupancy");
  }

  @Post("branches/store")
  @HttpCode(HttpStatus.OK)
  @ApiTags("branches")
  @ApiOperation({
    summary: "Ingest occupancy",
    description:
      "Fetches the current occupancy of every branch and appends it to the store.",
  })
  @ApiOkResponse({ type: StoreResponseDto })
  @ApiResponse({ status: 500, type: ErrorEnvelopeDto })
  async storeOccupancy(
    @Res({ passthrough: true }) res: Response,
  ): Promise<StoreResponseDto> {
    return this.ingest("occupancy", res);
  }

  @Get("branches/store")
  @ApiTags("branches")
  @ApiOperation({
    summary: "Ingest occupancy (GET alias)",
    deprecated: true,
  })
  @ApiOkResponse({ type: StoreResponseDto })
  async storeOccupancyAlias(
    @Res({ passthrough: true }) res: Response,
  ): Promise<StoreResponseDto> {
    return this.ingest("occupancy", res);
  }

  /**
   * GET /attendance
   */
  @Get("attendance")
  @ApiTags("attendance")
  @ApiOperation({
    summary: "Expected attendance",
    description: "The latest 16-slot hourly attendance forecast per branch.",
  })
  @ApiOkResponse({ type: AttendanceStateDto })
  async getAttendance(): Promise<AttendanceStateDto> {
    return this.readingsService.getCurrentState("attendance");
  }

  @Post("attendance/store")
  @HttpCode(HttpStatus.OK)
  @ApiTags("attendance")
  @ApiOperation({
    summary: "Ingest expected attendance",
    description:
      "Fetches the attendance forecast of every branch and replaces the stored one. Meant to run once per day.",
  })
  @ApiOkResponse({ type: StoreResponseDto })
  @ApiResponse({ status: 500, type: ErrorEnvelopeDto })
  async storeAttendance(
    @Res({ passthrough: true }) res: Response,
  ): Promise<StoreResponseDto> {
    return this.ingest("attendance", res);
  }

  @Get("attendance/store")
  @ApiTags("attendance")
  @ApiOperation({
    summary: "Ingest expected attendance (GET alias)",
    deprecated: true,
  })
  @ApiOkResponse({ type: StoreResponseDto })
  async storeAttendanceAlias(
    @Res({ passthrough: true }) res: Response,
  ): Promise<StoreResponseDto> {
    return this.ingest("attendance", res);
  }

  private async ingest(
    kind: ReadingKind,
    res: Response,
  ): Promise<StoreResponseDto> {
    const result = await this.ingestionService.runIngestionCycle(
      kind,
      abortOnClientDisconnect(res),
    );

    if (!result.ok) {
      throw new IngestionFailedException(result);
    }

    return { message: "Store Succeeded", result };
  }
}
