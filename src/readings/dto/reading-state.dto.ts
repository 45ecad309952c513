import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";

export class OccupancyReadingDto {
  @ApiProperty({
    description: "Vendor timestamp of the reading",
    example: "2024-05-01T08:15:00.000Z",
  })
  lastUpdated!: Date;

  @ApiProperty({ example: "West End" })
  name!: string;

  @ApiProperty({ description: "Free-text label from the vendor", example: "Quiet" })
  status!: string;

  @ApiProperty({ minimum: 0, maximum: 100, example: 42.5 })
  currentPercentage!: number;
}

export class AttendanceSlotDto {
  @ApiProperty({ minimum: 0, maximum: 23, example: 17 })
  hour!: number;

  @ApiProperty({ description: "Forecast occupancy percentage", example: 63 })
  percentage!: number;

  @ApiPropertyOptional({ description: "Remaining capacity reported by the vendor" })
  remaining?: number;
}

/**
 * Response for GET /branches: occupancy readings per branch, oldest first
 */
export class OccupancyStateDto {
  @ApiProperty({ type: [OccupancyReadingDto] })
  westend!: OccupancyReadingDto[];

  @ApiProperty({ type: [OccupancyReadingDto] })
  milton!: OccupancyReadingDto[];

  @ApiProperty({ type: [OccupancyReadingDto] })
  newstead!: OccupancyReadingDto[];
}

/**
 * Response for GET /attendance: the current 16-slot forecast per branch
 */
export class AttendanceStateDto {
  @ApiProperty({ type: [AttendanceSlotDto] })
  westend!: AttendanceSlotDto[];

  @ApiProperty({ type: [AttendanceSlotDto] })
  milton!: AttendanceSlotDto[];

  @ApiProperty({ type: [AttendanceSlotDto] })
  newstead!: AttendanceSlotDto[];
}
