import {
  IsISO8601,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from "class-validator";

/**
 * Gym Occupancy Vendor API Types
 *
 * Payload classes double as validation schemas: raw JSON is run through
 * plainToInstance + validateSync before it reaches the pipeline.
 */

/**
 * Response from occupancy.ashx?branch={id}
 *
 * Field names are the vendor's.
 */
export class UpstreamOccupancy {
  @IsISO8601({ strict: true, strictSeparator: true })
  LastUpdated!: string;

  @IsString()
  Name!: string;

  @IsString()
  Status!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(100)
  CurrentPercentage!: number;
}

/**
 * One element of trendline-data?branch={id}
 *
 * "percantage" is misspelled by the vendor.
 */
export class UpstreamAttendanceSlot {
  @IsInt()
  @Min(0)
  @Max(23)
  hour!: number;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  percantage!: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  remaining?: number;
}
