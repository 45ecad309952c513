import { ApiProperty } from "@nestjs/swagger";
import type { BranchName } from "../../branches/branch-registry";
import type { IngestionErrorKind } from "../../common/errors/ingestion.error";
import { BRANCH_NAMES } from "../../branches/branch-registry";
import type { ReadingKind } from "../readings.types";

export class BranchIngestionErrorDto {
  @ApiProperty({ enum: BRANCH_NAMES, nullable: true })
  branch!: BranchName | null;

  @ApiProperty({ enum: ["upstream", "decode", "persistence", "configuration"] })
  kind!: IngestionErrorKind;

  @ApiProperty({ example: "Failed to fetch occupancy for milton: HTTP 503" })
  message!: string;
}

export class IngestionResultDto {
  @ApiProperty({ enum: ["occupancy", "attendance"] })
  kind!: ReadingKind;

  @ApiProperty()
  ok!: boolean;

  @ApiProperty({ enum: BRANCH_NAMES, isArray: true })
  stored!: BranchName[];

  @ApiProperty({ type: [BranchIngestionErrorDto] })
  errors!: BranchIngestionErrorDto[];

  @ApiProperty()
  startedAt!: Date;

  @ApiProperty()
  finishedAt!: Date;
}

/**
 * Response for a successful POST /branches/store or /attendance/store
 */
export class StoreResponseDto {
  @ApiProperty({ example: "Store Succeeded" })
  message!: string;

  @ApiProperty({ type: IngestionResultDto })
  result!: IngestionResultDto;
}
