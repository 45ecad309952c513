import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { BranchIngestionErrorDto } from "../../readings/dto/ingestion-result.dto";

export type ErrorEnvelopeKind =
  | "ingestion_failed"
  | "bad_request"
  | "not_found"
  | "internal";

/**
 * Body of every error response
 */
export class ErrorEnvelopeDto {
  @ApiProperty({
    enum: ["ingestion_failed", "bad_request", "not_found", "internal"],
  })
  kind!: ErrorEnvelopeKind;

  @ApiProperty()
  message!: string;

  @ApiProperty({ example: 500 })
  statusCode!: number;

  @ApiProperty({ example: "/branches/store" })
  path!: string;

  @ApiProperty()
  timestamp!: string;

  @ApiPropertyOptional({ type: [BranchIngestionErrorDto] })
  errors?: BranchIngestionErrorDto[];
}
