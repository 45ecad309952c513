import { HttpException, HttpStatus } from "@nestjs/common";
import { IngestionResult } from "./readings.types";

/**
 * Raised by the store endpoints when an ingestion cycle reports errors.
 * The exception filter turns it into an `ingestion_failed` envelope.
 */
export class IngestionFailedException extends HttpException {
  constructor(readonly result: IngestionResult) {
    super(
      {
        kind: "ingestion_failed",
        message: `${result.kind} ingestion failed: ${result.errors.length} error(s), ${result.stored.length} branch(es) stored`,
        errors: result.errors,
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }
}
