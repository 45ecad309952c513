import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import { Request, Response } from "express";
import {
  ErrorEnvelopeDto,
  ErrorEnvelopeKind,
} from "../dto/error-envelope.dto";
import { IngestionFailedException } from "../../readings/ingestion-failed.exception";

/**
 * Global exception filter producing the `{ kind, message, ... }` error
 * envelope for every failed request.
 * - Hides internal error messages in production
 * - Logs 5xx with stack, 4xx as warning
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);
  private readonly isProduction = process.env.NODE_ENV === "production";

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const body: ErrorEnvelopeDto = {
      kind: kindForStatus(status),
      message: this.messageFor(exception),
      statusCode: status,
      path: request.url,
      timestamp: new Date().toISOString(),
    };

    if (exception instanceof IngestionFailedException) {
      body.kind = "ingestion_failed";
      body.errors = exception.result.errors;
    }

    if (status >= 500) {
      // Ingestion failures were already logged per branch
      if (!(exception instanceof IngestionFailedException)) {
        this.logger.error(
          `${request.method} ${request.url} - Status: ${status}`,
          exception instanceof Error ? exception.stack : String(exception),
        );
      }
    } else {
      this.logger.warn(
        `${request.method} ${request.url} - Status: ${status} - Message: ${body.message}`,
      );
    }

    response.status(status).json(body);
  }

  private messageFor(exception: unknown): string {
    if (exception instanceof HttpException) {
      const exceptionResponse = exception.getResponse();
      if (typeof exceptionResponse === "string") {
        return exceptionResponse;
      }
      if ("message" in exceptionResponse) {
        const { message } = exceptionResponse;
        if (Array.isArray(message)) return message.join(", ");
        if (typeof message === "string") return message;
      }
      return exception.message;
    }
    if (exception instanceof Error && !this.isProduction) {
      return exception.message;
    }
    return "Internal server error";
  }
}

function kindForStatus(status: number): ErrorEnvelopeKind {
  if (status === HttpStatus.NOT_FOUND) return "not_found";
  if (status >= 400 && status < 500) return "bad_request";
  return "internal";
}
