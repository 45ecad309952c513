import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
  HttpException,
} from "@nestjs/common";
import { Observable } from "rxjs";
import { tap } from "rxjs/operators";
import { Request, Response } from "express";

/**
 * Global logging interceptor for HTTP requests.
 *
 * Only logs interesting events:
 * - Errors (4xx, 5xx status codes)
 * - Slow requests (>1000ms)
 * - Ingestion triggers (/store)
 *
 * Routine reads stay quiet.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger("HTTP");

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const { method, url, ip } = request;
    const startTime = Date.now();

    const logRequest = (statusCode: number): void => {
      const responseTime = Date.now() - startTime;

      const isError = statusCode >= 400;
      const isSlow = responseTime > 1000; // >1s
      const isIngestion = url.includes("/store");

      if (isError || isSlow || isIngestion) {
        const emoji = isError ? "❌" : isSlow ? "🐌" : "🔄";
        this.logger.log(
          `${emoji} ${method} ${url} ${statusCode} - ${responseTime}ms - ${ip}`,
        );
      }
    };

    return next.handle().pipe(
      tap({
        next: () => logRequest(response.statusCode),
        error: (error: unknown) =>
          logRequest(error instanceof HttpException ? error.getStatus() : 500),
      }),
    );
  }
}
