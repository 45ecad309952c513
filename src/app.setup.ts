import { NestExpressApplication } from "@nestjs/platform-express";
import { Request, Response, NextFunction } from "express";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";
import { LoggingInterceptor } from "./common/interceptors/logging.interceptor";
import * as packageJson from "../package.json";

/**
 * HTTP setup shared by the server and the e2e tests.
 */
export function configureApp(app: NestExpressApplication): void {
  // Pretty-printed JSON responses
  app.set("json spaces", 2);

  // Custom X-Powered-By header
  app.disable("x-powered-by");
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.setHeader("X-Powered-By", packageJson.name);
    next();
  });

  // Global exception filter
  app.useGlobalFilters(new HttpExceptionFilter());

  // Global interceptors
  app.useGlobalInterceptors(new LoggingInterceptor());
}
