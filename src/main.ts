import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { NestExpressApplication } from "@nestjs/platform-express";
import { Logger } from "@nestjs/common";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";
import { ConfigurationError } from "./common/errors/ingestion.error";
import { APP_CONFIG, AppConfig } from "./config/app.config";
import * as packageJson from "../package.json";

const logger = new Logger("Bootstrap");

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(
    AppModule.register(),
    {
      logger: ["log", "error", "warn"],
    },
  );
  configureApp(app);

  const config = app.get<AppConfig>(APP_CONFIG);

  // Swagger/OpenAPI Documentation
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle("Gym Occupancy API")
      .setDescription(
        "Current occupancy and expected attendance for each gym branch, " +
          "polled from the vendor API and served as JSON.",
      )
      .setVersion(packageJson.version)
      .addTag("branches", "Current occupancy readings and occupancy ingestion")
      .addTag("attendance", "Expected attendance forecast and its daily refresh")
      .build(),
  );
  SwaggerModule.setup("api", app, document);

  await app.listen(config.port);
  logger.log(`🚀 Gym Occupancy API listening on port ${config.port}`);
  logger.log(`🗄️  Storage backend: ${config.storageBackend}`);

  let closing = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (closing) return;
    closing = true;
    logger.log(`Shutdown initiated (${signal})`);

    // Cloud Run allows 10 seconds between SIGTERM and SIGKILL
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), config.shutdownGraceMs);
    });

    const outcome = await Promise.race([
      app.close().then(() => "closed" as const),
      deadline,
    ]);
    clearTimeout(timer);

    if (outcome === "timeout") {
      logger.warn(
        `In-flight requests did not finish within ${config.shutdownGraceMs}ms, exiting`,
      );
      process.exit(1);
    }
    logger.log("Shutdown complete");
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, (received) => {
      shutdown(received).catch((error: unknown) => {
        logger.error("Shutdown failed", error instanceof Error ? error.stack : String(error));
        process.exit(1);
      });
    });
  }
}

bootstrap().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.error(`Fatal configuration error: ${error.message}`);
  } else {
    logger.error(
      "Unable to initialize application",
      error instanceof Error ? error.stack : String(error),
    );
  }
  process.exit(1);
});
