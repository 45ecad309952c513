/**
 * Trigger Ingestion
 *
 * Runs one ingestion cycle without starting the HTTP server and prints
 * the result. Usage: npm run ingest -- occupancy|attendance
 */

import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "../src/app.module";
import { IngestionService } from "../src/readings/ingestion.service";
import { READING_KINDS, ReadingKind } from "../src/readings/readings.types";

function parseKind(value: string | undefined): ReadingKind {
  const kind = READING_KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new Error(
      `Expected one of ${READING_KINDS.join(", ")}, got "${value ?? ""}"`,
    );
  }
  return kind;
}

async function run(): Promise<number> {
  const kind = parseKind(process.argv[2]);
  console.log(`🔄 Triggering ${kind} ingestion...`);

  const app = await NestFactory.createApplicationContext(AppModule.register(), {
    logger: ["log", "error", "warn"],
  });

  try {
    const result = await app.get(IngestionService).runIngestionCycle(kind);

    console.log(`Stored: ${result.stored.join(", ") || "none"}`);
    for (const error of result.errors) {
      console.log(`❌ [${error.kind}] ${error.message}`);
    }
    return result.ok ? 0 : 1;
  } finally {
    await app.close();
  }
}

run()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error("❌ Ingestion trigger failed:", error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
