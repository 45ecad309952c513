import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from "@nestjs/common";
import { Branch, listBranches } from "../branches/branch-registry";
import { APP_CONFIG, AppConfig } from "../config/app.config";
import {
  IngestionError,
  describeError,
} from "../common/errors/ingestion.error";
import { linkAbortSignals } from "../common/utils/abort.util";
import { OccupancyClient } from "../external-apis/occupancy/occupancy.client";
import { READING_STORE, ReadingStore } from "./storage/reading-store.interface";
import {
  BranchIngestionError,
  IngestionResult,
  ReadingKind,
} from "./readings.types";

/**
 * Ingestion Orchestrator
 *
 * One cycle = one pass over every registered branch for one kind of data:
 * - occupancy: fetch current reading → store.record (append)
 * - attendance: fetch 16 forecast slots → store.replaceAll
 *
 * Best effort: a failing branch is reported in the result and the loop
 * moves on. Successful branches are never rolled back.
 *
 * Cycles of the same kind run one after another. Application shutdown
 * aborts the in-flight upstream requests.
 */
@Injectable()
export class IngestionService implements OnApplicationShutdown {
  private readonly logger = new Logger(IngestionService.name);
  private readonly shutdownController = new AbortController();
  private readonly queues: Record<ReadingKind, Promise<unknown>> = {
    occupancy: Promise.resolve(),
    attendance: Promise.resolve(),
  };

  constructor(
    private readonly client: OccupancyClient,
    @Inject(READING_STORE) private readonly store: ReadingStore,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  runIngestionCycle(
    kind: ReadingKind,
    signal?: AbortSignal,
  ): Promise<IngestionResult> {
    const run = this.queues[kind].then(() => this.runCycle(kind, signal));
    this.queues[kind] = run.catch(() => undefined);
    return run;
  }

  onApplicationShutdown(): void {
    this.shutdownController.abort(new Error("application shutting down"));
  }

  private async runCycle(
    kind: ReadingKind,
    requestSignal?: AbortSignal,
  ): Promise<IngestionResult> {
    const startedAt = new Date();
    const stored: IngestionResult["stored"] = [];
    const errors: BranchIngestionError[] = [];
    const { signal, release } = linkAbortSignals(
      requestSignal,
      this.shutdownController.signal,
    );

    this.logger.log(`🔄 Starting ${kind} ingestion cycle...`);

    try {
      if (kind === "attendance" && this.config.attendanceDeleteScope === "all") {
        try {
          await this.store.clearAttendance();
        } catch (error) {
          errors.push(toBranchError(null, error, "persistence"));
          return this.finish(kind, stored, errors, startedAt);
        }
      }

      for (const branch of listBranches()) {
        if (signal.aborted) {
          errors.push({
            branch: branch.name,
            kind: "upstream",
            message: `Skipped ${branch.name}: ingestion cycle aborted`,
          });
          continue;
        }

        let step: "fetch" | "store" = "fetch";
        try {
          if (kind === "occupancy") {
            const reading = await this.client.fetchOccupancy(branch, signal);
            step = "store";
            await this.store.record(branch, reading);
          } else {
            const slots = await this.client.fetchExpectedAttendance(
              branch,
              signal,
            );
            step = "store";
            await this.store.replaceAll(branch, slots);
          }
          stored.push(branch.name);
        } catch (error) {
          errors.push(
            toBranchError(
              branch,
              error,
              step === "fetch" ? "upstream" : "persistence",
            ),
          );
        }
      }

      return this.finish(kind, stored, errors, startedAt);
    } finally {
      release();
    }
  }

  private finish(
    kind: ReadingKind,
    stored: IngestionResult["stored"],
    errors: BranchIngestionError[],
    startedAt: Date,
  ): IngestionResult {
    const result: IngestionResult = {
      kind,
      ok: errors.length === 0,
      stored,
      errors,
      startedAt,
      finishedAt: new Date(),
    };
    const duration = result.finishedAt.getTime() - startedAt.getTime();

    if (result.ok) {
      this.logger.log(
        `✅ ${kind} ingestion stored ${stored.length} branches (${duration}ms)`,
      );
    } else {
      this.logger.warn(
        `⚠️ ${kind} ingestion finished with ${errors.length} error(s), stored ${stored.length} branches (${duration}ms)`,
      );
    }

    return result;
  }
}

function toBranchError(
  branch: Branch | null,
  error: unknown,
  fallbackKind: BranchIngestionError["kind"],
): BranchIngestionError {
  return {
    branch: branch?.name ?? null,
    kind: error instanceof IngestionError ? error.kind : fallbackKind,
    message: describeError(error),
  };
}
