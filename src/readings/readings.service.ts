import { Inject, Injectable } from "@nestjs/common";
import { READING_STORE, ReadingStore } from "./storage/reading-store.interface";
import { ReadingKind, ReadingsByBranch } from "./readings.types";

/**
 * Query surface over the configured store. The database backend runs a
 * fresh read on every call; nothing is cached here.
 */
@Injectable()
export class ReadingsService {
  constructor(@Inject(READING_STORE) private readonly store: ReadingStore) {}

  getCurrentState(kind: "occupancy"): Promise<ReadingsByBranch<"occupancy">>;
  getCurrentState(kind: "attendance"): Promise<ReadingsByBranch<"attendance">>;
  getCurrentState(
    kind: ReadingKind,
  ): Promise<ReadingsByBranch<"occupancy"> | ReadingsByBranch<"attendance">>;
  getCurrentState(
    kind: ReadingKind,
  ): Promise<ReadingsByBranch<"occupancy"> | ReadingsByBranch<"attendance">> {
    return this.store.readAll(kind);
  }

  get backend(): ReadingStore["backend"] {
    return this.store.backend;
  }
}
