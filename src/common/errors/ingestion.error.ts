import type { BranchName } from "../../branches/branch-registry";

/**
 * Failure taxonomy for the ingestion pipeline.
 *
 * - upstream: network error, timeout, abort or non-2xx from the vendor API
 * - decode: response body does not match the expected JSON shape
 * - persistence: query or connection error in the store
 * - configuration: missing/invalid environment at startup (fatal)
 */
export type IngestionErrorKind =
  | "upstream"
  | "decode"
  | "persistence"
  | "configuration";

export class IngestionError extends Error {
  constructor(
    readonly kind: IngestionErrorKind,
    message: string,
    readonly branch?: BranchName,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "IngestionError";
  }
}

/**
 * Thrown by the config loaders. Bootstrap treats it as fatal.
 */
export class ConfigurationError extends IngestionError {
  constructor(message: string) {
    super("configuration", message);
    this.name = "ConfigurationError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
