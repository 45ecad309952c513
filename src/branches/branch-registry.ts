/**
 * Branch Registry
 *
 * The closed set of gym branches tracked by the service. Each branch maps
 * to the vendor's opaque identifier and to the small integer used as
 * `branch_id` in the database. The registry is frozen at module load and
 * never grows at runtime.
 */

export const BRANCH_NAMES = ["westend", "milton", "newstead"] as const;

export type BranchName = (typeof BRANCH_NAMES)[number];

export interface Branch {
  readonly name: BranchName;
  /** Identifier expected by the vendor API (`?branch=`) */
  readonly upstreamId: string;
  /** Stable key stored in `branch_id` columns */
  readonly storageId: number;
}

const REGISTRY: Readonly<Record<BranchName, Branch>> = Object.freeze({
  westend: Object.freeze({
    name: "westend",
    upstreamId: "D969F1B2-0C9F-49A9-B2AC-D7775642F298",
    storageId: 0,
  }),
  milton: Object.freeze({
    name: "milton",
    upstreamId: "690326F9-98CE-4249-BD91-53A0676A137B",
    storageId: 1,
  }),
  newstead: Object.freeze({
    name: "newstead",
    upstreamId: "A3010228-DFC6-4317-86C0-3839FFDF3FD0",
    storageId: 2,
  }),
});

const BY_STORAGE_ID: ReadonlyMap<number, Branch> = new Map(
  BRANCH_NAMES.map((name) => [REGISTRY[name].storageId, REGISTRY[name]]),
);

/**
 * All registered branches. Callers must not depend on the order.
 */
export function listBranches(): readonly Branch[] {
  return BRANCH_NAMES.map((name) => REGISTRY[name]);
}

export function getBranch(name: BranchName): Branch {
  return REGISTRY[name];
}

/**
 * Reverse lookup used when grouping persisted rows.
 */
export function getBranchByStorageId(storageId: number): Branch | undefined {
  return BY_STORAGE_ID.get(storageId);
}

export function isBranchName(value: string): value is BranchName {
  return (BRANCH_NAMES as readonly string[]).includes(value);
}

/**
 * Builds a record keyed by every branch name.
 */
export function createBranchRecord<T>(
  factory: (name: BranchName) => T,
): Record<BranchName, T> {
  return {
    westend: factory("westend"),
    milton: factory("milton"),
    newstead: factory("newstead"),
  };
}
