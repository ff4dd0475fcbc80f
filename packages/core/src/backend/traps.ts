import * as errors from "../gateway/api-errors.js";
import type { StatusTable } from "./schema.js";

/**
 * Status traps turn a reply's status code into an HTTP error before its
 * payload is trusted. Each reply type has its own status enum, so chains
 * are resolved per call against that reply type's status table.
 */

/** Declares which status of a reply raises which error. */
export interface TrapSpec {
  readonly status: string;
  readonly error: errors.ApiErrorClass;
}

/** A trap resolved against a concrete status code. */
export interface StatusTrap {
  readonly code: number;
  readonly spec: TrapSpec;
}

// Applied after the endpoint's own traps, wherever the reply type has the status
export const Unknown: TrapSpec = { status: "INTERNAL_ERROR", error: errors.UnknownValidatorError };
export const NotReady: TrapSpec = { status: "NOT_READY", error: errors.ValidatorNotReady };
export const MissingHead: TrapSpec = { status: "NO_ROOT", error: errors.HeadNotFound };

export const BASELINE_TRAPS: readonly TrapSpec[] = [Unknown, NotReady, MissingHead];

export const InvalidBatch: TrapSpec = { status: "INVALID_BATCH", error: errors.SubmittedBatchesInvalid };
export const StatusesNotReturned: TrapSpec = { status: "NO_RESOURCE", error: errors.StatusesNotReturned };
export const MissingLeaf: TrapSpec = { status: "NO_RESOURCE", error: errors.LeafNotFound };
export const BadAddress: TrapSpec = { status: "INVALID_ADDRESS", error: errors.InvalidStateAddress };
export const MissingBlock: TrapSpec = { status: "NO_RESOURCE", error: errors.BlockNotFound };
export const InvalidBlockId: TrapSpec = { status: "INVALID_ID", error: errors.InvalidBlockId };
export const MissingBatch: TrapSpec = { status: "NO_RESOURCE", error: errors.BatchNotFound };
export const InvalidBatchId: TrapSpec = { status: "INVALID_ID", error: errors.InvalidBatchId };

/**
 * Resolve endpoint traps in the order given, then the baseline traps.
 * A baseline status the reply type lacks is skipped; an endpoint trap
 * naming a status the reply type lacks is a programming error.
 */
export function buildTrapChain(
  statuses: StatusTable,
  endpointTraps: readonly TrapSpec[] = [],
): StatusTrap[] {
  const chain: StatusTrap[] = [];

  for (const spec of endpointTraps) {
    const code = statuses.get(spec.status);
    if (code === undefined) {
      throw new Error(`Reply type has no status ${spec.status} to trap`);
    }
    chain.push({ code, spec });
  }

  for (const spec of BASELINE_TRAPS) {
    const code = statuses.get(spec.status);
    if (code !== undefined) chain.push({ code, spec });
  }

  return chain;
}

/** Throw the error of the first trap matching `status`, if any. */
export function checkStatus(chain: readonly StatusTrap[], status: number): void {
  const trap = chain.find((t) => t.code === status);
  if (trap) {
    throw new trap.spec.error();
  }
}
