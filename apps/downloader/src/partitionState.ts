// apps/downloader/src/partitionState.ts
import type { PartitionStatus } from "./types.js";

/**
 * Lifecycle of one partition while a download runs.
 *
 *   absent ──begin──▶ fetching ──commit(complete)──▶ complete
 *      ▲                 │  └──commit(partial)───▶ incomplete ──begin──▶ fetching
 *      └─────abort───────┘ (back to where it came from)
 *
 * A complete partition is never fetched again.
 */
export type PartitionState =
  | { kind: "absent" }
  | { kind: "incomplete" }
  | { kind: "complete" }
  | { kind: "fetching"; from: "absent" | "incomplete" };

export type PartitionEvent = { type: "begin" } | { type: "commit"; complete: boolean } | { type: "abort" };

export class IllegalTransitionError extends Error {
  constructor(readonly state: PartitionState, readonly event: PartitionEvent) {
    super(`illegal partition transition ${state.kind} --${event.type}-->`);
    this.name = "IllegalTransitionError";
  }
}

export function fromStatus(status: PartitionStatus): PartitionState {
  return { kind: status };
}

export function transition(state: PartitionState, event: PartitionEvent): PartitionState {
  switch (event.type) {
    case "begin":
      if (state.kind === "absent" || state.kind === "incomplete") return { kind: "fetching", from: state.kind };
      break;
    case "commit":
      if (state.kind === "fetching") return { kind: event.complete ? "complete" : "incomplete" };
      break;
    case "abort":
      if (state.kind === "fetching") return { kind: state.from };
      break;
  }
  throw new IllegalTransitionError(state, event);
}
