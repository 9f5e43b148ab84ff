import { monotonicFactory } from "ulid";

// Monotonic so that ids minted within one millisecond still sort in creation order.
const ulid = monotonicFactory();

export type RunId = `run_${string}`;
export type TaskRunId = `trun_${string}`;
export type EventId = `evt_${string}`;

function prefixed(prefix: string): `${string}_${string}` {
  return `${prefix}_${ulid()}` as const;
}

export function newRunId(): RunId {
  return prefixed("run") as RunId;
}

export function newTaskRunId(): TaskRunId {
  return prefixed("trun") as TaskRunId;
}

export function newEventId(): EventId {
  return prefixed("evt") as EventId;
}
