import type { RunId, TaskRunId } from "./ids.js";
import type { JsonObject } from "./json.js";

export type RunStatus = "running" | "succeeded" | "failed";

export type TaskRunStatus = "running" | "done" | "degraded" | "failed";

export interface PipelineRunRecord {
  runId: RunId;
  configHash: `sha256:${string}`;
  outputDir: string;
  status: RunStatus;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  configSnapshot: JsonObject;
  summary: JsonObject | null;
  error: string | null;
}

export interface TaskRunRecord {
  taskRunId: TaskRunId;
  runId: RunId;
  taskId: string;
  status: TaskRunStatus;
  failurePolicy: string;
  groupTag: string | null;
  threads: number;
  exitCode: number | null;
  stdoutPath: string | null;
  stderrPath: string | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
}

export interface RunEventRecord {
  runId: RunId;
  taskId: string | null;
  ts: string;
  kind: string;
  message: string | null;
  data: JsonObject | null;
}
