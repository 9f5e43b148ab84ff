import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;

export interface PipelineRunsTable {
  run_id: string;
  config_hash: string;
  output_dir: string;
  status: string;
  created_at: Generated<string>;
  started_at: OptionalNullable<string>;
  finished_at: OptionalNullable<string>;
  config_snapshot: Json;
  summary: JsonNullable;
  error: OptionalNullable<string>;
}

export interface TaskRunsTable {
  task_run_id: string;
  run_id: string;
  task_id: string;
  status: string;
  failure_policy: string;
  group_tag: OptionalNullable<string>;
  threads: number;
  exit_code: ColumnType<number | null, number | null | undefined, number | null>;
  stdout_path: OptionalNullable<string>;
  stderr_path: OptionalNullable<string>;
  created_at: Generated<string>;
  started_at: OptionalNullable<string>;
  finished_at: OptionalNullable<string>;
}

export interface RunEventsTable {
  event_id: string;
  run_id: string;
  task_id: OptionalNullable<string>;
  ts: Generated<string>;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface DB {
  pipeline_runs: PipelineRunsTable;
  task_runs: TaskRunsTable;
  run_events: RunEventsTable;
}
