import type { Kysely, Selectable } from "kysely";
import { newEventId, type RunId, type TaskRunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type {
  PipelineRunRecord,
  RunEventRecord,
  RunStatus,
  TaskRunRecord,
  TaskRunStatus
} from "../core/run.js";
import type { DB } from "../db/types.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

export class PostgresStore {
  constructor(private readonly db: Kysely<DB>) {}

  async createPipelineRun(input: {
    runId: RunId;
    configHash: `sha256:${string}`;
    outputDir: string;
    configSnapshot: JsonObject;
  }): Promise<PipelineRunRecord> {
    await this.db
      .insertInto("pipeline_runs")
      .values({
        run_id: input.runId,
        config_hash: input.configHash,
        output_dir: input.outputDir,
        status: "running",
        started_at: new Date().toISOString(),
        config_snapshot: input.configSnapshot
      })
      .onConflict((oc) => oc.column("run_id").doNothing())
      .execute();

    const row = await this.db
      .selectFrom("pipeline_runs")
      .selectAll()
      .where("run_id", "=", input.runId)
      .executeTakeFirstOrThrow();

    return this.mapPipelineRun(row);
  }

  async getPipelineRun(runId: RunId): Promise<PipelineRunRecord | null> {
    const row = await this.db.selectFrom("pipeline_runs").selectAll().where("run_id", "=", runId).executeTakeFirst();
    return row ? this.mapPipelineRun(row) : null;
  }

  async updatePipelineRun(
    runId: RunId,
    patch: Partial<Pick<PipelineRunRecord, "status" | "finishedAt" | "summary" | "error">>
  ): Promise<void> {
    const updates: Record<string, unknown> = {};
    if (patch.status) updates.status = patch.status;
    if (patch.finishedAt !== undefined) updates.finished_at = patch.finishedAt;
    if (patch.summary !== undefined) updates.summary = patch.summary;
    if (patch.error !== undefined) updates.error = patch.error;

    if (Object.keys(updates).length === 0) return;

    await this.db.updateTable("pipeline_runs").set(updates).where("run_id", "=", runId).execute();
  }

  async createTaskRun(input: {
    taskRunId: TaskRunId;
    runId: RunId;
    taskId: string;
    failurePolicy: string;
    groupTag: string | null;
    threads: number;
    startedAt: string;
  }): Promise<void> {
    await this.db
      .insertInto("task_runs")
      .values({
        task_run_id: input.taskRunId,
        run_id: input.runId,
        task_id: input.taskId,
        status: "running",
        failure_policy: input.failurePolicy,
        group_tag: input.groupTag,
        threads: input.threads,
        started_at: input.startedAt
      })
      .execute();
  }

  async updateTaskRun(
    taskRunId: TaskRunId,
    patch: Partial<Pick<TaskRunRecord, "status" | "exitCode" | "stdoutPath" | "stderrPath" | "finishedAt">>
  ): Promise<void> {
    const updates: Record<string, unknown> = {};
    if (patch.status) updates.status = patch.status;
    if (patch.exitCode !== undefined) updates.exit_code = patch.exitCode;
    if (patch.stdoutPath !== undefined) updates.stdout_path = patch.stdoutPath;
    if (patch.stderrPath !== undefined) updates.stderr_path = patch.stderrPath;
    if (patch.finishedAt !== undefined) updates.finished_at = patch.finishedAt;

    if (Object.keys(updates).length === 0) return;

    await this.db.updateTable("task_runs").set(updates).where("task_run_id", "=", taskRunId).execute();
  }

  async listTaskRuns(runId: RunId): Promise<TaskRunRecord[]> {
    const rows = await this.db
      .selectFrom("task_runs")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("started_at", "asc")
      .orderBy("task_run_id", "asc")
      .execute();
    return rows.map((row) => this.mapTaskRun(row));
  }

  async addRunEvent(
    runId: RunId,
    taskId: string | null,
    kind: string,
    message: string | null,
    data: JsonObject | null
  ): Promise<void> {
    await this.db
      .insertInto("run_events")
      .values({
        event_id: newEventId(),
        run_id: runId,
        task_id: taskId,
        kind,
        message,
        data: data ?? null
      })
      .execute();
  }

  async listRunEvents(runId: RunId): Promise<RunEventRecord[]> {
    const rows = await this.db
      .selectFrom("run_events")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("event_id", "asc")
      .execute();
    return rows.map((row) => ({
      runId: row.run_id as RunId,
      taskId: row.task_id,
      ts: toIso((row as unknown as { ts: unknown }).ts),
      kind: row.kind,
      message: row.message,
      data: row.data ? (row.data as JsonObject) : null
    }));
  }

  private mapPipelineRun(row: Selectable<DB["pipeline_runs"]>): PipelineRunRecord {
    return {
      runId: row.run_id as RunId,
      configHash: row.config_hash as `sha256:${string}`,
      outputDir: row.output_dir,
      status: row.status as RunStatus,
      createdAt: toIso((row as unknown as { created_at: unknown }).created_at),
      startedAt: toIsoOrNull((row as unknown as { started_at: unknown }).started_at),
      finishedAt: toIsoOrNull((row as unknown as { finished_at: unknown }).finished_at),
      configSnapshot: (row.config_snapshot ?? {}) as JsonObject,
      summary: row.summary ? (row.summary as JsonObject) : null,
      error: row.error
    };
  }

  private mapTaskRun(row: Selectable<DB["task_runs"]>): TaskRunRecord {
    return {
      taskRunId: row.task_run_id as TaskRunId,
      runId: row.run_id as RunId,
      taskId: row.task_id,
      status: row.status as TaskRunStatus,
      failurePolicy: row.failure_policy,
      groupTag: row.group_tag,
      threads: row.threads,
      exitCode: row.exit_code,
      stdoutPath: row.stdout_path,
      stderrPath: row.stderr_path,
      createdAt: toIso((row as unknown as { created_at: unknown }).created_at),
      startedAt: toIsoOrNull((row as unknown as { started_at: unknown }).started_at),
      finishedAt: toIsoOrNull((row as unknown as { finished_at: unknown }).finished_at)
    };
  }
}
