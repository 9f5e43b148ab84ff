import { promises as fs } from "fs";
import type { PipelineConfig } from "../config/config.js";
import { toJsonObject } from "../core/canonicalJson.js";
import { errorMessage, isPipelineError } from "../core/errors.js";
import { newTaskRunId, type RunId, type TaskRunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { PipelineWorkspace } from "../execution/workspace.js";
import type { ExecutionResult } from "../execution/backends/types.js";
import type { Task } from "../graph/task.js";
import type { Logger } from "../logging/logger.js";
import type { SchedulerObserver } from "../scheduler/scheduler.js";
import type { TaskOutcome } from "../scheduler/softFailure.js";
import type { PostgresStore } from "../store/postgresStore.js";

export class PipelineRun implements SchedulerObserver {
  readonly runId: RunId;
  private readonly logLines: string[] = [];
  private readonly taskRuns = new Map<string, TaskRunId>();

  constructor(
    private readonly deps: {
      store: PostgresStore;
      workspace: PipelineWorkspace;
      logger: Logger;
    },
    private readonly info: {
      runId: RunId;
      config: PipelineConfig;
    }
  ) {
    this.runId = info.runId;
  }

  get logPath(): string {
    return this.deps.workspace.logPath(`${this.runId}.ndjson`);
  }

  async start(): Promise<void> {
    await this.deps.store.createPipelineRun({
      runId: this.runId,
      configHash: this.info.config.configHash,
      outputDir: this.deps.workspace.rootDir,
      configSnapshot: toJsonObject(this.info.config)
    });
    await this.event("run.started", `output=${this.deps.workspace.rootDir}`, {
      config_hash: this.info.config.configHash,
      read_mode: this.info.config.readInputMode,
      backend: this.info.config.execution.backend
    });
  }

  async event(kind: string, message: string, data: JsonObject | null, taskId: string | null = null): Promise<void> {
    const line = JSON.stringify({ ts: new Date().toISOString(), kind, task: taskId, message, data });
    this.logLines.push(line);
    this.deps.logger.debug(`${kind}: ${message}`, data ?? undefined);
    await this.deps.store.addRunEvent(this.runId, taskId, kind, message, data);
  }

  async taskSkipped(task: Task): Promise<void> {
    this.deps.logger.info(`skip ${task.id} (markers present)`);
    await this.event("task.skipped", "markers present", null, task.id);
  }

  async taskStarted(task: Task, threads: number): Promise<void> {
    const taskRunId = newTaskRunId();
    this.taskRuns.set(task.id, taskRunId);
    await this.deps.store.createTaskRun({
      taskRunId,
      runId: this.runId,
      taskId: task.id,
      failurePolicy: task.failurePolicy,
      groupTag: task.group,
      threads,
      startedAt: new Date().toISOString()
    });
    this.deps.logger.info(`start ${task.id}`, { threads, ...(task.group ? { group: task.group } : {}) });
    await this.event("task.started", `threads=${threads}`, { threads, group: task.group }, task.id);
  }

  async taskFinished(task: Task, result: ExecutionResult, outcome: TaskOutcome): Promise<void> {
    const taskRunId = this.taskRuns.get(task.id);
    if (taskRunId) {
      await this.deps.store.updateTaskRun(taskRunId, {
        status: outcome.degraded ? "degraded" : "done",
        exitCode: result.exitCode,
        stdoutPath: result.stdoutPath,
        stderrPath: result.stderrPath,
        finishedAt: result.finishedAt
      });
    }
    if (outcome.degraded) {
      await this.event("task.degraded", `exit=${result.exitCode}`, { exit_code: result.exitCode, stderr_path: result.stderrPath }, task.id);
    } else {
      this.deps.logger.info(`done ${task.id}`);
      await this.event("task.done", "exit=0", null, task.id);
    }
  }

  async taskFailed(task: Task, error: unknown, result: ExecutionResult | null): Promise<void> {
    const message = errorMessage(error);
    const taskRunId = this.taskRuns.get(task.id);
    if (taskRunId) {
      await this.deps.store.updateTaskRun(taskRunId, {
        status: "failed",
        exitCode: result?.exitCode ?? null,
        stdoutPath: result?.stdoutPath ?? null,
        stderrPath: result?.stderrPath ?? null,
        finishedAt: result?.finishedAt ?? new Date().toISOString()
      });
    }
    this.deps.logger.error(`failed ${task.id}`, { error: message });
    await this.event("task.failed", message, isPipelineError(error) ? error.data : null, task.id);
  }

  async finishSuccess(summary: JsonObject, message: string): Promise<void> {
    await this.finish("succeeded", null, message, summary);
  }

  async finishFailure(error: unknown): Promise<void> {
    const message = errorMessage(error);
    await this.finish("failed", message, `failed: ${message}`, null);
  }

  private async finish(
    status: "succeeded" | "failed",
    error: string | null,
    finalMessage: string,
    summary: JsonObject | null
  ): Promise<void> {
    await this.event(`run.${status}`, finalMessage, error ? { error } : null);
    await fs.writeFile(this.logPath, this.logLines.join("\n") + "\n", "utf8");
    await this.deps.store.updatePipelineRun(this.runId, {
      status,
      finishedAt: new Date().toISOString(),
      error,
      summary
    });
  }
}
