import { promises as fs } from "fs";
import path from "path";
import type { PipelineConfig } from "../config/config.js";
import { ErrorCode, PipelineError, errorMessage } from "../core/errors.js";
import { normalizeTask, type Task, type TaskDeclaration } from "../graph/task.js";
import type { Logger } from "../logging/logger.js";
import { DockerRunner } from "./backends/dockerRunner.js";
import { LocalProcessRunner } from "./backends/localProcess.js";
import type { DockerMount, ExecutionResult, RunnerBackend } from "./backends/types.js";
import { renderArgs } from "./invocation.js";
import type { PipelineWorkspace } from "./workspace.js";

export interface TaskAllocation {
  threads: number;
}

export interface TaskExecutor {
  execute(task: Task, allocation: TaskAllocation): Promise<ExecutionResult>;
}

export interface InternalStageContext {
  task: Task;
  threads: number;
  workspace: PipelineWorkspace;
  logger: Logger;
  // Runs an external step on the task's thread allocation, through the configured backend.
  run(step: TaskDeclaration): Promise<ExecutionResult>;
}

export type InternalStageHandler = (ctx: InternalStageContext) => Promise<void>;

function logName(taskId: string, stream: "stdout" | "stderr"): string {
  return `${taskId.replace(/[^A-Za-z0-9._-]+/g, "_")}.${stream}.log`;
}

export class DefaultTaskExecutor implements TaskExecutor {
  private readonly local: RunnerBackend<"local_process">;
  private readonly docker: RunnerBackend<"docker">;

  constructor(
    private readonly deps: {
      config: PipelineConfig;
      workspace: PipelineWorkspace;
      logger: Logger;
      handlers?: ReadonlyMap<string, InternalStageHandler>;
      local?: RunnerBackend<"local_process">;
      docker?: RunnerBackend<"docker">;
    }
  ) {
    this.local = deps.local ?? new LocalProcessRunner();
    this.docker = deps.docker ?? new DockerRunner();
  }

  async execute(task: Task, allocation: TaskAllocation): Promise<ExecutionResult> {
    const stdoutPath = this.deps.workspace.logPath(logName(task.id, "stdout"));
    const stderrPath = this.deps.workspace.logPath(logName(task.id, "stderr"));
    await this.prepareOutputs(task);

    if (task.invocation.kind === "internal") {
      return this.executeInternal(task, task.invocation.handler, allocation, stdoutPath, stderrPath);
    }

    const argv = renderArgs(task, task.invocation, {
      threads: allocation.threads,
      resolve: (ref) => this.deps.workspace.resolve(ref)
    });

    if (this.deps.config.execution.backend === "docker") {
      const imageKey = task.invocation.image ?? task.invocation.program;
      const image = this.deps.config.execution.docker.images[imageKey];
      if (!image) {
        throw new PipelineError(ErrorCode.ConfigError, `no docker image configured for ${imageKey} (task ${task.id})`);
      }
      return this.docker.execute(
        {
          kind: "docker",
          image,
          argv,
          workdir: this.deps.workspace.rootDir,
          network: this.deps.config.execution.docker.networkMode,
          mounts: this.mountsFor(task),
          containerName: `binflow_${path.basename(this.deps.workspace.rootDir)}_${task.id}`.replace(/[^A-Za-z0-9_.-]+/g, "_"),
          stdoutPath,
          stderrPath
        },
        allocation
      );
    }

    return this.local.execute({ kind: "local_process", argv, cwd: this.deps.workspace.rootDir, stdoutPath, stderrPath }, allocation);
  }

  // Tools expect the parent directories of their outputs to exist.
  private async prepareOutputs(task: Task): Promise<void> {
    const dirs = new Set<string>();
    for (const dir of task.outputDirs) dirs.add(this.deps.workspace.resolve(dir));
    for (const output of task.outputs) dirs.add(path.dirname(this.deps.workspace.resolve(output)));
    for (const dir of dirs) {
      await fs.mkdir(dir, { recursive: true });
    }
  }

  // The output root is mounted read-write at the same path; raw inputs outside it read-only.
  private mountsFor(task: Task): DockerMount[] {
    const root = this.deps.workspace.rootDir;
    const mounts: DockerMount[] = [{ hostPath: root, containerPath: root, readOnly: false }];
    const seen = new Set<string>([root]);
    for (const input of task.inputs) {
      const resolved = this.deps.workspace.resolve(input);
      if (resolved.startsWith(root + path.sep)) continue;
      const dir = path.dirname(resolved);
      if (seen.has(dir)) continue;
      seen.add(dir);
      mounts.push({ hostPath: dir, containerPath: dir, readOnly: true });
    }
    return mounts;
  }

  private async executeInternal(
    task: Task,
    handlerName: string,
    allocation: TaskAllocation,
    stdoutPath: string,
    stderrPath: string
  ): Promise<ExecutionResult> {
    const handler = this.deps.handlers?.get(handlerName);
    if (!handler) {
      throw new PipelineError(ErrorCode.ConfigError, `task ${task.id} names unknown internal stage ${handlerName}`);
    }

    const startedAt = new Date().toISOString();
    let exitCode = 0;
    let stderr = "";
    try {
      await handler({
        task,
        threads: allocation.threads,
        workspace: this.deps.workspace,
        logger: this.deps.logger.child(task.id),
        run: async (step) => {
          if (step.invocation.kind !== "external") {
            throw new PipelineError(ErrorCode.ConfigError, `step ${step.id} of ${task.id} must be an external invocation`);
          }
          return this.execute(normalizeTask(step, task.index), allocation);
        }
      });
    } catch (err) {
      exitCode = 1;
      stderr = `${errorMessage(err)}\n`;
    }
    const finishedAt = new Date().toISOString();

    await fs.writeFile(stdoutPath, "", "utf8");
    await fs.writeFile(stderrPath, stderr, "utf8");
    return { exitCode, stdoutPath, stderrPath, startedAt, finishedAt };
  }
}
