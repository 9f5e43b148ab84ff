import { ErrorCode, PipelineError } from "../core/errors.js";
import type { Task } from "../graph/task.js";
import type { MarkerStore } from "../markers/markerStore.js";
import type { ExecutionResult } from "../execution/backends/types.js";

export interface TaskOutcome {
  exitCode: number;
  // A soft-fail task whose tool exited non-zero: markers exist, outputs may be empty.
  degraded: boolean;
}

export async function applyFailurePolicy(task: Task, result: ExecutionResult, markers: MarkerStore): Promise<TaskOutcome> {
  const failed = result.exitCode !== 0;

  if (failed && task.failurePolicy === "strict") {
    throw new PipelineError(
      ErrorCode.ToolFailure,
      `task ${task.id} exited with code ${result.exitCode} (stderr: ${result.stderrPath})`,
      { task: task.id, exit_code: result.exitCode, stderr_path: result.stderrPath }
    );
  }

  for (const dir of task.outputDirs) {
    await markers.ensureDir(dir);
  }
  for (const output of task.outputs) {
    await markers.write(output);
  }

  return { exitCode: result.exitCode, degraded: failed };
}
