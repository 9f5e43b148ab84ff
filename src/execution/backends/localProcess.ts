import type { ExecutionResources, ExecutionResult, LocalProcessSpec, RunnerBackend } from "./types.js";
import { threadEnv } from "./types.js";
import { spawnToFiles } from "./spawnToFiles.js";

export class LocalProcessRunner implements RunnerBackend<"local_process"> {
  readonly kind = "local_process" as const;

  async execute(spec: LocalProcessSpec, resources: ExecutionResources): Promise<ExecutionResult> {
    const [command, ...args] = spec.argv;
    if (!command) throw new Error("local_process argv must be non-empty");
    const startedAt = new Date().toISOString();

    const exitCode = await spawnToFiles(
      command,
      args,
      { cwd: spec.cwd, env: { ...process.env, ...threadEnv(resources.threads), ...spec.env } },
      spec.stdoutPath,
      spec.stderrPath
    );

    const finishedAt = new Date().toISOString();
    return { exitCode, stdoutPath: spec.stdoutPath, stderrPath: spec.stderrPath, startedAt, finishedAt };
  }
}
