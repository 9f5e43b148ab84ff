import type { DockerSpec, ExecutionResources, ExecutionResult, RunnerBackend } from "./types.js";
import { threadEnv } from "./types.js";
import { spawnToFiles } from "./spawnToFiles.js";

export function buildDockerArgs(spec: DockerSpec, resources: ExecutionResources): string[] {
  if (!spec.image) throw new Error("docker image must be non-empty");
  if (!spec.argv.length) throw new Error("docker argv must be non-empty");

  const args: string[] = ["run", "--rm"];

  if (spec.containerName) {
    args.push("--name", spec.containerName);
  }

  args.push("--network", spec.network ?? "none");
  args.push("--cpus", String(resources.threads));

  for (const [k, v] of Object.entries({ ...threadEnv(resources.threads), ...spec.env })) {
    args.push("--env", `${k}=${v}`);
  }

  for (const m of spec.mounts ?? []) {
    const mode = m.readOnly ? "ro" : "rw";
    args.push("--volume", `${m.hostPath}:${m.containerPath}:${mode}`);
  }

  if (spec.user) {
    args.push("--user", spec.user);
  }

  if (spec.workdir) {
    args.push("--workdir", spec.workdir);
  }

  args.push(spec.image, ...spec.argv);
  return args;
}

export class DockerRunner implements RunnerBackend<"docker"> {
  readonly kind = "docker" as const;

  async execute(spec: DockerSpec, resources: ExecutionResources): Promise<ExecutionResult> {
    const args = buildDockerArgs(spec, resources);
    const startedAt = new Date().toISOString();
    const exitCode = await spawnToFiles("docker", args, {}, spec.stdoutPath, spec.stderrPath);
    const finishedAt = new Date().toISOString();
    return { exitCode, stdoutPath: spec.stdoutPath, stderrPath: spec.stderrPath, startedAt, finishedAt };
  }
}
