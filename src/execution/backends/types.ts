export interface ExecutionResources {
  threads: number;
}

export interface ExecutionResult {
  exitCode: number;
  stdoutPath: string;
  stderrPath: string;
  startedAt: string;
  finishedAt: string;
}

export interface LocalProcessSpec {
  kind: "local_process";
  argv: string[];
  cwd?: string;
  env?: Record<string, string>;
  stdoutPath: string;
  stderrPath: string;
}

export interface DockerMount {
  hostPath: string;
  containerPath: string;
  readOnly: boolean;
}

export interface DockerSpec {
  kind: "docker";
  image: string;
  argv: string[];
  workdir?: string;
  network?: "none" | "bridge";
  mounts?: DockerMount[];
  env?: Record<string, string>;
  user?: string;
  containerName?: string;
  stdoutPath: string;
  stderrPath: string;
}

export type ExecutionSpec = LocalProcessSpec | DockerSpec;

export interface RunnerBackend<K extends ExecutionSpec["kind"] = ExecutionSpec["kind"]> {
  kind: K;
  execute(spec: Extract<ExecutionSpec, { kind: K }>, resources: ExecutionResources): Promise<ExecutionResult>;
}

export function threadEnv(threads: number): Record<string, string> {
  return {
    OMP_NUM_THREADS: String(threads),
    OPENBLAS_NUM_THREADS: String(threads),
    MKL_NUM_THREADS: String(threads),
    NUMEXPR_NUM_THREADS: String(threads)
  };
}
