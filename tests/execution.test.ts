import { describe, it, expect } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { parseConfig } from "../src/config/config.js";
import { ErrorCode } from "../src/core/errors.js";
import { buildDockerArgs } from "../src/execution/backends/dockerRunner.js";
import { LocalProcessRunner } from "../src/execution/backends/localProcess.js";
import { EXIT_NOT_STARTED } from "../src/execution/backends/spawnToFiles.js";
import type { DockerSpec, ExecutionResources, ExecutionResult, RunnerBackend } from "../src/execution/backends/types.js";
import { renderArgs } from "../src/execution/invocation.js";
import { DefaultTaskExecutor, type InternalStageHandler } from "../src/execution/taskExecutor.js";
import { createPipelineWorkspace } from "../src/execution/workspace.js";
import { normalizeTask, type ExternalInvocation, type TaskDeclaration } from "../src/graph/task.js";
import { silentLogger } from "../src/logging/logger.js";

const ctx = { threads: 6, resolve: (ref: string) => path.join("/out", ref) };

function external(args: string[], extra: Partial<TaskDeclaration> = {}) {
  const invocation: ExternalInvocation = { kind: "external", program: "tool", args };
  return { task: normalizeTask({ id: "t", inputs: ["in.fa", "cov.tsv"], outputs: ["bins.tsv"], outputDirs: ["bins"], invocation, ...extra }, 0), invocation };
}

describe("renderArgs", () => {
  it("substitutes thread, path and param tokens", () => {
    const { task, invocation } = external(
      ["-t", "{threads}", "-i", "{input.0}", "-a", "{input.1}", "-o", "{outdir.0}/bin", "--map", "{output.0}", "-m", "{param.min}"],
      { params: { min: 1500 } }
    );
    expect(renderArgs(task, invocation, ctx)).toEqual([
      "tool",
      "-t", "6",
      "-i", "/out/in.fa",
      "-a", "/out/cov.tsv",
      "-o", "/out/bins/bin",
      "--map", "/out/bins.tsv",
      "-m", "1500"
    ]);
  });

  it("expands list params into separate arguments and drops null params", () => {
    const { task, invocation } = external(["-1", "{param.reads}", "{param.extra}", "--flag"], {
      params: { reads: ["a.fq", "b.fq"], extra: null }
    });
    expect(renderArgs(task, invocation, ctx)).toEqual(["tool", "-1", "a.fq", "b.fq", "--flag"]);
  });

  it("rejects unknown tokens and missing references", () => {
    const unknown = external(["{cores}"]);
    expect(() => renderArgs(unknown.task, unknown.invocation, ctx)).toThrow(
      "ConfigError: task t uses unknown token {cores}"
    );
    const missing = external(["{input.5}"]);
    expect(() => renderArgs(missing.task, missing.invocation, ctx)).toThrow("ConfigError: task t references missing input.5");
    const param = external(["{param.nope}"]);
    expect(() => renderArgs(param.task, param.invocation, ctx)).toThrow("ConfigError: task t references unknown param nope");
  });
});

describe("buildDockerArgs", () => {
  it("builds a network-isolated run with thread limits and mounts", () => {
    const spec: DockerSpec = {
      kind: "docker",
      image: "quay.io/example/metabat2:2.17",
      argv: ["metabat2", "-t", "2"],
      workdir: "/out",
      mounts: [
        { hostPath: "/out", containerPath: "/out", readOnly: false },
        { hostPath: "/raw", containerPath: "/raw", readOnly: true }
      ],
      containerName: "binflow_out_metabat2",
      stdoutPath: "/out/logs/metabat2.stdout.log",
      stderrPath: "/out/logs/metabat2.stderr.log"
    };
    expect(buildDockerArgs(spec, { threads: 2 })).toEqual([
      "run", "--rm",
      "--name", "binflow_out_metabat2",
      "--network", "none",
      "--cpus", "2",
      "--env", "OMP_NUM_THREADS=2",
      "--env", "OPENBLAS_NUM_THREADS=2",
      "--env", "MKL_NUM_THREADS=2",
      "--env", "NUMEXPR_NUM_THREADS=2",
      "--volume", "/out:/out:rw",
      "--volume", "/raw:/raw:ro",
      "--workdir", "/out",
      "quay.io/example/metabat2:2.17",
      "metabat2", "-t", "2"
    ]);
  });
});

describe("LocalProcessRunner", () => {
  it("streams output to log files and reports the exit code", async () => {
    const tmpDir = await mkdtemp(path.join(os.tmpdir(), "binflow-local-"));
    try {
      const runner = new LocalProcessRunner();
      const result = await runner.execute(
        {
          kind: "local_process",
          argv: [process.execPath, "-e", "console.log(process.env.OMP_NUM_THREADS); console.error('warn'); process.exitCode = 3"],
          stdoutPath: path.join(tmpDir, "logs/t.stdout.log"),
          stderrPath: path.join(tmpDir, "logs/t.stderr.log")
        },
        { threads: 3 }
      );
      expect(result.exitCode).toBe(3);
      expect(await readFile(result.stdoutPath, "utf8")).toBe("3\n");
      expect(await readFile(result.stderrPath, "utf8")).toBe("warn\n");
    } finally {
      await rm(tmpDir, { recursive: true, force: true });
    }
  });

  it("reports a program that cannot be started with exit code 127", async () => {
    const tmpDir = await mkdtemp(path.join(os.tmpdir(), "binflow-local-"));
    try {
      const result = await new LocalProcessRunner().execute(
        {
          kind: "local_process",
          argv: ["binflow-test-no-such-program"],
          stdoutPath: path.join(tmpDir, "out.log"),
          stderrPath: path.join(tmpDir, "err.log")
        },
        { threads: 1 }
      );
      expect(result.exitCode).toBe(EXIT_NOT_STARTED);
      expect(await readFile(result.stderrPath, "utf8")).toContain("failed to start binflow-test-no-such-program");
    } finally {
      await rm(tmpDir, { recursive: true, force: true });
    }
  });
});

class CapturingDocker implements RunnerBackend<"docker"> {
  readonly kind = "docker" as const;
  readonly specs: DockerSpec[] = [];
  async execute(spec: DockerSpec, _resources: ExecutionResources): Promise<ExecutionResult> {
    this.specs.push(spec);
    return { exitCode: 0, stdoutPath: spec.stdoutPath, stderrPath: spec.stderrPath, startedAt: "", finishedAt: "" };
  }
}

describe("DefaultTaskExecutor", () => {
  it("routes external tasks to docker with the configured image and mounts", async () => {
    const tmpDir = await mkdtemp(path.join(os.tmpdir(), "binflow-exec-"));
    try {
      const config = parseConfig(
        { long_reads: "/raw/reads.fq", output: tmpDir, execution: { backend: "docker", docker: { images: { coverm: "quay.io/example/coverm:0.7" } } } },
        { baseDir: tmpDir }
      );
      const workspace = await createPipelineWorkspace(tmpDir);
      const docker = new CapturingDocker();
      const executor = new DefaultTaskExecutor({ config, workspace, logger: silentLogger, docker });

      const task = normalizeTask(
        {
          id: "coverage_long",
          inputs: ["/raw/reads.fq"],
          outputs: ["data/coverm.cov"],
          invocation: { kind: "external", program: "coverm", args: ["--single", "{input.0}", "-o", "{output.0}"] }
        },
        0
      );
      await executor.execute(task, { threads: 2 });

      const spec = docker.specs[0];
      expect(spec?.image).toBe("quay.io/example/coverm:0.7");
      expect(spec?.argv).toEqual(["coverm", "--single", "/raw/reads.fq", "-o", path.join(tmpDir, "data/coverm.cov")]);
      expect(spec?.network).toBe("none");
      expect(spec?.mounts).toEqual([
        { hostPath: workspace.rootDir, containerPath: workspace.rootDir, readOnly: false },
        { hostPath: "/raw", containerPath: "/raw", readOnly: true }
      ]);
      expect(spec?.stderrPath).toBe(path.join(workspace.logsDir, "coverage_long.stderr.log"));

      const unknown = normalizeTask(
        { id: "x", inputs: [], outputs: ["x.out"], invocation: { kind: "external", program: "vamb", args: [] } },
        1
      );
      await expect(executor.execute(unknown, { threads: 1 })).rejects.toMatchObject({ code: ErrorCode.ConfigError });
    } finally {
      await rm(tmpDir, { recursive: true, force: true });
    }
  });

  it("runs internal stages in process and turns a thrown error into exit code 1", async () => {
    const tmpDir = await mkdtemp(path.join(os.tmpdir(), "binflow-exec-"));
    try {
      const config = parseConfig({ long_reads: "/raw/reads.fq", output: tmpDir }, { baseDir: tmpDir });
      const workspace = await createPipelineWorkspace(tmpDir);
      const seen: number[] = [];
      const executor = new DefaultTaskExecutor({
        config,
        workspace,
        logger: silentLogger,
        handlers: new Map<string, InternalStageHandler>([
          [
            "ok",
            async ({ threads }) => {
              seen.push(threads);
            }
          ],
          [
            "boom",
            async () => {
              throw new Error("no bins to refine");
            }
          ]
        ])
      });

      const stage = (id: string, handler: string) =>
        normalizeTask({ id, inputs: [], outputs: [`${id}.out`], invocation: { kind: "internal", handler } }, 0);

      expect((await executor.execute(stage("a", "ok"), { threads: 4 })).exitCode).toBe(0);
      expect(seen).toEqual([4]);

      const failed = await executor.execute(stage("b", "boom"), { threads: 1 });
      expect(failed.exitCode).toBe(1);
      expect(await readFile(failed.stderrPath, "utf8")).toBe("no bins to refine\n");

      await expect(executor.execute(stage("c", "missing"), { threads: 1 })).rejects.toMatchObject({
        code: ErrorCode.ConfigError
      });
    } finally {
      await rm(tmpDir, { recursive: true, force: true });
    }
  });
});
