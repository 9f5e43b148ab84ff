import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, writeFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { loadConfigFromFile, parseConfig, validateInputs, PPLACER_THREADS_CAP } from "../src/config/config.js";
import { ErrorCode, isPipelineError } from "../src/core/errors.js";

const base = "/data/run";

function configError(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (isPipelineError(err, ErrorCode.ConfigError)) return err.message;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("parseConfig", () => {
  const savedEnv = { ...process.env };
  afterEach(() => {
    process.env = { ...savedEnv };
  });

  it("applies defaults and resolves relative paths against the base dir", () => {
    const config = parseConfig({ short_reads_1: "r1.fq.gz", short_reads_2: "r2.fq.gz" }, { baseDir: base });

    expect(config.fasta).toBe("/data/run/assembly/final_contigs.fasta");
    expect(config.output).toBe("/data/run");
    expect(config.shortReads1).toEqual(["/data/run/r1.fq.gz"]);
    expect(config.readInputMode).toBe("paired");
    expect(config.minContigSize).toBe(1500);
    expect(config.minBinSize).toBe(200000);
    expect(config.maxThreads).toBe(8);
    expect(config.concurrencyBudget).toBe(16);
    expect(config.consensus).toEqual({ scoreThreshold: -42, penaltyWeight: 1 });
    expect(config.refinement).toEqual({
      maxIterations: 5,
      maxContamination: 10,
      minCompleteness: 70,
      finalRefining: false,
      ani: 0.97,
      preclusterAni: 0.95
    });
    expect(config.execution.backend).toBe("local");
    expect(config.configHash).toMatch(/^sha256:[0-9a-f]{64}$/);
  });

  it("resolves the read-input mode", () => {
    expect(parseConfig({ short_reads_1: "a.fq", short_reads_2: "none" }, { baseDir: base }).readInputMode).toBe("interleaved");
    expect(parseConfig({ long_reads: ["l1.fq", "l2.fq"] }, { baseDir: base }).readInputMode).toBe("single");
    expect(parseConfig({ long_reads: "l.fq", short_reads_1: "a.fq" }, { baseDir: base }).readInputMode).toBe("interleaved");
    expect(parseConfig({}, { baseDir: base }).readInputMode).toBe("none");
  });

  it("returns a frozen value with a stable hash", () => {
    const a = parseConfig({ long_reads: "l.fq", max_threads: 4 }, { baseDir: base });
    const b = parseConfig({ max_threads: 4, long_reads: "l.fq" }, { baseDir: base });
    expect(Object.isFrozen(a)).toBe(true);
    expect(Object.isFrozen(a.refinement)).toBe(true);
    expect(a.configHash).toBe(b.configHash);
    expect(parseConfig({ long_reads: "l.fq", max_threads: 2 }, { baseDir: base }).configHash).not.toBe(a.configHash);
  });

  it("caps pplacer threads", () => {
    expect(parseConfig({ pplacer_threads: 96 }, { baseDir: base }).pplacerThreads).toBe(PPLACER_THREADS_CAP);
  });

  it("expands environment tokens in paths", () => {
    process.env.BINFLOW_TEST_READS = "/reads/sample.fq";
    process.env.BINFLOW_TEST_DB = "/refs/checkm2.dmnd";
    const config = parseConfig({ long_reads: "${BINFLOW_TEST_READS}", checkm2_db: "$BINFLOW_TEST_DB" }, { baseDir: base });
    expect(config.longReads).toEqual(["/reads/sample.fq"]);
    expect(config.checkm2Db).toBe("/refs/checkm2.dmnd");

    delete process.env.BINFLOW_TEST_DB;
    expect(parseConfig({ checkm2_db: "${BINFLOW_TEST_DB}" }, { baseDir: base }).checkm2Db).toBeNull();
  });

  it("rejects a read path whose environment variable is unset instead of changing the read mode", () => {
    delete process.env.BINFLOW_TEST_R2;
    expect(configError(() => parseConfig({ short_reads_1: "r1.fq", short_reads_2: "${BINFLOW_TEST_R2}" }, { baseDir: base }))).toBe(
      "ConfigError: short_reads_2: ${BINFLOW_TEST_R2} is unset or empty"
    );
    process.env.BINFLOW_TEST_R2 = "  ";
    expect(configError(() => parseConfig({ long_reads: ["l.fq", "$BINFLOW_TEST_R2"] }, { baseDir: base }))).toBe(
      "ConfigError: long_reads: $BINFLOW_TEST_R2 is unset or empty"
    );
  });

  it("rejects inconsistent settings", () => {
    expect(configError(() => parseConfig({ short_reads_2: "b.fq" }, { baseDir: base }))).toBe(
      "ConfigError: short_reads_2 is set but short_reads_1 is not"
    );
    expect(configError(() => parseConfig({ short_reads_1: ["a.fq", "c.fq"], short_reads_2: "b.fq" }, { baseDir: base }))).toBe(
      "ConfigError: short_reads_1 and short_reads_2 must list the same number of files (2 vs 1)"
    );
    expect(configError(() => parseConfig({ n_cores: 4, max_threads: 8 }, { baseDir: base }))).toBe(
      "ConfigError: n_cores=4 must be >= max_threads=8"
    );
    expect(configError(() => parseConfig({ long_read_type: "nanopore" }, { baseDir: base }))).toContain("long_read_type");
    expect(configError(() => parseConfig({ ani: 1.5 }, { baseDir: base }))).toContain("ani");
  });
});

describe("loadConfigFromFile", () => {
  it("reads YAML and rejects malformed files", async () => {
    const tmpDir = await mkdtemp(path.join(os.tmpdir(), "binflow-config-"));
    try {
      const good = path.join(tmpDir, "run.yaml");
      await writeFile(
        good,
        ["long_reads: reads.fq", "max_threads: 2", "n_cores: 4", "execution:", "  backend: docker", "  docker:", "    images:", "      coverm: quay.io/example/coverm:1"].join("\n"),
        "utf8"
      );
      const config = await loadConfigFromFile(good, { baseDir: tmpDir });
      expect(config.longReads).toEqual([path.join(tmpDir, "reads.fq")]);
      expect(config.concurrencyBudget).toBe(4);
      expect(config.execution.backend).toBe("docker");
      expect(config.execution.docker.networkMode).toBe("none");
      expect(config.execution.docker.images).toEqual({ coverm: "quay.io/example/coverm:1" });

      const bad = path.join(tmpDir, "bad.yaml");
      await writeFile(bad, "max_threads: [1,\n", "utf8");
      await expect(loadConfigFromFile(bad)).rejects.toMatchObject({ code: ErrorCode.ConfigError });
    } finally {
      await rm(tmpDir, { recursive: true, force: true });
    }
  });
});

describe("validateInputs", () => {
  const present = new Set(["/data/run/assembly/final_contigs.fasta", "/data/run/r1.fq", "/refs/gtdb"]);
  const exists = async (p: string) => present.has(p);

  it("fails when no reads are configured", async () => {
    const config = parseConfig({}, { baseDir: base });
    await expect(validateInputs(config, { exists, warn: () => undefined })).rejects.toMatchObject({
      code: ErrorCode.ConfigError
    });
  });

  it("fails listing every missing required path", async () => {
    const config = parseConfig({ short_reads_1: "r1.fq", short_reads_2: "r2.fq" }, { baseDir: base });
    await expect(validateInputs(config, { exists, warn: () => undefined })).rejects.toThrow(
      "ConfigError: required input path(s) do not exist: /data/run/r2.fq"
    );
  });

  it("only warns about reference folders", async () => {
    const warnings: string[] = [];
    const config = parseConfig({ short_reads_1: "r1.fq", gtdbtk_folder: "/refs/gtdb", busco_folder: "/refs/busco" }, { baseDir: base });
    await validateInputs(config, { exists, warn: (message) => warnings.push(message) });
    expect(warnings).toEqual(["busco_folder does not exist: /refs/busco"]);
  });
});
