import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import { ErrorCode, PipelineError } from "../core/errors.js";
import type { LogLevel } from "../logging/logger.js";

export const PPLACER_THREADS_CAP = 48;

export type ReadInputMode = "paired" | "interleaved" | "single" | "none";
export type ExecutionBackendKind = "local" | "docker";

const zReads = z.union([z.string(), z.array(z.string())]);
const zOptionalPath = z.string().nullable();

export const zPipelineConfigFile = z.object({
  fasta: z.string().min(1).default("assembly/final_contigs.fasta"),
  long_reads: zReads.default("none"),
  short_reads_1: zReads.default("none"),
  short_reads_2: zReads.default("none"),
  long_read_type: z.enum(["ont", "ont_hq", "rs", "sq", "ccs"]).default("ont"),
  output: z.string().min(1).default("./"),
  min_contig_size: z.number().int().min(0).default(1500),
  min_bin_size: z.number().int().min(0).default(200000),
  max_threads: z.number().int().min(1).default(8),
  n_cores: z.number().int().min(1).default(16),
  pplacer_threads: z.number().int().min(1).default(8),
  gtdbtk_folder: zOptionalPath.default(null),
  busco_folder: zOptionalPath.default(null),
  checkm2_db: zOptionalPath.default(null),
  score_threshold: z.number().default(-42),
  penalty_weight: z.number().min(0).default(1),
  max_iterations: z.number().int().min(0).default(5),
  max_contamination: z.number().min(0).max(100).default(10),
  min_completeness: z.number().min(0).max(100).default(70),
  ani: z.number().gt(0).max(1).default(0.97),
  precluster_ani: z.number().gt(0).max(1).default(0.95),
  final_refining: z.boolean().default(false),
  dry_run: z.boolean().default(false),
  rerun: z.array(z.string().min(1)).default([]),
  log_level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  execution: z
    .object({
      backend: z.enum(["local", "docker"]).default("local"),
      docker: z
        .object({
          network_mode: z.enum(["none", "bridge"]).default("none"),
          images: z.record(z.string(), z.string().min(1)).default({})
        })
        .default({ network_mode: "none", images: {} })
    })
    .default({ backend: "local", docker: { network_mode: "none", images: {} } })
});

export type PipelineConfigFile = z.input<typeof zPipelineConfigFile>;

export interface PipelineConfig {
  readonly fasta: string;
  readonly longReads: readonly string[];
  readonly shortReads1: readonly string[];
  readonly shortReads2: readonly string[];
  readonly longReadType: "ont" | "ont_hq" | "rs" | "sq" | "ccs";
  readonly readInputMode: ReadInputMode;
  readonly output: string;
  readonly minContigSize: number;
  readonly minBinSize: number;
  readonly maxThreads: number;
  readonly concurrencyBudget: number;
  readonly pplacerThreads: number;
  readonly gtdbtkFolder: string | null;
  readonly buscoFolder: string | null;
  readonly checkm2Db: string | null;
  readonly consensus: {
    readonly scoreThreshold: number;
    readonly penaltyWeight: number;
  };
  readonly refinement: {
    readonly maxIterations: number;
    readonly maxContamination: number;
    readonly minCompleteness: number;
    readonly finalRefining: boolean;
    readonly ani: number;
    readonly preclusterAni: number;
  };
  readonly dryRun: boolean;
  readonly rerun: readonly string[];
  readonly logLevel: LogLevel;
  readonly execution: {
    readonly backend: ExecutionBackendKind;
    readonly docker: {
      readonly networkMode: "none" | "bridge";
      readonly images: Readonly<Record<string, string>>;
    };
  };
  readonly configHash: `sha256:${string}`;
}

function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();

  const m1 = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed);
  if (m1) {
    const varName = m1[1];
    if (!varName) return null;
    const v = process.env[varName]?.trim();
    return v ? v : null;
  }

  const m2 = /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (m2) {
    const varName = m2[1];
    if (!varName) return null;
    const v = process.env[varName]?.trim();
    return v ? v : null;
  }

  return value;
}

// A read path whose environment token expands to nothing is an error, not an absent input.
function normalizeReads(key: string, value: string | string[]): string[] {
  const list = Array.isArray(value) ? value : [value];
  const out: string[] = [];
  for (const v of list) {
    const expanded = expandEnvToken(v);
    if (expanded === null) {
      throw new PipelineError(ErrorCode.ConfigError, `${key}: ${v.trim()} is unset or empty`, { [key]: v });
    }
    const trimmed = expanded.trim();
    if (trimmed.length > 0 && trimmed.toLowerCase() !== "none") out.push(expanded);
  }
  return out;
}

function optionalPath(value: string | null): string | null {
  if (value === null) return null;
  const expanded = expandEnvToken(value);
  if (expanded === null || expanded.trim().length === 0 || expanded.trim().toLowerCase() === "none") return null;
  return expanded;
}

export function resolveReadInputMode(reads: {
  shortReads1: readonly string[];
  shortReads2: readonly string[];
  longReads: readonly string[];
}): ReadInputMode {
  if (reads.shortReads1.length > 0 && reads.shortReads2.length > 0) return "paired";
  if (reads.shortReads1.length > 0) return "interleaved";
  if (reads.longReads.length > 0) return "single";
  return "none";
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

// Relative paths in the file are taken relative to `baseDir` (the working directory by default).
export function parseConfig(raw: unknown, options: { baseDir?: string } = {}): PipelineConfig {
  const baseDir = options.baseDir ?? process.cwd();
  const abs = (p: string): string => path.resolve(baseDir, p);

  const result = zPipelineConfigFile.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new PipelineError(ErrorCode.ConfigError, `invalid config (${issues.join("; ")})`);
  }
  const file = result.data;

  const shortReads1 = normalizeReads("short_reads_1", file.short_reads_1).map(abs);
  const shortReads2 = normalizeReads("short_reads_2", file.short_reads_2).map(abs);
  const longReads = normalizeReads("long_reads", file.long_reads).map(abs);

  if (shortReads2.length > 0 && shortReads1.length === 0) {
    throw new PipelineError(ErrorCode.ConfigError, "short_reads_2 is set but short_reads_1 is not");
  }
  if (shortReads2.length > 0 && shortReads2.length !== shortReads1.length) {
    throw new PipelineError(
      ErrorCode.ConfigError,
      `short_reads_1 and short_reads_2 must list the same number of files (${shortReads1.length} vs ${shortReads2.length})`
    );
  }
  if (file.n_cores < file.max_threads) {
    throw new PipelineError(
      ErrorCode.ConfigError,
      `n_cores=${file.n_cores} must be >= max_threads=${file.max_threads}`
    );
  }

  const fasta = expandEnvToken(file.fasta);
  if (!fasta) {
    throw new PipelineError(ErrorCode.ConfigError, `fasta resolved to an empty path (${file.fasta})`);
  }

  const optionalAbs = (value: string | null): string | null => {
    const resolved = optionalPath(value);
    return resolved === null ? null : abs(resolved);
  };

  const body = {
    fasta: abs(fasta),
    longReads,
    shortReads1,
    shortReads2,
    longReadType: file.long_read_type,
    readInputMode: resolveReadInputMode({ shortReads1, shortReads2, longReads }),
    output: abs(file.output),
    minContigSize: file.min_contig_size,
    minBinSize: file.min_bin_size,
    maxThreads: file.max_threads,
    concurrencyBudget: file.n_cores,
    pplacerThreads: Math.min(file.pplacer_threads, PPLACER_THREADS_CAP),
    gtdbtkFolder: optionalAbs(file.gtdbtk_folder),
    buscoFolder: optionalAbs(file.busco_folder),
    checkm2Db: optionalAbs(file.checkm2_db),
    consensus: {
      scoreThreshold: file.score_threshold,
      penaltyWeight: file.penalty_weight
    },
    refinement: {
      maxIterations: file.max_iterations,
      maxContamination: file.max_contamination,
      minCompleteness: file.min_completeness,
      finalRefining: file.final_refining,
      ani: file.ani,
      preclusterAni: file.precluster_ani
    },
    dryRun: file.dry_run,
    rerun: file.rerun,
    logLevel: file.log_level,
    execution: {
      backend: file.execution.backend,
      docker: {
        networkMode: file.execution.docker.network_mode,
        images: file.execution.docker.images
      }
    }
  };

  return deepFreeze({ ...body, configHash: sha256Prefixed(stableJsonStringify(body)) });
}

export async function loadConfigFromFile(filePath: string, options: { baseDir?: string } = {}): Promise<PipelineConfig> {
  const raw = await fs.readFile(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw) as unknown;
  } catch (err) {
    throw new PipelineError(
      ErrorCode.ConfigError,
      `invalid YAML at ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseConfig(parsed, options);
}

export function rawInputPaths(config: PipelineConfig): string[] {
  return [config.fasta, ...config.shortReads1, ...config.shortReads2, ...config.longReads];
}

export interface InputCheckDeps {
  exists(targetPath: string): Promise<boolean>;
  warn(message: string, context?: Record<string, unknown>): void;
}

export async function validateInputs(config: PipelineConfig, deps: InputCheckDeps): Promise<void> {
  if (config.readInputMode === "none") {
    throw new PipelineError(
      ErrorCode.ConfigError,
      "no read input configured: set long_reads and/or short_reads_1 (short_reads_2 for paired reads)"
    );
  }

  const missing: string[] = [];
  for (const p of rawInputPaths(config)) {
    if (!(await deps.exists(p))) missing.push(p);
  }
  if (missing.length) {
    throw new PipelineError(ErrorCode.ConfigError, `required input path(s) do not exist: ${missing.join(", ")}`, {
      missing
    });
  }

  const optional: Array<[string, string | null]> = [
    ["gtdbtk_folder", config.gtdbtkFolder],
    ["busco_folder", config.buscoFolder]
  ];
  for (const [key, value] of optional) {
    if (value === null) {
      deps.warn(`${key} is not set; steps that need it will be skipped or fail softly`);
    } else if (!(await deps.exists(value))) {
      deps.warn(`${key} does not exist: ${value}`, { [key]: value });
    }
  }
}
