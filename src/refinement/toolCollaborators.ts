import { promises as fs } from "fs";
import { binNameFromPath, readBinFastaDirectory, writeBinFastas } from "../bins/fasta.js";
import { formatQualityTable, parseAniTable, parseQualityTable, type AniPair } from "../bins/tables.js";
import type { Bin, BinQuality, BinSet } from "../bins/types.js";
import { ErrorCode, PipelineError } from "../core/errors.js";
import type { ExecutionResult } from "../execution/backends/types.js";
import type { ExternalInvocation, TaskDeclaration } from "../graph/task.js";
import type { AniEstimator, QualityAssessor, Reassigner, RefinementFeatures } from "./refinementLoop.js";

export interface RefinementCommands {
  // {input.0} bin FASTA directory, {outdir.0} report directory, {output.0} quality report.
  assess: ExternalInvocation;
  // {input.0} assembly, {input.1} FASTA directory of the bins to refine, {input.2} coverage, {input.3} their quality,
  // {outdir.0} directory the refined `.fna` bins are written to, {param.kmer} the k-mer table option or nothing.
  reassign: ExternalInvocation;
  // {param.genomes} bin FASTA files, {output.0} pairwise ANI table.
  ani: ExternalInvocation;
}

export interface ToolContext {
  run(step: TaskDeclaration): Promise<ExecutionResult>;
  resolve(ref: string): string;
  // Output-root-relative directory for the loop's scratch files.
  workDir: string;
  assembly: string;
  commands: RefinementCommands;
}

async function runStep(ctx: ToolContext, step: TaskDeclaration): Promise<void> {
  const result = await ctx.run(step);
  if (result.exitCode !== 0) {
    throw new PipelineError(ErrorCode.ToolFailure, `${step.id} exited with code ${result.exitCode} (stderr: ${result.stderrPath})`, {
      task: step.id,
      exit_code: result.exitCode,
      stderr_path: result.stderrPath
    });
  }
}

// Scratch directories are cleared before each pass; a tool reads every FASTA it finds.
async function resetDir(ctx: ToolContext, ref: string): Promise<void> {
  await fs.rm(ctx.resolve(ref), { recursive: true, force: true });
}

async function readOutput(ctx: ToolContext, ref: string): Promise<string> {
  return fs.readFile(ctx.resolve(ref), "utf8");
}

export class ToolQualityAssessor implements QualityAssessor {
  constructor(private readonly ctx: ToolContext) {}

  async assess(binSet: BinSet, iteration: number): Promise<ReadonlyMap<string, BinQuality>> {
    if (binSet.bins.size === 0) return new Map();
    const dir = `${this.ctx.workDir}/iter_${iteration}`;
    await resetDir(this.ctx, `${dir}/bins`);
    await writeBinFastas(this.ctx.resolve(this.ctx.assembly), binSet, this.ctx.resolve(`${dir}/bins`));

    const report = `${dir}/quality/quality_report.tsv`;
    await runStep(this.ctx, {
      id: `refine_assess_${iteration}`,
      inputs: [`${dir}/bins`],
      outputs: [report],
      outputDirs: [`${dir}/quality`],
      invocation: this.ctx.commands.assess
    });
    return parseQualityTable(await readOutput(this.ctx, report), report);
  }
}

export class ToolReassigner implements Reassigner {
  constructor(private readonly ctx: ToolContext) {}

  async reassign(
    binSet: BinSet,
    overThreshold: readonly string[],
    features: RefinementFeatures,
    iteration: number
  ): Promise<BinSet> {
    if (!features.coveragePath) {
      throw new PipelineError(ErrorCode.ConfigError, "contig reassignment needs a coverage table");
    }
    const dir = `${this.ctx.workDir}/iter_${iteration}/reassign`;
    await resetDir(this.ctx, dir);
    const targets = new Set(overThreshold);
    const kept = new Map<string, Bin>();
    const selected = new Map<string, Bin>();
    for (const bin of binSet.bins.values()) (targets.has(bin.name) ? selected : kept).set(bin.name, bin);
    const toRefine: BinSet = { bins: selected, quality: binSet.quality };

    await writeBinFastas(this.ctx.resolve(this.ctx.assembly), toRefine, this.ctx.resolve(`${dir}/bins`));
    const quality = `${dir}/quality.tsv`;
    await fs.writeFile(this.ctx.resolve(quality), formatQualityTable(toRefine), "utf8");

    const refinedDir = `${dir}/refined`;
    await runStep(this.ctx, {
      id: `refine_reassign_${iteration}`,
      inputs: [this.ctx.assembly, `${dir}/bins`, features.coveragePath, quality],
      outputs: [],
      outputDirs: [refinedDir],
      params: { kmer: features.kmerPath ? ["--kmer-frequencies", this.ctx.resolve(features.kmerPath)] : null },
      invocation: this.ctx.commands.reassign
    });

    // Bins that were not over the threshold pass through; the targeted ones are replaced by what the tool wrote.
    const refined = await readBinFastaDirectory(this.ctx.resolve(refinedDir), "fna");
    const bins = new Map(kept);
    for (const bin of refined.bins.values()) {
      if (bins.has(bin.name)) {
        throw new PipelineError(ErrorCode.ToolFailure, `refined bin ${bin.name} clashes with a bin that was not refined`);
      }
      bins.set(bin.name, bin);
    }
    return { bins };
  }
}

export class ToolAniEstimator implements AniEstimator {
  constructor(private readonly ctx: ToolContext) {}

  async pairwise(binSet: BinSet): Promise<readonly AniPair[]> {
    if (binSet.bins.size < 2) return [];
    const dir = `${this.ctx.workDir}/dereplicate`;
    await resetDir(this.ctx, dir);
    const genomes = await writeBinFastas(this.ctx.resolve(this.ctx.assembly), binSet, this.ctx.resolve(`${dir}/bins`));

    const table = `${dir}/ani.tsv`;
    await runStep(this.ctx, {
      id: "refine_ani",
      inputs: [`${dir}/bins`],
      outputs: [table],
      params: { genomes },
      invocation: this.ctx.commands.ani
    });
    return parseAniTable(await readOutput(this.ctx, table), table).map((pair) => ({
      a: binNameFromPath(pair.a),
      b: binNameFromPath(pair.b),
      ani: pair.ani
    }));
  }
}
