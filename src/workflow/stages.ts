import { promises as fs } from "fs";
import type { PipelineConfig } from "../config/config.js";
import { readBinFastaDirectory, readContigLengths, writeBinFastas } from "../bins/fasta.js";
import {
  formatContigBinMapping,
  formatQualityTable,
  readBinSet,
  readClusterTable,
  readContigBinMapping,
  readCoverageTable,
  readQualityTable,
  TableFormatError
} from "../bins/tables.js";
import { binnedContigs, emptyBinSet, type BinQuality, type BinSet, type EnsembleSource } from "../bins/types.js";
import { ErrorCode, PipelineError } from "../core/errors.js";
import { selectConsensus, type ConsensusResult } from "../consensus/ensemble.js";
import type { InternalStageContext, InternalStageHandler } from "../execution/taskExecutor.js";
import { RefinementLoop, type QualityAssessor, type RefinementResult } from "../refinement/refinementLoop.js";
import { ToolAniEstimator, ToolQualityAssessor, ToolReassigner, type ToolContext } from "../refinement/toolCollaborators.js";
import {
  BINNERS,
  binnerLayout,
  binnerMapping,
  binnerQuality,
  CONSENSUS_MAPPING,
  CONSENSUS_QUALITY,
  CONSENSUS_REPORT,
  CONSENSUS_STAGE,
  CONTIG_BINS_STAGE,
  COVERAGE_TABLE,
  FINAL_MAPPING,
  FINAL_QUALITY,
  REFINE_STAGE,
  REFINEMENT_REPORT,
  isBinner,
  refinementCommands,
  type Binner
} from "./recover.js";

// Reuses the consensus quality table for the first evaluation when it covers every bin.
export class SeededQualityAssessor implements QualityAssessor {
  constructor(
    private readonly seed: ReadonlyMap<string, BinQuality> | undefined,
    private readonly inner: QualityAssessor
  ) {}

  async assess(binSet: BinSet, iteration: number): Promise<ReadonlyMap<string, BinQuality>> {
    const seed = this.seed;
    if (iteration === 0 && seed && [...binSet.bins.keys()].every((name) => seed.has(name))) {
      return seed;
    }
    return this.inner.assess(binSet, iteration);
  }
}

export function formatConsensusReport(result: ConsensusResult): string {
  const lines = ["candidate\tsource\tscore\tcontigs\tstatus\treason\tconflicts_with"];
  for (const c of result.accepted) {
    lines.push([c.name, c.source, c.score ?? "", c.bin.contigs.length, "accepted", "", ""].join("\t"));
  }
  for (const r of result.rejected) {
    const c = r.candidate;
    lines.push([c.name, c.source, c.score ?? "", c.bin.contigs.length, "rejected", r.reason, r.conflictsWith ?? ""].join("\t"));
  }
  return lines.join("\n") + "\n";
}

async function writeOutput(ctx: InternalStageContext, ref: string, content: string): Promise<void> {
  await fs.writeFile(ctx.workspace.resolve(ref), content, "utf8");
}

// Writes the binner's `contig<TAB>bin` table from its bin FASTAs, so bin ids match the quality report's names.
export async function runContigBinsStage(config: PipelineConfig, binner: Binner, ctx: InternalStageContext): Promise<BinSet> {
  const layout = binnerLayout(config, binner);
  let binSet: BinSet;
  if (layout.clusterTable) {
    binSet = await readClusterTable(ctx.workspace.resolve(layout.clusterTable));
    await writeBinFastas(ctx.workspace.resolve(config.fasta), binSet, ctx.workspace.resolve(layout.fastaDir), layout.extension);
  } else {
    binSet = await readBinFastaDirectory(ctx.workspace.resolve(layout.fastaDir), layout.extension);
  }
  await writeOutput(ctx, binnerMapping(binner), formatContigBinMapping(binSet));
  ctx.logger.debug(`${binner}: ${binSet.bins.size} bin(s)`);
  return binSet;
}

// Binners and their quality reports may have failed softly and left partial tables behind;
// an unreadable mapping counts as no bins, an unreadable quality report as no scores.
async function readEnsembleSource(ctx: InternalStageContext, binner: Binner): Promise<BinSet> {
  let binSet: BinSet;
  try {
    binSet = await readContigBinMapping(ctx.workspace.resolve(binnerMapping(binner)));
  } catch (err) {
    if (!(err instanceof TableFormatError)) throw err;
    ctx.logger.warn(`${binner} contig-bin table is unreadable; ignoring its bins`, { error: err.message });
    return emptyBinSet();
  }
  try {
    const quality = await readQualityTable(ctx.workspace.resolve(binnerQuality(binner)));
    return quality === null ? binSet : { ...binSet, quality };
  } catch (err) {
    if (!(err instanceof TableFormatError)) throw err;
    ctx.logger.warn(`${binner} quality report is unreadable; its bins are unscored`, { error: err.message });
    return binSet;
  }
}

export async function runConsensusStage(config: PipelineConfig, ctx: InternalStageContext): Promise<ConsensusResult> {
  const input: EnsembleSource[] = [];
  for (const binner of BINNERS) {
    const binSet = await readEnsembleSource(ctx, binner);
    if (binSet.bins.size === 0) ctx.logger.warn(`${binner} produced no bins`);
    input.push({ source: binner, binSet });
  }

  const lengths = await readContigLengths(ctx.workspace.resolve(config.fasta));
  const result = selectConsensus(input, {
    scoreThreshold: config.consensus.scoreThreshold,
    penaltyWeight: config.consensus.penaltyWeight,
    minBinSize: config.minBinSize,
    contigLengths: lengths
  });

  await writeOutput(ctx, CONSENSUS_MAPPING, formatContigBinMapping(result.binSet));
  await writeOutput(ctx, CONSENSUS_QUALITY, formatQualityTable(result.binSet));
  await writeOutput(ctx, CONSENSUS_REPORT, formatConsensusReport(result));
  ctx.logger.info(`consensus kept ${result.accepted.length} bin(s), rejected ${result.rejected.length}`, {
    unbinned_contigs: lengths.size - binnedContigs(result.binSet).size
  });
  return result;
}

export async function runRefineStage(config: PipelineConfig, ctx: InternalStageContext): Promise<RefinementResult> {
  const initial = await readBinSet(ctx.workspace.resolve(CONSENSUS_MAPPING), ctx.workspace.resolve(CONSENSUS_QUALITY));
  const coverage = await readCoverageTable(ctx.workspace.resolve(COVERAGE_TABLE));
  if (!coverage?.contigs.size) {
    ctx.logger.warn(`${COVERAGE_TABLE} is missing or empty; over-threshold bins cannot be reassigned`);
  }
  const tools: ToolContext = {
    run: ctx.run,
    resolve: ctx.workspace.resolve,
    workDir: "bins/refine",
    assembly: config.fasta,
    commands: refinementCommands(config)
  };

  const loop = new RefinementLoop(
    config.refinement,
    {
      assessor: new SeededQualityAssessor(initial.quality, new ToolQualityAssessor(tools)),
      reassigner: new ToolReassigner(tools),
      ani: new ToolAniEstimator(tools)
    },
    ctx.logger
  );
  const result = await loop.run(initial, { coveragePath: coverage?.contigs.size ? COVERAGE_TABLE : null, kmerPath: null });

  await writeOutput(ctx, FINAL_MAPPING, formatContigBinMapping(result.binSet));
  await writeOutput(ctx, FINAL_QUALITY, formatQualityTable(result.binSet));
  await writeOutput(
    ctx,
    REFINEMENT_REPORT,
    JSON.stringify(
      {
        state: result.state,
        iterations: result.iterations,
        selected_iteration: result.selectedIteration,
        bins: result.binSet.bins.size,
        history: result.history,
        consolidation: result.consolidation
      },
      null,
      2
    ) + "\n"
  );
  ctx.logger.info(`refinement ${result.state} after ${result.iterations} pass(es)`, { bins: result.binSet.bins.size });
  return result;
}

export function createRecoverStages(config: PipelineConfig): Map<string, InternalStageHandler> {
  return new Map<string, InternalStageHandler>([
    [
      CONTIG_BINS_STAGE,
      async (ctx) => {
        const binner = ctx.task.params.binner;
        if (!isBinner(binner)) {
          throw new PipelineError(ErrorCode.ConfigError, `task ${ctx.task.id} names unknown binner ${String(binner)}`);
        }
        await runContigBinsStage(config, binner, ctx);
      }
    ],
    [
      CONSENSUS_STAGE,
      async (ctx) => {
        await runConsensusStage(config, ctx);
      }
    ],
    [
      REFINE_STAGE,
      async (ctx) => {
        await runRefineStage(config, ctx);
      }
    ]
  ]);
}
