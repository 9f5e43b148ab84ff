import type { PipelineConfig } from "../config/config.js";
import type { ExternalInvocation, TaskDeclaration } from "../graph/task.js";
import type { RefinementCommands } from "../refinement/toolCollaborators.js";

export const COVERAGE_TABLE = "data/coverm.cov";
export const CONSENSUS_MAPPING = "bins/consensus/contig_bins.tsv";
export const CONSENSUS_QUALITY = "bins/consensus/quality.tsv";
export const CONSENSUS_REPORT = "bins/consensus/candidates.tsv";
export const FINAL_MAPPING = "bins/final_contig_bins.tsv";
export const FINAL_QUALITY = "bins/final_quality.tsv";
export const REFINEMENT_REPORT = "bins/refinement.json";

export const CONSENSUS_STAGE = "consensus";
export const REFINE_STAGE = "refine";

const LONG_READ_MAPPER: Record<PipelineConfig["longReadType"], string> = {
  ont: "minimap2-ont",
  ont_hq: "minimap2-ont",
  rs: "minimap2-pb",
  sq: "minimap2-pb",
  ccs: "minimap2-hifi"
};

export const BINNERS = ["metabat2", "concoct", "maxbin2", "vamb", "semibin", "rosella"] as const;
export type Binner = (typeof BINNERS)[number];

export const CONTIG_BINS_STAGE = "contig_bins";

export function isBinner(value: unknown): value is Binner {
  return BINNERS.some((b) => b === value);
}

export interface BinnerLayout {
  // Output-root-relative directory holding one FASTA file per bin.
  fastaDir: string;
  extension: "fa" | "fna" | "fasta";
  // CONCOCT writes a contig,cluster table; its bin FASTAs are extracted from the assembly.
  clusterTable?: string;
}

function binnerRunDir(binner: Binner): string {
  return `bins/${binner}/run`;
}

function binnerDone(binner: Binner): string {
  return `bins/${binner}/done`;
}

export function binnerLayout(config: PipelineConfig, binner: Binner): BinnerLayout {
  const run = binnerRunDir(binner);
  switch (binner) {
    case "metabat2":
      return { fastaDir: run, extension: "fa" };
    case "concoct":
      return { fastaDir: `${run}/fasta`, extension: "fa", clusterTable: `${run}/clustering_gt${config.minContigSize}.csv` };
    case "maxbin2":
      return { fastaDir: run, extension: "fasta" };
    case "vamb":
      return { fastaDir: `${run}/vamb/bins`, extension: "fna" };
    case "semibin":
      return { fastaDir: `${run}/output_bins`, extension: "fa" };
    case "rosella":
      return { fastaDir: run, extension: "fna" };
  }
}

// {input.0} assembly, {input.1} coverage, {outdir.0} the binner's run directory.
function binnerInvocation(binner: Binner): ExternalInvocation {
  switch (binner) {
    case "metabat2":
      return {
        kind: "external",
        program: "metabat2",
        args: ["-i", "{input.0}", "-a", "{input.1}", "-o", "{outdir.0}/bin", "-m", "{param.min_contig_size}", "-s", "{param.min_bin_size}", "-t", "{threads}"]
      };
    case "concoct":
      return {
        kind: "external",
        program: "concoct",
        args: ["--composition_file", "{input.0}", "--coverage_file", "{input.1}", "-l", "{param.min_contig_size}", "-t", "{threads}", "-b", "{outdir.0}/"]
      };
    case "maxbin2":
      return {
        kind: "external",
        program: "run_MaxBin.pl",
        image: "maxbin2",
        args: ["-contig", "{input.0}", "-abund", "{input.1}", "-min_contig_length", "{param.min_contig_size}", "-thread", "{threads}", "-out", "{outdir.0}/bin"]
      };
    case "vamb":
      return {
        kind: "external",
        program: "vamb",
        args: ["--fasta", "{input.0}", "--jgi", "{input.1}", "-m", "{param.min_contig_size}", "--minfasta", "{param.min_bin_size}", "-p", "{threads}", "--outdir", "{outdir.0}/vamb"]
      };
    case "semibin":
      return {
        kind: "external",
        program: "SemiBin2",
        image: "semibin",
        args: ["single_easy_bin", "-i", "{input.0}", "-a", "{input.1}", "--min-len", "{param.min_contig_size}", "-t", "{threads}", "--compression", "none", "-o", "{outdir.0}"]
      };
    case "rosella":
      return {
        kind: "external",
        program: "rosella",
        args: ["recover", "-r", "{input.0}", "-i", "{input.1}", "--min-contig-size", "{param.min_contig_size}", "--min-bin-size", "{param.min_bin_size}", "-t", "{threads}", "-o", "{outdir.0}"]
      };
  }
}

export function binnerMapping(binner: Binner): string {
  return `bins/${binner}/contig_bins.tsv`;
}

export function binnerQuality(binner: Binner): string {
  return `bins/${binner}/checkm2/quality_report.tsv`;
}

function coverageVariants(config: PipelineConfig): TaskDeclaration[] {
  const base = (threads: number) => ({ threads, outputs: [COVERAGE_TABLE], outputDirs: ["data"] });
  const common = ["contig", "-t", "{threads}", "-r", "{input.0}", "--min-covered-fraction", "0", "-m", "metabat"];
  return [
    {
      id: "coverage_paired",
      ...base(config.maxThreads),
      inputs: [config.fasta, ...config.shortReads1, ...config.shortReads2],
      params: { reads1: [...config.shortReads1], reads2: [...config.shortReads2] },
      invocation: { kind: "external", program: "coverm", args: [...common, "-1", "{param.reads1}", "-2", "{param.reads2}", "-o", "{output.0}"] },
      variant: { logicalOutput: COVERAGE_TABLE, modes: ["paired"] }
    },
    {
      id: "coverage_interleaved",
      ...base(config.maxThreads),
      inputs: [config.fasta, ...config.shortReads1],
      params: { reads: [...config.shortReads1] },
      invocation: { kind: "external", program: "coverm", args: [...common, "--interleaved", "{param.reads}", "-o", "{output.0}"] },
      variant: { logicalOutput: COVERAGE_TABLE, modes: ["interleaved"] }
    },
    {
      id: "coverage_long",
      ...base(config.maxThreads),
      inputs: [config.fasta, ...config.longReads],
      params: { reads: [...config.longReads], mapper: LONG_READ_MAPPER[config.longReadType] },
      invocation: {
        kind: "external",
        program: "coverm",
        args: [...common, "-p", "{param.mapper}", "--single", "{param.reads}", "-o", "{output.0}"]
      },
      variant: { logicalOutput: COVERAGE_TABLE, modes: ["single"] }
    }
  ];
}

// {input.0} the bin FASTA directory.
function qualityInvocation(config: PipelineConfig, layout: BinnerLayout): ExternalInvocation {
  const db = config.checkm2Db ? ["--database_path", config.checkm2Db] : [];
  return {
    kind: "external",
    program: "checkm2",
    args: ["predict", "-i", "{input.0}", "-x", layout.extension, "-o", "{outdir.0}", "-t", "{threads}", "--force", ...db]
  };
}

export function recoverWorkflow(config: PipelineConfig): TaskDeclaration[] {
  const sizes = { min_contig_size: config.minContigSize, min_bin_size: config.minBinSize };
  const decls: TaskDeclaration[] = coverageVariants(config);

  for (const binner of BINNERS) {
    const layout = binnerLayout(config, binner);
    decls.push({
      id: binner,
      inputs: [config.fasta, COVERAGE_TABLE],
      outputs: [binnerDone(binner)],
      outputDirs: [binnerRunDir(binner)],
      params: sizes,
      threads: config.maxThreads,
      group: "binning",
      failurePolicy: "soft_fail",
      invocation: binnerInvocation(binner)
    });
    decls.push({
      id: `${CONTIG_BINS_STAGE}_${binner}`,
      inputs: [config.fasta, binnerDone(binner)],
      outputs: [binnerMapping(binner)],
      params: { binner },
      threads: 1,
      group: "binning",
      failurePolicy: "soft_fail",
      invocation: { kind: "internal", handler: CONTIG_BINS_STAGE }
    });
    decls.push({
      id: `checkm2_${binner}`,
      inputs: [layout.fastaDir, binnerMapping(binner)],
      outputs: [binnerQuality(binner)],
      outputDirs: [`bins/${binner}/checkm2`],
      threads: config.maxThreads,
      group: "quality",
      failurePolicy: "soft_fail",
      invocation: qualityInvocation(config, layout)
    });
  }

  decls.push({
    id: CONSENSUS_STAGE,
    inputs: [config.fasta, ...BINNERS.flatMap((b) => [binnerMapping(b), binnerQuality(b)])],
    outputs: [CONSENSUS_MAPPING, CONSENSUS_QUALITY, CONSENSUS_REPORT],
    outputDirs: ["bins/consensus"],
    threads: 1,
    invocation: { kind: "internal", handler: CONSENSUS_STAGE }
  });

  decls.push({
    id: REFINE_STAGE,
    inputs: [config.fasta, COVERAGE_TABLE, CONSENSUS_MAPPING, CONSENSUS_QUALITY],
    outputs: [FINAL_MAPPING, FINAL_QUALITY, REFINEMENT_REPORT],
    outputDirs: ["bins/refine"],
    threads: config.maxThreads,
    invocation: { kind: "internal", handler: REFINE_STAGE }
  });

  return decls;
}

// skani's screen (-s, percent) skips pairs below precluster_ani before the full ANI estimate.
export function refinementCommands(config: PipelineConfig): RefinementCommands {
  const db = config.checkm2Db ? ["--database_path", config.checkm2Db] : [];
  return {
    assess: {
      kind: "external",
      program: "checkm2",
      args: ["predict", "-i", "{input.0}", "-x", "fna", "-o", "{outdir.0}", "-t", "{threads}", "--force", ...db]
    },
    reassign: {
      kind: "external",
      program: "rosella",
      args: [
        "refine",
        "-a", "{input.0}",
        "--genome-fasta-directory", "{input.1}",
        "-x", "fna",
        "-i", "{input.2}",
        "--checkm-file", "{input.3}",
        "--max-contamination", String(config.refinement.maxContamination),
        "-t", "{threads}",
        "-o", "{outdir.0}",
        "{param.kmer}"
      ]
    },
    ani: {
      kind: "external",
      program: "skani",
      args: ["triangle", "--sparse", "-s", String(Math.round(config.refinement.preclusterAni * 1000) / 10), "-t", "{threads}", "-o", "{output.0}", "{param.genomes}"]
    }
  };
}
