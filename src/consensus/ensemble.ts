import type { Bin, BinQuality, BinSet, EnsembleInput } from "../bins/types.js";
import { ErrorCode, PipelineError } from "../core/errors.js";

export const DEFAULT_SCORE_THRESHOLD = -42;
export const DEFAULT_PENALTY_WEIGHT = 1;

export type RejectionReason = "empty" | "unscored" | "below_threshold" | "too_small" | "overlap" | "name_clash";

export interface ConsensusCandidate {
  // `<source>.<bin>`, the name the bin carries in the consensus set.
  name: string;
  source: string;
  sourceIndex: number;
  bin: Bin;
  binIndex: number;
  quality: BinQuality | null;
  score: number | null;
  totalLength: number | null;
}

export interface RejectedCandidate {
  candidate: ConsensusCandidate;
  reason: RejectionReason;
  // For overlap: the accepted candidate that already holds a shared contig. For name_clash: the one holding the name.
  conflictsWith?: string;
}

export interface ConsensusOptions {
  scoreThreshold?: number;
  penaltyWeight?: number;
  minBinSize?: number;
  contigLengths?: ReadonlyMap<string, number>;
}

export interface ConsensusResult {
  binSet: BinSet;
  accepted: ConsensusCandidate[];
  rejected: RejectedCandidate[];
}

export function scoreBin(quality: BinQuality, penaltyWeight = DEFAULT_PENALTY_WEIGHT): number {
  return quality.completeness - penaltyWeight * quality.contamination;
}

function totalLength(bin: Bin, lengths: ReadonlyMap<string, number> | undefined): number | null {
  if (!lengths) return null;
  let total = 0;
  for (const contig of bin.contigs) {
    const len = lengths.get(contig);
    if (len === undefined) return null;
    total += len;
  }
  return total;
}

function compareCandidates(a: ConsensusCandidate, b: ConsensusCandidate): number {
  return (
    (b.score ?? -Infinity) - (a.score ?? -Infinity) ||
    b.bin.contigs.length - a.bin.contigs.length ||
    a.sourceIndex - b.sourceIndex ||
    a.binIndex - b.binIndex
  );
}

export function selectConsensus(input: EnsembleInput, options: ConsensusOptions = {}): ConsensusResult {
  const threshold = options.scoreThreshold ?? DEFAULT_SCORE_THRESHOLD;
  const weight = options.penaltyWeight ?? DEFAULT_PENALTY_WEIGHT;
  const minBinSize = options.minBinSize ?? 0;

  const sources = new Set<string>();
  for (const { source } of input) {
    if (sources.has(source)) {
      throw new PipelineError(ErrorCode.ConfigError, `ensemble source ${source} is listed twice`);
    }
    sources.add(source);
  }

  const rejected: RejectedCandidate[] = [];
  const eligible: ConsensusCandidate[] = [];

  input.forEach(({ source, binSet }, sourceIndex) => {
    let binIndex = 0;
    for (const bin of binSet.bins.values()) {
      const quality = binSet.quality?.get(bin.name) ?? null;
      const candidate: ConsensusCandidate = {
        name: `${source}.${bin.name}`,
        source,
        sourceIndex,
        bin,
        binIndex: binIndex++,
        quality,
        score: quality ? scoreBin(quality, weight) : null,
        totalLength: totalLength(bin, options.contigLengths)
      };

      if (bin.contigs.length === 0) {
        rejected.push({ candidate, reason: "empty" });
      } else if (candidate.score === null) {
        rejected.push({ candidate, reason: "unscored" });
      } else if (candidate.score < threshold) {
        rejected.push({ candidate, reason: "below_threshold" });
      } else if (candidate.totalLength !== null && candidate.totalLength < minBinSize) {
        rejected.push({ candidate, reason: "too_small" });
      } else {
        eligible.push(candidate);
      }
    }
  });

  eligible.sort(compareCandidates);

  const owner = new Map<string, string>();
  const names = new Set<string>();
  const accepted: ConsensusCandidate[] = [];
  for (const candidate of eligible) {
    const clash = candidate.bin.contigs.find((c) => owner.has(c));
    if (clash !== undefined) {
      rejected.push({ candidate, reason: "overlap", conflictsWith: owner.get(clash) });
      continue;
    }
    // `a.b` + `c` and `a` + `b.c` name the same consensus bin.
    if (names.has(candidate.name)) {
      rejected.push({ candidate, reason: "name_clash", conflictsWith: candidate.name });
      continue;
    }
    names.add(candidate.name);
    for (const contig of candidate.bin.contigs) owner.set(contig, candidate.name);
    accepted.push(candidate);
  }

  const bins = new Map<string, Bin>();
  const quality = new Map<string, BinQuality>();
  for (const candidate of accepted) {
    bins.set(candidate.name, { name: candidate.name, contigs: [...candidate.bin.contigs] });
    if (candidate.quality) quality.set(candidate.name, candidate.quality);
  }

  return { binSet: { bins, quality }, accepted, rejected };
}
