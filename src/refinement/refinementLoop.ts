import type { AniPair } from "../bins/tables.js";
import type { Bin, BinQuality, BinSet } from "../bins/types.js";
import { silentLogger, type Logger } from "../logging/logger.js";

export type RefinementPhase = "pending" | "converged" | "max_iterations_reached";

export interface QualitySnapshot {
  iteration: number;
  bins: number;
  meanCompleteness: number;
  meanContamination: number;
  // Bins meeting both the completeness and the contamination threshold.
  passing: number;
  overThreshold: string[];
}

export interface RefinementFeatures {
  coveragePath: string | null;
  kmerPath: string | null;
}

export interface QualityAssessor {
  assess(binSet: BinSet, iteration: number): Promise<ReadonlyMap<string, BinQuality>>;
}

export interface Reassigner {
  reassign(binSet: BinSet, overThreshold: readonly string[], features: RefinementFeatures, iteration: number): Promise<BinSet>;
}

export interface AniEstimator {
  pairwise(binSet: BinSet): Promise<readonly AniPair[]>;
}

export interface RefinementOptions {
  maxIterations: number;
  maxContamination: number;
  minCompleteness: number;
  finalRefining: boolean;
  ani: number;
}

export interface Consolidation {
  clusters: string[][];
  dropped: string[];
}

export interface RefinementResult {
  state: Exclude<RefinementPhase, "pending">;
  binSet: BinSet;
  // Reassignment passes performed.
  iterations: number;
  history: QualitySnapshot[];
  // Iteration whose bin set was returned.
  selectedIteration: number;
  consolidation: Consolidation | null;
}

export interface RefinementState {
  phase: RefinementPhase;
  binSet: BinSet;
  iteration: number;
  history: QualitySnapshot[];
  converged: boolean;
}

function mean(values: number[]): number {
  return values.length ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

export function snapshotQuality(
  binSet: BinSet,
  iteration: number,
  thresholds: Pick<RefinementOptions, "maxContamination" | "minCompleteness">
): QualitySnapshot {
  const scored = [...binSet.bins.keys()].flatMap((name) => {
    const q = binSet.quality?.get(name);
    return q ? [{ name, ...q }] : [];
  });
  return {
    iteration,
    bins: binSet.bins.size,
    meanCompleteness: mean(scored.map((s) => s.completeness)),
    meanContamination: mean(scored.map((s) => s.contamination)),
    passing: scored.filter((s) => s.completeness >= thresholds.minCompleteness && s.contamination <= thresholds.maxContamination)
      .length,
    overThreshold: scored.filter((s) => s.contamination > thresholds.maxContamination).map((s) => s.name)
  };
}

export class RefinementLoop {
  private readonly logger: Logger;

  constructor(
    private readonly options: RefinementOptions,
    private readonly collaborators: {
      assessor: QualityAssessor;
      reassigner: Reassigner;
      ani?: AniEstimator;
    },
    logger?: Logger
  ) {
    if (!Number.isInteger(options.maxIterations) || options.maxIterations < 0) {
      throw new Error(`maxIterations must be a non-negative integer, got ${options.maxIterations}`);
    }
    if (options.finalRefining && !collaborators.ani) {
      throw new Error("final refining needs an ANI estimator");
    }
    this.logger = logger ?? silentLogger;
  }

  async run(initial: BinSet, features: RefinementFeatures): Promise<RefinementResult> {
    const state: RefinementState = { phase: "pending", binSet: initial, iteration: 0, history: [], converged: false };
    let best: { binSet: BinSet; snapshot: QualitySnapshot } | null = null;
    let terminal: { phase: RefinementResult["state"]; binSet: BinSet; snapshot: QualitySnapshot } | null = null;

    while (state.phase === "pending") {
      const quality = await this.collaborators.assessor.assess(state.binSet, state.iteration);
      const scored: BinSet = { bins: state.binSet.bins, quality };
      const snapshot = snapshotQuality(scored, state.iteration, this.options);
      state.history.push(snapshot);
      this.logger.info(`iteration ${state.iteration}`, {
        bins: snapshot.bins,
        mean_completeness: snapshot.meanCompleteness,
        mean_contamination: snapshot.meanContamination,
        over_threshold: snapshot.overThreshold.length
      });

      if (!best || snapshot.meanContamination < best.snapshot.meanContamination) {
        best = { binSet: scored, snapshot };
      }

      if (snapshot.overThreshold.length === 0) {
        state.phase = "converged";
        state.converged = true;
        terminal = { phase: "converged", binSet: scored, snapshot };
      } else if (state.iteration >= this.options.maxIterations) {
        state.phase = "max_iterations_reached";
        terminal = { phase: "max_iterations_reached", ...best };
      } else {
        state.binSet = await this.collaborators.reassigner.reassign(scored, snapshot.overThreshold, features, state.iteration);
        state.iteration += 1;
      }
    }

    if (!terminal) {
      throw new Error("refinement loop ended without a terminal state");
    }

    let binSet = terminal.binSet;
    let consolidation: Consolidation | null = null;
    if (this.options.finalRefining && this.collaborators.ani) {
      const pairs = await this.collaborators.ani.pairwise(binSet);
      const result = consolidateBins(binSet, pairs, this.options.ani);
      binSet = result.binSet;
      consolidation = { clusters: result.clusters, dropped: result.dropped };
      if (result.dropped.length) {
        this.logger.info(`consolidation dropped ${result.dropped.length} near-identical bin(s)`, { dropped: result.dropped });
      }
    }

    return {
      state: terminal.phase,
      binSet,
      iterations: state.iteration,
      history: state.history,
      selectedIteration: terminal.snapshot.iteration,
      consolidation
    };
  }
}

export function consolidationScore(quality: BinQuality | undefined): number {
  return quality ? quality.completeness - 5 * quality.contamination : -Infinity;
}

// Single-linkage clusters over pairs with ANI >= threshold; each cluster keeps its best-scoring bin.
export function consolidateBins(
  binSet: BinSet,
  pairs: readonly AniPair[],
  threshold: number
): { binSet: BinSet; clusters: string[][]; dropped: string[] } {
  const names = [...binSet.bins.keys()];
  const parent = new Map(names.map((n) => [n, n]));
  const find = (n: string): string => {
    let root = n;
    while (parent.get(root) !== root) root = parent.get(root) ?? root;
    parent.set(n, root);
    return root;
  };

  for (const pair of pairs) {
    if (pair.a === pair.b || pair.ani < threshold) continue;
    if (!parent.has(pair.a) || !parent.has(pair.b)) continue;
    const ra = find(pair.a);
    const rb = find(pair.b);
    if (ra !== rb) parent.set(rb, ra);
  }

  const clusters = new Map<string, string[]>();
  for (const name of names) {
    const root = find(name);
    const members = clusters.get(root) ?? [];
    members.push(name);
    clusters.set(root, members);
  }

  const keep = new Set<string>();
  const dropped: string[] = [];
  for (const members of clusters.values()) {
    let winner = members[0];
    for (const name of members.slice(1)) {
      if (winner === undefined || consolidationScore(binSet.quality?.get(name)) > consolidationScore(binSet.quality?.get(winner))) {
        winner = name;
      }
    }
    for (const name of members) {
      if (name === winner) keep.add(name);
      else dropped.push(name);
    }
  }

  const bins = new Map<string, Bin>();
  const quality = new Map<string, BinQuality>();
  for (const name of names) {
    const bin = binSet.bins.get(name);
    if (!bin || !keep.has(name)) continue;
    bins.set(name, bin);
    const q = binSet.quality?.get(name);
    if (q) quality.set(name, q);
  }

  return {
    binSet: { bins, quality },
    clusters: [...clusters.values()].filter((c) => c.length > 1),
    dropped
  };
}
