export interface Bin {
  name: string;
  contigs: readonly string[];
}

export interface BinQuality {
  // Percentages, as reported by the quality-assessment tool.
  completeness: number;
  contamination: number;
}

// Within one set a contig belongs to at most one bin.
export interface BinSet {
  bins: ReadonlyMap<string, Bin>;
  quality?: ReadonlyMap<string, BinQuality>;
}

export interface EnsembleSource {
  source: string;
  binSet: BinSet;
}

export type EnsembleInput = readonly EnsembleSource[];

export const emptyBinSet = (): BinSet => ({ bins: new Map() });

export function binSetFromRecord(record: Record<string, readonly string[]>, quality?: Record<string, BinQuality>): BinSet {
  const bins = new Map<string, Bin>();
  for (const [name, contigs] of Object.entries(record)) {
    bins.set(name, { name, contigs: [...contigs] });
  }
  return quality ? { bins, quality: new Map(Object.entries(quality)) } : { bins };
}

export function binnedContigs(binSet: BinSet): Set<string> {
  const out = new Set<string>();
  for (const bin of binSet.bins.values()) {
    for (const contig of bin.contigs) out.add(contig);
  }
  return out;
}
