import { describe, it, expect } from "vitest";
import { binSetFromRecord, emptyBinSet, type BinSet } from "../src/bins/types.js";
import { scoreBin, selectConsensus } from "../src/consensus/ensemble.js";

function owners(binSet: BinSet): Map<string, string[]> {
  const seen = new Map<string, string[]>();
  for (const bin of binSet.bins.values()) {
    for (const contig of bin.contigs) seen.set(contig, [...(seen.get(contig) ?? []), bin.name]);
  }
  return seen;
}

describe("selectConsensus", () => {
  it("keeps A's partition and rejects C's overlapping bins", () => {
    const a = binSetFromRecord(
      { bin1: ["c1", "c2", "c3"], bin2: ["c4", "c5"] },
      { bin1: { completeness: 95, contamination: 1 }, bin2: { completeness: 90, contamination: 2 } }
    );
    const b = emptyBinSet();
    const c = binSetFromRecord(
      { bin1: ["c1", "c2"], bin2: ["c3", "c4", "c5"] },
      { bin1: { completeness: 60, contamination: 5 }, bin2: { completeness: 70, contamination: 8 } }
    );

    const result = selectConsensus([
      { source: "A", binSet: a },
      { source: "B", binSet: b },
      { source: "C", binSet: c }
    ]);

    expect([...result.binSet.bins.keys()]).toEqual(["A.bin1", "A.bin2"]);
    expect(result.binSet.bins.get("A.bin1")?.contigs).toEqual(["c1", "c2", "c3"]);
    expect(result.binSet.bins.get("A.bin2")?.contigs).toEqual(["c4", "c5"]);
    expect(result.binSet.quality?.get("A.bin2")).toEqual({ completeness: 90, contamination: 2 });
    expect(result.rejected.map((r) => [r.candidate.name, r.reason, r.conflictsWith])).toEqual([
      ["C.bin2", "overlap", "A.bin1"],
      ["C.bin1", "overlap", "A.bin1"]
    ]);
  });

  it("returns an empty consensus for an all-empty input", () => {
    const result = selectConsensus([
      { source: "metabat2", binSet: emptyBinSet() },
      { source: "vamb", binSet: emptyBinSet() }
    ]);
    expect(result.binSet.bins.size).toBe(0);
    expect(result.accepted).toEqual([]);
    expect(result.rejected).toEqual([]);
    expect(selectConsensus([]).binSet.bins.size).toBe(0);
  });

  it("never places a contig in two consensus bins", () => {
    const sources = [
      binSetFromRecord({ x: ["c1", "c2"], y: ["c3"] }, { x: { completeness: 50, contamination: 0 }, y: { completeness: 50, contamination: 0 } }),
      binSetFromRecord({ x: ["c2", "c3"], y: ["c4", "c1"] }, { x: { completeness: 50, contamination: 0 }, y: { completeness: 80, contamination: 0 } }),
      binSetFromRecord({ z: ["c1", "c2", "c3", "c4"] }, { z: { completeness: 50, contamination: 0 } })
    ];
    const result = selectConsensus(sources.map((binSet, i) => ({ source: `s${i}`, binSet })));
    for (const [, bins] of owners(result.binSet)) {
      expect(bins).toHaveLength(1);
    }
    expect([...result.binSet.bins.keys()]).toEqual(["s1.y", "s1.x"]);
  });

  it("breaks score ties by contig count, then source order, then bin order", () => {
    const q = { completeness: 80, contamination: 0 };
    const result = selectConsensus([
      { source: "p", binSet: binSetFromRecord({ small: ["a"], other: ["b"] }, { small: q, other: q }) },
      { source: "q", binSet: binSetFromRecord({ big: ["a", "c"], dup: ["b"] }, { big: q, dup: q }) }
    ]);
    expect(result.accepted.map((c) => c.name)).toEqual(["q.big", "p.other"]);
    expect(result.rejected.map((r) => `${r.candidate.name}:${r.reason}`)).toEqual(["p.small:overlap", "q.dup:overlap"]);
  });

  it("rejects unscored, low-scoring and undersized bins", () => {
    const binSet = binSetFromRecord(
      { good: ["c1"], dirty: ["c2"], tiny: ["c3"], unscored: ["c4"], unknownLength: ["c5"] },
      {
        good: { completeness: 90, contamination: 5 },
        dirty: { completeness: 20, contamination: 70 },
        tiny: { completeness: 90, contamination: 0 },
        unknownLength: { completeness: 90, contamination: 0 }
      }
    );
    const result = selectConsensus([{ source: "s", binSet }], {
      minBinSize: 1000,
      contigLengths: new Map([
        ["c1", 5000],
        ["c2", 5000],
        ["c3", 400],
        ["c4", 5000]
      ])
    });

    expect(result.accepted.map((c) => c.name)).toEqual(["s.unknownLength", "s.good"]);
    expect(result.rejected.map((r) => `${r.candidate.name}:${r.reason}`)).toEqual([
      "s.dirty:below_threshold",
      "s.tiny:too_small",
      "s.unscored:unscored"
    ]);
  });

  it("weights contamination by the penalty weight", () => {
    expect(scoreBin({ completeness: 90, contamination: 10 })).toBe(80);
    expect(scoreBin({ completeness: 90, contamination: 10 }, 5)).toBe(40);

    const binSet = binSetFromRecord({ b: ["c1"] }, { b: { completeness: 50, contamination: 10 } });
    expect(selectConsensus([{ source: "s", binSet }], { penaltyWeight: 5, scoreThreshold: 10 }).rejected[0]?.reason).toBe(
      "below_threshold"
    );
    expect(selectConsensus([{ source: "s", binSet }], { penaltyWeight: 1, scoreThreshold: 10 }).accepted).toHaveLength(1);
  });

  it("never lets one consensus name stand for two bins", () => {
    const dotted = binSetFromRecord({ c: ["c1"] }, { c: { completeness: 90, contamination: 1 } });
    const plain = binSetFromRecord({ "b.c": ["c2"] }, { "b.c": { completeness: 80, contamination: 1 } });
    const result = selectConsensus([
      { source: "a.b", binSet: dotted },
      { source: "a", binSet: plain }
    ]);

    expect([...result.binSet.bins.values()]).toEqual([{ name: "a.b.c", contigs: ["c1"] }]);
    expect(result.rejected.map((r) => [r.candidate.source, r.reason, r.conflictsWith])).toEqual([["a", "name_clash", "a.b.c"]]);

    expect(() =>
      selectConsensus([
        { source: "metabat2", binSet: dotted },
        { source: "metabat2", binSet: plain }
      ])
    ).toThrow("ConfigError: ensemble source metabat2 is listed twice");
  });
});
