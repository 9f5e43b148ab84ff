import { promises as fs } from "fs";
import type { Bin, BinQuality, BinSet } from "./types.js";

export class TableFormatError extends Error {
  constructor(
    readonly table: string,
    readonly line: number,
    message: string
  ) {
    super(`${table}:${line}: ${message}`);
    this.name = "TableFormatError";
  }
}

interface Row {
  line: number;
  fields: string[];
}

function rows(text: string, opts: { comments: boolean }): Row[] {
  const out: Row[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i] ?? "";
    if (raw.trim().length === 0) continue;
    if (opts.comments && raw.startsWith("#")) continue;
    out.push({ line: i + 1, fields: raw.split("\t").map((f) => f.trim()) });
  }
  return out;
}

function parseNumber(table: string, row: Row, value: string | undefined, column: string): number {
  const n = Number(value);
  if (value === undefined || value.length === 0 || !Number.isFinite(n)) {
    throw new TableFormatError(table, row.line, `${column} is not a number: ${value ?? "<missing>"}`);
  }
  return n;
}

export function parseContigBinMapping(text: string, table = "contig_bins"): BinSet {
  const members = new Map<string, string[]>();
  const owner = new Map<string, string>();
  for (const row of rows(text, { comments: true })) {
    const [contig, bin] = row.fields;
    if (!contig || !bin) {
      throw new TableFormatError(table, row.line, "expected contig<TAB>bin");
    }
    const previous = owner.get(contig);
    if (previous !== undefined) {
      throw new TableFormatError(table, row.line, `contig ${contig} is listed twice (bins ${previous} and ${bin})`);
    }
    owner.set(contig, bin);
    const list = members.get(bin) ?? [];
    list.push(contig);
    members.set(bin, list);
  }

  const bins = new Map<string, Bin>();
  for (const [name, contigs] of members) bins.set(name, { name, contigs });
  return { bins };
}

export function formatContigBinMapping(binSet: BinSet): string {
  const lines: string[] = [];
  for (const bin of binSet.bins.values()) {
    for (const contig of bin.contigs) lines.push(`${contig}\t${bin.name}`);
  }
  return lines.length ? lines.join("\n") + "\n" : "";
}

const BIN_COLUMNS = ["Name", "Bin Id"];

export function parseQualityTable(text: string, table = "quality"): Map<string, BinQuality> {
  const [header, ...body] = rows(text, { comments: false });
  const quality = new Map<string, BinQuality>();
  if (!header) return quality;

  const binCol = header.fields.findIndex((f) => BIN_COLUMNS.includes(f));
  const complCol = header.fields.indexOf("Completeness");
  const contamCol = header.fields.indexOf("Contamination");
  if (binCol < 0 || complCol < 0 || contamCol < 0) {
    throw new TableFormatError(table, header.line, "header needs Name (or Bin Id), Completeness and Contamination");
  }

  for (const row of body) {
    const name = row.fields[binCol];
    if (!name) throw new TableFormatError(table, row.line, "missing bin id");
    quality.set(name, {
      completeness: parseNumber(table, row, row.fields[complCol], "Completeness"),
      contamination: parseNumber(table, row, row.fields[contamCol], "Contamination")
    });
  }
  return quality;
}

export function formatQualityTable(binSet: BinSet): string {
  const lines = ["Name\tCompleteness\tContamination\tContigs"];
  for (const bin of binSet.bins.values()) {
    const q = binSet.quality?.get(bin.name);
    if (!q) continue;
    lines.push(`${bin.name}\t${q.completeness}\t${q.contamination}\t${bin.contigs.length}`);
  }
  return lines.join("\n") + "\n";
}

export interface CoverageRow {
  length: number;
  totalAvgDepth: number;
  depths: number[];
}

export interface CoverageTable {
  samples: string[];
  contigs: Map<string, CoverageRow>;
}

export function parseCoverageTable(text: string, table = "coverage"): CoverageTable {
  const [header, ...body] = rows(text, { comments: false });
  if (!header) return { samples: [], contigs: new Map() };
  if (header.fields[0] !== "contigName" || header.fields[1] !== "contigLen" || header.fields[2] !== "totalAvgDepth") {
    throw new TableFormatError(table, header.line, "header must start with contigName, contigLen, totalAvgDepth");
  }

  const samples = header.fields.slice(3);
  const contigs = new Map<string, CoverageRow>();
  for (const row of body) {
    const [name, len, total, ...depths] = row.fields;
    if (!name) throw new TableFormatError(table, row.line, "missing contig name");
    contigs.set(name, {
      length: parseNumber(table, row, len, "contigLen"),
      totalAvgDepth: parseNumber(table, row, total, "totalAvgDepth"),
      depths: depths.map((d, i) => parseNumber(table, row, d, samples[i] ?? `sample ${i + 1}`))
    });
  }
  return { samples, contigs };
}

export interface AniPair {
  a: string;
  b: string;
  // Fraction in [0, 1].
  ani: number;
}

export function parseAniTable(text: string, table = "ani"): AniPair[] {
  const pairs: AniPair[] = [];
  const all = rows(text, { comments: true });
  for (const [i, row] of all.entries()) {
    const [a, b, value] = row.fields;
    // Optional header row.
    if (i === 0 && value !== undefined && !Number.isFinite(Number(value))) continue;
    if (!a || !b) throw new TableFormatError(table, row.line, "expected bin_a<TAB>bin_b<TAB>ani");
    const ani = parseNumber(table, row, value, "ani");
    pairs.push({ a, b, ani: ani > 1 ? ani / 100 : ani });
  }
  return pairs;
}

async function readIfPresent(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

// A soft-failed tool may leave no table at all; that reads as an empty set.
export async function readContigBinMapping(filePath: string): Promise<BinSet> {
  const text = await readIfPresent(filePath);
  return text === null ? { bins: new Map() } : parseContigBinMapping(text, filePath);
}

export async function readQualityTable(filePath: string): Promise<Map<string, BinQuality> | null> {
  const text = await readIfPresent(filePath);
  return text === null ? null : parseQualityTable(text, filePath);
}

export async function readBinSet(mappingPath: string, qualityPath: string): Promise<BinSet> {
  const binSet = await readContigBinMapping(mappingPath);
  const quality = await readQualityTable(qualityPath);
  return quality === null ? binSet : { ...binSet, quality };
}

// CONCOCT's `contig_id,cluster_id` table; clusters become bins named `bin.<cluster>`.
export function parseClusterTable(text: string, table = "clustering"): BinSet {
  const mapping: string[] = [];
  for (const row of rows(text, { comments: false })) {
    const [contig, cluster, extra] = (row.fields[0] ?? "").split(",").map((f) => f.trim());
    if (row.line === 1 && contig === "contig_id") continue;
    if (!contig || !cluster || extra !== undefined) {
      throw new TableFormatError(table, row.line, "expected contig_id,cluster_id");
    }
    mapping.push(`${contig}\tbin.${cluster}`);
  }
  return parseContigBinMapping(mapping.join("\n"), table);
}

export async function readClusterTable(filePath: string): Promise<BinSet> {
  const text = await readIfPresent(filePath);
  return text === null ? { bins: new Map() } : parseClusterTable(text, filePath);
}

export async function readCoverageTable(filePath: string): Promise<CoverageTable | null> {
  const text = await readIfPresent(filePath);
  return text === null ? null : parseCoverageTable(text, filePath);
}
