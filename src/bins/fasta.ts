import { createReadStream, promises as fs } from "fs";
import path from "path";
import { createInterface } from "readline";
import type { Bin, BinSet } from "./types.js";

interface FastaRecord {
  id: string;
  header: string;
  sequence: string;
}

async function* readFasta(filePath: string): AsyncGenerator<FastaRecord> {
  const lines = createInterface({ input: createReadStream(filePath, "utf8"), crlfDelay: Infinity });
  let current: { id: string; header: string; chunks: string[] } | null = null;
  for await (const line of lines) {
    if (line.startsWith(">")) {
      if (current) yield { id: current.id, header: current.header, sequence: current.chunks.join("") };
      const header = line.slice(1).trim();
      current = { id: header.split(/\s+/)[0] ?? header, header, chunks: [] };
    } else if (current) {
      current.chunks.push(line.trim());
    }
  }
  if (current) yield { id: current.id, header: current.header, sequence: current.chunks.join("") };
}

export async function readContigLengths(filePath: string): Promise<Map<string, number>> {
  const lengths = new Map<string, number>();
  for await (const record of readFasta(filePath)) {
    lengths.set(record.id, record.sequence.length);
  }
  return lengths;
}

function wrap(sequence: string, width = 80): string {
  const lines: string[] = [];
  for (let i = 0; i < sequence.length; i += width) lines.push(sequence.slice(i, i + width));
  return lines.join("\n");
}

// Writes `<bin>.<extension>` per bin with the bin's contigs pulled from the assembly; returns the file paths.
export async function writeBinFastas(
  assemblyPath: string,
  binSet: BinSet,
  outDir: string,
  extension = "fna"
): Promise<string[]> {
  const owner = new Map<string, string>();
  for (const bin of binSet.bins.values()) {
    for (const contig of bin.contigs) owner.set(contig, bin.name);
  }

  const chunks = new Map<string, string[]>([...binSet.bins.keys()].map((name) => [name, []]));
  for await (const record of readFasta(assemblyPath)) {
    const bin = owner.get(record.id);
    if (bin === undefined) continue;
    chunks.get(bin)?.push(`>${record.header}\n${wrap(record.sequence)}\n`);
  }

  await fs.mkdir(outDir, { recursive: true });
  const written: string[] = [];
  for (const [name, records] of chunks) {
    const target = path.join(outDir, `${name}.${extension}`);
    await fs.writeFile(target, records.join(""), "utf8");
    written.push(target);
  }
  return written;
}

export function binNameFromPath(filePath: string): string {
  return path.basename(filePath).replace(/\.(fna|fa|fasta)(\.gz)?$/, "");
}

// One bin per `*.<extension>` file, named as binNameFromPath names it; a missing directory holds no bins.
export async function readBinFastaDirectory(dir: string, extension: string): Promise<BinSet> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return { bins: new Map() };
    throw err;
  }

  const bins = new Map<string, Bin>();
  const owner = new Map<string, string>();
  for (const file of entries.filter((f) => f.endsWith(`.${extension}`)).sort()) {
    const name = binNameFromPath(file);
    const contigs: string[] = [];
    for await (const record of readFasta(path.join(dir, file))) {
      const previous = owner.get(record.id);
      if (previous !== undefined) {
        throw new Error(`${dir}: contig ${record.id} is in both ${previous} and ${name}`);
      }
      owner.set(record.id, name);
      contigs.push(record.id);
    }
    bins.set(name, { name, contigs });
  }
  return { bins };
}
