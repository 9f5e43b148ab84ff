import { promises as fs } from "fs";
import path from "path";
import { resolveRef } from "../execution/workspace.js";

export interface MarkerStore {
  exists(ref: string): Promise<boolean>;
  // Creates an empty marker; a marker that already has content (written by the tool) is left alone.
  write(ref: string): Promise<void>;
  remove(ref: string): Promise<void>;
  ensureDir(ref: string): Promise<void>;
}

export async function allMarkersExist(store: MarkerStore, refs: readonly string[]): Promise<boolean> {
  for (const ref of refs) {
    if (!(await store.exists(ref))) return false;
  }
  return true;
}

export async function anyMarkerExists(store: MarkerStore, refs: readonly string[]): Promise<boolean> {
  for (const ref of refs) {
    if (await store.exists(ref)) return true;
  }
  return false;
}

export class FileMarkerStore implements MarkerStore {
  constructor(private readonly rootDir: string) {}

  resolve(ref: string): string {
    return resolveRef(this.rootDir, ref);
  }

  async exists(ref: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(ref));
      return true;
    } catch {
      return false;
    }
  }

  async write(ref: string): Promise<void> {
    const target = this.resolve(ref);
    await fs.mkdir(path.dirname(target), { recursive: true });
    const handle = await fs.open(target, "a");
    await handle.close();
  }

  async remove(ref: string): Promise<void> {
    await fs.rm(this.resolve(ref), { force: true });
  }

  async ensureDir(ref: string): Promise<void> {
    await fs.mkdir(this.resolve(ref), { recursive: true });
  }
}

export class InMemoryMarkerStore implements MarkerStore {
  readonly markers = new Set<string>();
  readonly dirs = new Set<string>();
  writeCount = 0;

  constructor(initial: Iterable<string> = []) {
    for (const ref of initial) this.markers.add(path.normalize(ref));
  }

  async exists(ref: string): Promise<boolean> {
    const key = path.normalize(ref);
    return this.markers.has(key) || this.dirs.has(key);
  }

  async write(ref: string): Promise<void> {
    this.writeCount += 1;
    this.markers.add(path.normalize(ref));
  }

  async remove(ref: string): Promise<void> {
    this.markers.delete(path.normalize(ref));
  }

  async ensureDir(ref: string): Promise<void> {
    this.dirs.add(path.normalize(ref));
  }
}
