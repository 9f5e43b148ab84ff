import { promises as fs } from "fs";
import path from "path";

export interface PipelineWorkspace {
  rootDir: string;
  logsDir: string;
  stateDir: string;
  resolve(ref: string): string;
  logPath(name: string): string;
  statePath(name: string): string;
}

function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe workspace path: ${name}`);
  }
  return joined;
}

export { safeJoin };

// Absolute refs (raw inputs) pass through; relative refs live under the output root.
export function resolveRef(rootDir: string, ref: string): string {
  return path.isAbsolute(ref) ? ref : safeJoin(rootDir, ref);
}

export async function createPipelineWorkspace(rootDir: string): Promise<PipelineWorkspace> {
  const root = path.resolve(rootDir);
  const logsDir = path.join(root, "logs");
  const stateDir = path.join(root, ".binflow");

  await fs.mkdir(logsDir, { recursive: true });
  await fs.mkdir(stateDir, { recursive: true });

  return {
    rootDir: root,
    logsDir,
    stateDir,
    resolve: (ref: string) => resolveRef(root, ref),
    logPath: (name: string) => safeJoin(logsDir, name),
    statePath: (name: string) => safeJoin(stateDir, name)
  };
}
