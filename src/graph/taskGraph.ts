import path from "path";
import { ErrorCode, PipelineError } from "../core/errors.js";
import { normalizeTask, type Task, type TaskDeclaration } from "./task.js";

export interface TaskGraph {
  readonly tasks: readonly Task[];
  readonly byId: ReadonlyMap<string, Task>;
  // output path -> producing task id
  readonly producers: ReadonlyMap<string, string>;
  readonly dependencies: ReadonlyMap<string, readonly string[]>;
  readonly dependents: ReadonlyMap<string, readonly string[]>;
  readonly rawInputs: ReadonlySet<string>;
  // Topological, ties broken by declaration order.
  readonly order: readonly string[];
}

export function normalizeRef(ref: string): string {
  return path.normalize(ref);
}

function findCycle(ids: string[], dependencies: Map<string, string[]>): string[] {
  const visiting = new Set<string>();
  const visited = new Set<string>();
  const stack: string[] = [];

  const visit = (id: string): string[] | null => {
    if (visiting.has(id)) {
      return [...stack.slice(stack.indexOf(id)), id];
    }
    if (visited.has(id)) return null;
    visiting.add(id);
    stack.push(id);
    for (const dep of dependencies.get(id) ?? []) {
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    stack.pop();
    visiting.delete(id);
    visited.add(id);
    return null;
  };

  for (const id of ids) {
    const cycle = visit(id);
    if (cycle) return cycle;
  }
  return ids;
}

function directoryProducers(tasks: readonly Task[]): Array<[string, string]> {
  return tasks.flatMap((t) => t.outputDirs.map((dir): [string, string] => [normalizeRef(dir), t.id]));
}

// An input at or below a declared output directory is produced by that directory's task; deepest match wins.
function producerOfDirectory(directories: ReadonlyArray<[string, string]>, ref: string): string | undefined {
  let best: [string, string] | undefined;
  for (const entry of directories) {
    const [dir] = entry;
    if (ref !== dir && !ref.startsWith(dir + path.sep)) continue;
    if (!best || dir.length > best[0].length) best = entry;
  }
  return best?.[1];
}

export function buildTaskGraph(declarations: TaskDeclaration[], options: { rawInputs: Iterable<string> }): TaskGraph {
  const tasks = declarations.map((d, i) => normalizeTask(d, i));
  const rawInputs = new Set([...options.rawInputs].map(normalizeRef));

  const byId = new Map<string, Task>();
  for (const task of tasks) {
    if (byId.has(task.id)) {
      throw new PipelineError(ErrorCode.ConfigError, `duplicate task id: ${task.id}`);
    }
    if (task.outputs.length === 0) {
      throw new PipelineError(ErrorCode.ConfigError, `task ${task.id} declares no outputs; it could never be marked done`);
    }
    byId.set(task.id, task);
  }

  const producers = new Map<string, string>();
  for (const task of tasks) {
    for (const output of task.outputs) {
      const key = normalizeRef(output);
      const existing = producers.get(key);
      if (existing !== undefined) {
        throw new PipelineError(
          ErrorCode.DuplicateOutput,
          `output ${output} is declared by both ${existing} and ${task.id}`,
          { output, tasks: [existing, task.id] }
        );
      }
      producers.set(key, task.id);
    }
  }

  const directories = directoryProducers(tasks);
  const dependencies = new Map<string, string[]>();
  const dependents = new Map<string, string[]>(tasks.map((t) => [t.id, []]));
  for (const task of tasks) {
    const deps: string[] = [];
    for (const input of task.inputs) {
      const key = normalizeRef(input);
      const producer = producers.get(key);
      if (producer !== undefined) {
        if (!deps.includes(producer)) deps.push(producer);
        continue;
      }
      if (rawInputs.has(key)) continue;
      const dirProducer = producerOfDirectory(directories, key);
      if (dirProducer !== undefined && dirProducer !== task.id) {
        if (!deps.includes(dirProducer)) deps.push(dirProducer);
        continue;
      }
      throw new PipelineError(
        ErrorCode.UnresolvedInput,
        `input ${input} of task ${task.id} is neither a raw input nor produced by any task`,
        { task: task.id, input }
      );
    }
    dependencies.set(task.id, deps);
    for (const dep of deps) dependents.get(dep)?.push(task.id);
  }

  const indegree = new Map(tasks.map((t) => [t.id, dependencies.get(t.id)?.length ?? 0]));
  const order: string[] = [];
  const placed = new Set<string>();
  while (order.length < tasks.length) {
    // Lowest declaration index among tasks with no unplaced dependencies.
    const next = tasks.find((t) => !placed.has(t.id) && indegree.get(t.id) === 0);
    if (!next) break;
    placed.add(next.id);
    order.push(next.id);
    for (const child of dependents.get(next.id) ?? []) {
      indegree.set(child, (indegree.get(child) ?? 0) - 1);
    }
  }

  if (order.length < tasks.length) {
    const remaining = tasks.filter((t) => !placed.has(t.id)).map((t) => t.id);
    const cycle = findCycle(remaining, dependencies);
    throw new PipelineError(ErrorCode.CycleDetected, `dependency cycle: ${cycle.join(" -> ")}`, { cycle });
  }

  return { tasks, byId, producers, dependencies, dependents, rawInputs, order };
}

export function rawInputsUsed(graph: TaskGraph): string[] {
  const used = new Set<string>();
  const directories = directoryProducers(graph.tasks);
  for (const task of graph.tasks) {
    for (const input of task.inputs) {
      const key = normalizeRef(input);
      if (graph.producers.has(key)) continue;
      if (graph.rawInputs.has(key) || producerOfDirectory(directories, key) === undefined) used.add(key);
    }
  }
  return [...used];
}

export async function checkRawInputs(graph: TaskGraph, exists: (p: string) => Promise<boolean>): Promise<void> {
  const missing: string[] = [];
  for (const input of rawInputsUsed(graph)) {
    if (!(await exists(input))) missing.push(input);
  }
  if (missing.length) {
    throw new PipelineError(ErrorCode.ConfigError, `raw input(s) missing before execution: ${missing.join(", ")}`, {
      missing
    });
  }
}

export function downstreamOf(graph: TaskGraph, roots: Iterable<string>): string[] {
  const seen = new Set<string>();
  const queue = [...roots];
  while (queue.length) {
    const id = queue.shift();
    if (id === undefined || seen.has(id)) continue;
    if (!graph.byId.has(id)) {
      throw new PipelineError(ErrorCode.ConfigError, `unknown task id: ${id}`);
    }
    seen.add(id);
    queue.push(...(graph.dependents.get(id) ?? []));
  }
  return graph.order.filter((id) => seen.has(id));
}
