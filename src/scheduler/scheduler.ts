import { errorMessage } from "../core/errors.js";
import { branchStampsFor, type BranchSelection } from "../graph/branchSelector.js";
import type { Task, TaskState } from "../graph/task.js";
import { downstreamOf, type TaskGraph } from "../graph/taskGraph.js";
import type { ExecutionResult } from "../execution/backends/types.js";
import type { TaskExecutor } from "../execution/taskExecutor.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { allMarkersExist, type MarkerStore } from "../markers/markerStore.js";
import { applyFailurePolicy, type TaskOutcome } from "./softFailure.js";

export interface SchedulerObserver {
  taskSkipped(task: Task): Promise<void>;
  taskStarted(task: Task, threads: number): Promise<void>;
  taskFinished(task: Task, result: ExecutionResult, outcome: TaskOutcome): Promise<void>;
  taskFailed(task: Task, error: unknown, result: ExecutionResult | null): Promise<void>;
}

export interface PlannedTask {
  taskId: string;
  threads: number;
  failurePolicy: Task["failurePolicy"];
  group: string | null;
}

export interface ScheduleSummary {
  states: ReadonlyMap<string, TaskState>;
  // Dispatch order.
  executed: string[];
  skipped: string[];
  degraded: string[];
}

type Settled =
  | { ok: true; task: Task; threads: number; outcome: TaskOutcome }
  | { ok: false; task: Task; threads: number; error: unknown };

export class Scheduler {
  private readonly logger: Logger;

  constructor(
    private readonly deps: {
      concurrencyBudget: number;
      markers: MarkerStore;
      executor: TaskExecutor;
      observer?: SchedulerObserver;
      branches?: BranchSelection;
      logger?: Logger;
    }
  ) {
    if (!Number.isInteger(deps.concurrencyBudget) || deps.concurrencyBudget < 1) {
      throw new Error(`concurrency budget must be a positive integer, got ${deps.concurrencyBudget}`);
    }
    this.logger = deps.logger ?? silentLogger;
  }

  threadsFor(task: Task): number {
    return Math.max(1, Math.min(task.threads, this.deps.concurrencyBudget));
  }

  // Dry run. `rerun` names tasks to plan as if their markers (and those downstream) were removed.
  async plan(graph: TaskGraph, rerun: readonly string[] = []): Promise<PlannedTask[]> {
    const forced = new Set(rerun.length ? downstreamOf(graph, rerun) : []);
    const planned: PlannedTask[] = [];
    for (const id of graph.order) {
      const task = graph.byId.get(id);
      if (!task) continue;
      if (!forced.has(id) && (await allMarkersExist(this.deps.markers, task.outputs))) continue;
      planned.push({
        taskId: task.id,
        threads: this.threadsFor(task),
        failurePolicy: task.failurePolicy,
        group: task.group
      });
    }
    return planned;
  }

  // Removes the markers of the named tasks and of everything downstream of them.
  async invalidate(graph: TaskGraph, taskIds: readonly string[]): Promise<string[]> {
    const affected = downstreamOf(graph, taskIds);
    for (const id of affected) {
      const task = graph.byId.get(id);
      if (!task) continue;
      for (const output of task.outputs) {
        await this.deps.markers.remove(output);
      }
    }
    return affected;
  }

  async run(graph: TaskGraph): Promise<ScheduleSummary> {
    const budget = this.deps.concurrencyBudget;
    const states = new Map<string, TaskState>();
    const executed: string[] = [];
    const skipped: string[] = [];
    const degraded: string[] = [];

    for (const task of graph.tasks) {
      if (await allMarkersExist(this.deps.markers, task.outputs)) {
        states.set(task.id, "done");
        skipped.push(task.id);
        await this.deps.observer?.taskSkipped(task);
      } else {
        states.set(task.id, "pending");
      }
    }

    const inFlight = new Map<string, Promise<Settled>>();
    let threadsInUse = 0;
    let fatal: unknown = null;
    let failed = false;

    for (;;) {
      if (!failed) {
        for (const task of graph.tasks) {
          if (states.get(task.id) !== "pending") continue;
          const deps = graph.dependencies.get(task.id) ?? [];
          if (deps.every((dep) => states.get(dep) === "done")) states.set(task.id, "ready");
        }

        for (const task of graph.tasks) {
          if (states.get(task.id) !== "ready") continue;
          const threads = this.threadsFor(task);
          if (threadsInUse + threads > budget) continue;

          states.set(task.id, "running");
          threadsInUse += threads;
          executed.push(task.id);
          this.logger.debug("dispatch", { task: task.id, threads, in_use: threadsInUse, group: task.group });
          inFlight.set(task.id, this.runTask(task, threads));
        }
      }

      if (inFlight.size === 0) break;

      const settled = await Promise.race(inFlight.values());
      inFlight.delete(settled.task.id);
      threadsInUse -= settled.threads;

      if (settled.ok) {
        states.set(settled.task.id, "done");
        if (settled.outcome.degraded) degraded.push(settled.task.id);
      } else {
        states.set(settled.task.id, "failed");
        if (!failed) {
          failed = true;
          fatal = settled.error;
          if (inFlight.size) {
            this.logger.warn("task failed; waiting for in-flight tasks", {
              task: settled.task.id,
              in_flight: [...inFlight.keys()]
            });
          }
        }
      }
    }

    if (failed) throw fatal;

    const unfinished = [...states].filter(([, state]) => state !== "done").map(([id]) => id);
    if (unfinished.length) {
      throw new Error(`scheduler stopped with unfinished tasks: ${unfinished.join(", ")}`);
    }

    return { states, executed, skipped, degraded };
  }

  private async runTask(task: Task, threads: number): Promise<Settled> {
    let result: ExecutionResult | null = null;
    try {
      await this.deps.observer?.taskStarted(task, threads);
      result = await this.deps.executor.execute(task, { threads });
      const outcome = await applyFailurePolicy(task, result, this.deps.markers);
      await this.stampBranch(task);
      if (outcome.degraded) {
        this.logger.warn("soft-fail task exited non-zero; output may be empty", {
          task: task.id,
          exit_code: outcome.exitCode,
          stderr: result.stderrPath
        });
      }
      await this.deps.observer?.taskFinished(task, result, outcome);
      return { ok: true, task, threads, outcome };
    } catch (error) {
      try {
        await this.deps.observer?.taskFailed(task, error, result);
      } catch (observerError) {
        this.logger.error("failed to record task failure", { task: task.id, error: errorMessage(observerError) });
      }
      return { ok: false, task, threads, error };
    }
  }

  private async stampBranch(task: Task): Promise<void> {
    if (!this.deps.branches) return;
    const stamps = branchStampsFor(this.deps.branches, task.id);
    if (!stamps) return;
    for (const stale of stamps.clear) {
      await this.deps.markers.remove(stale);
    }
    await this.deps.markers.write(stamps.write);
  }
}
