import { describe, it, expect } from "vitest";
import { ErrorCode } from "../src/core/errors.js";
import type { ExecutionResult } from "../src/execution/backends/types.js";
import type { TaskAllocation, TaskExecutor } from "../src/execution/taskExecutor.js";
import { branchStampRef, selectBranches } from "../src/graph/branchSelector.js";
import type { Task, TaskDeclaration } from "../src/graph/task.js";
import { buildTaskGraph } from "../src/graph/taskGraph.js";
import { InMemoryMarkerStore } from "../src/markers/markerStore.js";
import { Scheduler, type SchedulerObserver } from "../src/scheduler/scheduler.js";
import type { TaskOutcome } from "../src/scheduler/softFailure.js";

class FakeExecutor implements TaskExecutor {
  readonly calls: string[] = [];
  readonly threads = new Map<string, number>();
  inUse = 0;
  peak = 0;

  constructor(private readonly exitCodes: Record<string, number> = {}) {}

  async execute(task: Task, allocation: TaskAllocation): Promise<ExecutionResult> {
    this.calls.push(task.id);
    this.threads.set(task.id, allocation.threads);
    this.inUse += allocation.threads;
    this.peak = Math.max(this.peak, this.inUse);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.inUse -= allocation.threads;
    return {
      exitCode: this.exitCodes[task.id] ?? 0,
      stdoutPath: `/logs/${task.id}.stdout.log`,
      stderrPath: `/logs/${task.id}.stderr.log`,
      startedAt: "2026-01-01T00:00:00.000Z",
      finishedAt: "2026-01-01T00:00:01.000Z"
    };
  }
}

class RecordingObserver implements SchedulerObserver {
  readonly events: string[] = [];
  async taskSkipped(task: Task): Promise<void> {
    this.events.push(`skip:${task.id}`);
  }
  async taskStarted(task: Task, threads: number): Promise<void> {
    this.events.push(`start:${task.id}:${threads}`);
  }
  async taskFinished(task: Task, _result: ExecutionResult, outcome: TaskOutcome): Promise<void> {
    this.events.push(`${outcome.degraded ? "degraded" : "done"}:${task.id}`);
  }
  async taskFailed(task: Task): Promise<void> {
    this.events.push(`failed:${task.id}`);
  }
}

function t(id: string, inputs: string[], extra: Partial<TaskDeclaration> = {}): TaskDeclaration {
  return { id, inputs, outputs: [`${id}.out`], invocation: { kind: "external", program: id, args: [] }, ...extra };
}

const pipeline: TaskDeclaration[] = [
  t("coverage", ["/raw/contigs.fa"], { threads: 4 }),
  t("metabat2", ["coverage.out"], { threads: 4, failurePolicy: "soft_fail" }),
  t("concoct", ["coverage.out"], { threads: 4, failurePolicy: "soft_fail" }),
  t("vamb", ["coverage.out"], { threads: 4, failurePolicy: "soft_fail" }),
  t("consensus", ["metabat2.out", "concoct.out", "vamb.out"])
];

function graphOf(decls: TaskDeclaration[]) {
  return buildTaskGraph(decls, { rawInputs: ["/raw/contigs.fa"] });
}

describe("Scheduler", () => {
  it("runs every task once, respecting dependencies, and leaves every marker", async () => {
    const markers = new InMemoryMarkerStore();
    const executor = new FakeExecutor();
    const summary = await new Scheduler({ concurrencyBudget: 8, markers, executor }).run(graphOf(pipeline));

    expect(executor.calls[0]).toBe("coverage");
    expect(executor.calls[executor.calls.length - 1]).toBe("consensus");
    expect([...executor.calls].sort()).toEqual(["concoct", "consensus", "coverage", "metabat2", "vamb"]);
    expect(summary.executed).toEqual(executor.calls);
    expect([...summary.states.values()].every((s) => s === "done")).toBe(true);
    for (const decl of pipeline) {
      expect(await markers.exists(`${decl.id}.out`)).toBe(true);
    }
  });

  it("never exceeds the thread budget and backfills in declaration order", async () => {
    const executor = new FakeExecutor();
    const summary = await new Scheduler({ concurrencyBudget: 8, markers: new InMemoryMarkerStore(), executor }).run(
      graphOf(pipeline)
    );
    expect(executor.peak).toBe(8);
    expect(summary.executed.slice(1, 3)).toEqual(["metabat2", "concoct"]);
  });

  it("clamps a request larger than the whole budget", async () => {
    const executor = new FakeExecutor();
    const scheduler = new Scheduler({ concurrencyBudget: 2, markers: new InMemoryMarkerStore(), executor });
    await scheduler.run(graphOf(pipeline));
    expect(executor.threads.get("coverage")).toBe(2);
    expect(executor.peak).toBe(2);
  });

  it("performs no invocations on a second run over the same state", async () => {
    const markers = new InMemoryMarkerStore();
    const first = new FakeExecutor();
    await new Scheduler({ concurrencyBudget: 8, markers, executor: first }).run(graphOf(pipeline));

    const second = new FakeExecutor();
    const observer = new RecordingObserver();
    const summary = await new Scheduler({ concurrencyBudget: 8, markers, executor: second, observer }).run(graphOf(pipeline));
    expect(second.calls).toEqual([]);
    expect(summary.skipped).toEqual(["coverage", "metabat2", "concoct", "vamb", "consensus"]);
    expect(observer.events).toEqual(["skip:coverage", "skip:metabat2", "skip:concoct", "skip:vamb", "skip:consensus"]);
  });

  it("absorbs soft failures as degraded tasks", async () => {
    const markers = new InMemoryMarkerStore();
    const observer = new RecordingObserver();
    const executor = new FakeExecutor({ concoct: 1 });
    const summary = await new Scheduler({ concurrencyBudget: 8, markers, executor, observer }).run(graphOf(pipeline));

    expect(summary.degraded).toEqual(["concoct"]);
    expect(await markers.exists("concoct.out")).toBe(true);
    expect(executor.calls).toContain("consensus");
    expect(observer.events).toContain("degraded:concoct");
  });

  it("stops dispatching on a strict failure, drains in-flight tasks, then fails", async () => {
    const markers = new InMemoryMarkerStore();
    const observer = new RecordingObserver();
    const decls = [
      t("a", [], { threads: 1 }),
      t("b", [], { threads: 1 }),
      t("c", ["a.out"], { threads: 1 })
    ];
    const executor = new FakeExecutor({ a: 2 });
    const scheduler = new Scheduler({ concurrencyBudget: 4, markers, executor, observer });

    await expect(scheduler.run(graphOf(decls))).rejects.toMatchObject({ code: ErrorCode.ToolFailure });
    expect(executor.calls).toEqual(["a", "b"]);
    expect(await markers.exists("a.out")).toBe(false);
    expect(await markers.exists("b.out")).toBe(true);
    expect(observer.events).toContain("failed:a");
    expect(observer.events).toContain("done:b");
  });

  it("plans only the tasks without markers, plus forced reruns", async () => {
    const markers = new InMemoryMarkerStore(["coverage.out", "metabat2.out"]);
    const scheduler = new Scheduler({ concurrencyBudget: 8, markers, executor: new FakeExecutor() });
    const graph = graphOf(pipeline);

    expect((await scheduler.plan(graph)).map((p) => p.taskId)).toEqual(["concoct", "vamb", "consensus"]);
    expect((await scheduler.plan(graph, ["metabat2"])).map((p) => p.taskId)).toEqual([
      "metabat2",
      "concoct",
      "vamb",
      "consensus"
    ]);
    expect(await markers.exists("metabat2.out")).toBe(true);
  });

  it("invalidates the named tasks and everything downstream", async () => {
    const markers = new InMemoryMarkerStore(pipeline.map((d) => `${d.id}.out`));
    const executor = new FakeExecutor();
    const scheduler = new Scheduler({ concurrencyBudget: 8, markers, executor });
    const graph = graphOf(pipeline);

    expect(await scheduler.invalidate(graph, ["vamb"])).toEqual(["vamb", "consensus"]);
    const summary = await scheduler.run(graph);
    expect(executor.calls).toEqual(["vamb", "consensus"]);
    expect(summary.skipped).toEqual(["coverage", "metabat2", "concoct"]);
  });

  it("stamps the variant that ran and clears its siblings", async () => {
    const shared = "data/cov.tsv";
    const decls: TaskDeclaration[] = [
      { ...t("cov_paired", []), outputs: [shared], variant: { logicalOutput: shared, modes: ["paired"] } },
      { ...t("cov_interleaved", []), outputs: [shared], variant: { logicalOutput: shared, modes: ["interleaved"] } }
    ];
    const selection = selectBranches(decls, "interleaved");
    const markers = new InMemoryMarkerStore([branchStampRef(shared, "cov_paired")]);
    await new Scheduler({ concurrencyBudget: 1, markers, executor: new FakeExecutor(), branches: selection }).run(
      buildTaskGraph(selection.selected, { rawInputs: [] })
    );

    expect(await markers.exists(branchStampRef(shared, "cov_interleaved"))).toBe(true);
    expect(await markers.exists(branchStampRef(shared, "cov_paired"))).toBe(false);
  });

  it("rejects a non-positive budget", () => {
    expect(() => new Scheduler({ concurrencyBudget: 0, markers: new InMemoryMarkerStore(), executor: new FakeExecutor() })).toThrow(
      "concurrency budget must be a positive integer, got 0"
    );
  });
});
