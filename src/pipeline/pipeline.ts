import { promises as fs } from "fs";
import { rawInputPaths, validateInputs, type PipelineConfig } from "../config/config.js";
import { newRunId, type RunId } from "../core/ids.js";
import { DefaultTaskExecutor, type InternalStageHandler, type TaskExecutor } from "../execution/taskExecutor.js";
import { createPipelineWorkspace, type PipelineWorkspace } from "../execution/workspace.js";
import type { RunnerBackend } from "../execution/backends/types.js";
import { assertBranchState, selectBranches } from "../graph/branchSelector.js";
import type { TaskDeclaration } from "../graph/task.js";
import { buildTaskGraph, checkRawInputs } from "../graph/taskGraph.js";
import type { Logger } from "../logging/logger.js";
import { FileMarkerStore, type MarkerStore } from "../markers/markerStore.js";
import { PipelineRun } from "../runs/pipelineRun.js";
import { Scheduler, type PlannedTask, type ScheduleSummary } from "../scheduler/scheduler.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { recoverWorkflow } from "../workflow/recover.js";
import { createRecoverStages } from "../workflow/stages.js";

export interface PipelineDeps {
  store: PostgresStore;
  logger: Logger;
  workflow?: (config: PipelineConfig) => TaskDeclaration[];
  handlers?: ReadonlyMap<string, InternalStageHandler>;
  markers?: MarkerStore;
  local?: RunnerBackend<"local_process">;
  docker?: RunnerBackend<"docker">;
  // Replaces the backend-driven executor entirely.
  executor?: TaskExecutor;
}

export type PipelineOutcome =
  | { kind: "dry_run"; runId: RunId; workspace: PipelineWorkspace; plan: PlannedTask[] }
  | { kind: "completed"; runId: RunId; workspace: PipelineWorkspace; summary: ScheduleSummary; invalidated: string[] };

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function runPipeline(config: PipelineConfig, deps: PipelineDeps): Promise<PipelineOutcome> {
  const logger = deps.logger;
  const workspace = await createPipelineWorkspace(config.output);
  const markers = deps.markers ?? new FileMarkerStore(workspace.rootDir);
  const run = new PipelineRun({ store: deps.store, workspace, logger }, { runId: newRunId(), config });
  await run.start();
  logger.info(`run ${run.runId} started`, { output: workspace.rootDir, read_mode: config.readInputMode });

  try {
    await validateInputs(config, { exists: pathExists, warn: (message, context) => logger.warn(message, context) });

    const workflow = deps.workflow ?? recoverWorkflow;
    const selection = selectBranches(workflow(config), config.readInputMode);
    for (const group of selection.groups) {
      await run.event(
        "branch.selected",
        `${group.logicalOutput} <- ${group.chosen?.id ?? "(none)"}`,
        { logical_output: group.logicalOutput, chosen: group.chosen?.id ?? null, dropped: group.dropped.map((d) => d.id) }
      );
    }

    const graph = buildTaskGraph(selection.selected, { rawInputs: rawInputPaths(config) });
    await checkRawInputs(graph, (p) => pathExists(workspace.resolve(p)));

    const handlers = new Map(createRecoverStages(config));
    for (const [name, handler] of deps.handlers ?? []) handlers.set(name, handler);
    const executor =
      deps.executor ??
      new DefaultTaskExecutor({ config, workspace, logger, handlers, local: deps.local, docker: deps.docker });

    const scheduler = new Scheduler({
      concurrencyBudget: config.concurrencyBudget,
      markers,
      executor,
      observer: run,
      branches: selection,
      logger: logger.child("scheduler")
    });

    if (config.dryRun) {
      const plan = await scheduler.plan(graph, config.rerun);
      for (const step of plan) {
        logger.info(`would run ${step.taskId}`, { threads: step.threads, policy: step.failurePolicy });
      }
      await run.finishSuccess({ dry_run: true, planned: plan.map((p) => p.taskId) }, `dry run: ${plan.length} task(s)`);
      return { kind: "dry_run", runId: run.runId, workspace, plan };
    }

    const invalidated = config.rerun.length ? await scheduler.invalidate(graph, config.rerun) : [];
    if (invalidated.length) {
      await run.event("run.invalidated", `${invalidated.length} task(s) forced to rerun`, { tasks: invalidated });
    }
    await assertBranchState(selection, markers);

    const summary = await scheduler.run(graph);
    await run.finishSuccess(
      { executed: summary.executed, skipped: summary.skipped, degraded: summary.degraded },
      `${summary.executed.length} executed, ${summary.skipped.length} skipped, ${summary.degraded.length} degraded`
    );
    if (summary.degraded.length) {
      logger.warn(`completed with degraded task(s): ${summary.degraded.join(", ")}`);
    }
    logger.info(`run ${run.runId} finished`, { log: run.logPath });
    return { kind: "completed", runId: run.runId, workspace, summary, invalidated };
  } catch (err) {
    await run.finishFailure(err);
    throw err;
  }
}
