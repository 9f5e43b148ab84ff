import type { ReadInputMode } from "../config/config.js";
import { ErrorCode, PipelineError } from "../core/errors.js";
import { anyMarkerExists, type MarkerStore } from "../markers/markerStore.js";
import type { TaskDeclaration } from "./task.js";

export interface BranchGroup {
  logicalOutput: string;
  chosen: TaskDeclaration | null;
  dropped: TaskDeclaration[];
}

export interface BranchSelection {
  mode: ReadInputMode;
  selected: TaskDeclaration[];
  groups: BranchGroup[];
}

function slug(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]+/g, "_");
}

export function branchStampRef(logicalOutput: string, taskId: string): string {
  return `.binflow/branches/${slug(logicalOutput)}/${slug(taskId)}`;
}

export function selectBranches(declarations: TaskDeclaration[], mode: ReadInputMode): BranchSelection {
  const groups = new Map<string, TaskDeclaration[]>();
  for (const decl of declarations) {
    if (!decl.variant) continue;
    const list = groups.get(decl.variant.logicalOutput) ?? [];
    list.push(decl);
    groups.set(decl.variant.logicalOutput, list);
  }

  const keep = new Set<string>();
  const resolved: BranchGroup[] = [];
  for (const [logicalOutput, variants] of groups) {
    const matching = variants.filter((v) => v.variant?.modes.includes(mode));
    if (matching.length > 1) {
      throw new PipelineError(
        ErrorCode.ConfigError,
        `read mode ${mode} enables more than one variant of ${logicalOutput}: ${matching.map((m) => m.id).join(", ")}`
      );
    }
    const chosen = matching[0] ?? null;
    if (chosen) keep.add(chosen.id);
    resolved.push({ logicalOutput, chosen, dropped: variants.filter((v) => v !== chosen) });
  }

  return {
    mode,
    selected: declarations.filter((d) => !d.variant || keep.has(d.id)),
    groups: resolved
  };
}

// Stamp bookkeeping for a finished task: which stamp to write, which sibling stamps to clear.
export function branchStampsFor(selection: BranchSelection, taskId: string): { write: string; clear: string[] } | null {
  for (const group of selection.groups) {
    if (group.chosen?.id !== taskId) continue;
    return {
      write: branchStampRef(group.logicalOutput, taskId),
      clear: group.dropped.map((d) => branchStampRef(group.logicalOutput, d.id))
    };
  }
  return null;
}

export async function assertBranchState(selection: BranchSelection, markers: MarkerStore): Promise<void> {
  for (const group of selection.groups) {
    if (!group.chosen) continue;
    if (!(await anyMarkerExists(markers, group.chosen.outputs))) continue;

    const foreign: string[] = [];
    for (const dropped of group.dropped) {
      if (await markers.exists(branchStampRef(group.logicalOutput, dropped.id))) foreign.push(dropped.id);
    }
    if (foreign.length) {
      throw new PipelineError(
        ErrorCode.AmbiguousBranchState,
        `${group.logicalOutput} already exists from variant(s) ${foreign.join(", ")} but read mode ${selection.mode} selects ${group.chosen.id}; remove the stale outputs or rerun ${group.chosen.id}`,
        { logical_output: group.logicalOutput, selected: group.chosen.id, foreign }
      );
    }
  }
}
