import type { ReadInputMode } from "../config/config.js";
import type { JsonObject } from "../core/json.js";

export type FailurePolicy = "strict" | "soft_fail";

export type TaskState = "pending" | "ready" | "running" | "done" | "failed";

export interface ExternalInvocation {
  kind: "external";
  program: string;
  // Tokens: {threads} {input.N} {output.N} {outdir.N} {param.KEY}
  args: string[];
  // Key into execution.docker.images when the docker backend is selected.
  image?: string;
}

export interface InternalInvocation {
  kind: "internal";
  handler: string;
}

export type TaskInvocation = ExternalInvocation | InternalInvocation;

export interface BranchVariant {
  logicalOutput: string;
  modes: ReadInputMode[];
}

export interface TaskDeclaration {
  id: string;
  inputs: string[];
  outputs: string[];
  outputDirs?: string[];
  params?: JsonObject;
  threads?: number;
  group?: string;
  failurePolicy?: FailurePolicy;
  invocation: TaskInvocation;
  variant?: BranchVariant;
}

export interface Task {
  readonly id: string;
  readonly index: number;
  readonly inputs: readonly string[];
  readonly outputs: readonly string[];
  readonly outputDirs: readonly string[];
  readonly params: JsonObject;
  readonly threads: number;
  readonly group: string | null;
  readonly failurePolicy: FailurePolicy;
  readonly invocation: TaskInvocation;
  readonly variant: BranchVariant | null;
}

export function normalizeTask(decl: TaskDeclaration, index: number): Task {
  return {
    id: decl.id,
    index,
    inputs: [...decl.inputs],
    outputs: [...decl.outputs],
    outputDirs: [...(decl.outputDirs ?? [])],
    params: decl.params ?? {},
    threads: decl.threads ?? 1,
    group: decl.group ?? null,
    failurePolicy: decl.failurePolicy ?? "strict",
    invocation: decl.invocation,
    variant: decl.variant ?? null
  };
}
