import type { JsonObject } from "./json.js";

export const ErrorCode = {
  ConfigError: "ConfigError",
  CycleDetected: "CycleDetected",
  UnresolvedInput: "UnresolvedInput",
  DuplicateOutput: "DuplicateOutput",
  ToolFailure: "ToolFailure",
  AmbiguousBranchState: "AmbiguousBranchState"
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class PipelineError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly data: JsonObject | null = null
  ) {
    super(`${code}: ${message}`);
    this.name = "PipelineError";
  }
}

export function isPipelineError(err: unknown, code?: ErrorCode): err is PipelineError {
  if (!(err instanceof PipelineError)) return false;
  return code === undefined || err.code === code;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
