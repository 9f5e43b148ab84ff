import { ErrorCode, PipelineError } from "../core/errors.js";
import type { JsonValue } from "../core/json.js";
import type { ExternalInvocation, Task } from "../graph/task.js";

const TOKEN = /\{([a-z]+)(?:\.([A-Za-z0-9_]+))?\}/g;

export interface RenderContext {
  threads: number;
  resolve(ref: string): string;
}

function paramToArgs(task: Task, key: string, value: JsonValue | undefined): string[] {
  if (value === undefined) {
    throw new PipelineError(ErrorCode.ConfigError, `task ${task.id} references unknown param ${key}`);
  }
  if (value === null) return [];
  if (Array.isArray(value)) return value.map((v) => (typeof v === "string" ? v : JSON.stringify(v)));
  if (typeof value === "object") return [JSON.stringify(value)];
  return [String(value)];
}

function pick(task: Task, list: readonly string[], kind: string, index: string | undefined): string {
  const n = Number(index);
  const value = Number.isInteger(n) ? list[n] : undefined;
  if (value === undefined) {
    throw new PipelineError(ErrorCode.ConfigError, `task ${task.id} references missing ${kind}.${index ?? ""}`);
  }
  return value;
}

function resolveToken(task: Task, ctx: RenderContext, name: string, key: string | undefined): string[] {
  switch (name) {
    case "threads":
      return [String(ctx.threads)];
    case "input":
      return [ctx.resolve(pick(task, task.inputs, "input", key))];
    case "output":
      return [ctx.resolve(pick(task, task.outputs, "output", key))];
    case "outdir":
      return [ctx.resolve(pick(task, task.outputDirs, "outdir", key))];
    case "param":
      if (!key) throw new PipelineError(ErrorCode.ConfigError, `task ${task.id} has a {param} token without a key`);
      return paramToArgs(task, key, task.params[key]);
    default:
      throw new PipelineError(ErrorCode.ConfigError, `task ${task.id} uses unknown token {${name}}`);
  }
}

// An argument that is exactly one token may expand to several argv entries (list params);
// tokens embedded in a larger argument are joined with spaces.
export function renderArgs(task: Task, invocation: ExternalInvocation, ctx: RenderContext): string[] {
  const argv: string[] = [invocation.program];
  for (const template of invocation.args) {
    const whole = /^\{([a-z]+)(?:\.([A-Za-z0-9_]+))?\}$/.exec(template);
    if (whole) {
      const [, name, key] = whole;
      argv.push(...resolveToken(task, ctx, name ?? "", key));
      continue;
    }
    argv.push(template.replace(TOKEN, (_match, name: string, key: string | undefined) => resolveToken(task, ctx, name, key).join(" ")));
  }
  return argv;
}
