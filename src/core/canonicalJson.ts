import { createHash } from "crypto";
import type { JsonObject } from "./json.js";

export function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

export function sha256Prefixed(data: string | Buffer): `sha256:${string}` {
  return `sha256:${sha256Hex(data)}` as const;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    (Object.getPrototypeOf(value) === Object.prototype || Object.getPrototypeOf(value) === null)
  );
}

export function canonicalizeJson(value: unknown): unknown {
  if (value === undefined) return undefined;
  if (value === null) return null;

  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    if (Object.is(value, -0)) return 0;
    return value;
  }

  if (typeof value === "string" || typeof value === "boolean") return value;

  if (Array.isArray(value)) {
    return value.map((v) => {
      const c = canonicalizeJson(v);
      return c === undefined ? null : c;
    });
  }

  if (value instanceof Map) {
    return canonicalizeJson(Object.fromEntries(value));
  }

  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    const keys = Object.keys(value).sort();
    for (const key of keys) {
      const c = canonicalizeJson(value[key]);
      if (c !== undefined) out[key] = c;
    }
    return out;
  }

  throw new Error("value is not JSON-serializable");
}

export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(canonicalizeJson(value));
}

export function toJsonObject(value: unknown): JsonObject {
  const canonical = canonicalizeJson(value);
  if (canonical === null || typeof canonical !== "object" || Array.isArray(canonical)) {
    throw new Error("value does not serialize to a JSON object");
  }
  return canonical as JsonObject;
}
