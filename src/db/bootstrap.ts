import { promises as fs } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import type * as pg from "pg";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

// src/db -> <root>/db, dist/src/db -> <root>/db
const SCHEMA_CANDIDATES = [
  path.resolve(moduleDir, "../../db/schema.sql"),
  path.resolve(moduleDir, "../../../db/schema.sql")
];

export async function locateSchemaFile(): Promise<string> {
  for (const candidate of SCHEMA_CANDIDATES) {
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      continue;
    }
  }
  throw new Error(`db/schema.sql not found (looked in ${SCHEMA_CANDIDATES.join(", ")})`);
}

export async function applySqlFile(pool: pg.Pool, filePath: string): Promise<void> {
  const sql = await fs.readFile(filePath, "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}

export async function applySchema(pool: pg.Pool): Promise<void> {
  await applySqlFile(pool, await locateSchemaFile());
}
