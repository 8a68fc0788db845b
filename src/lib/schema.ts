import { existsSync, readFileSync } from "fs";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";

export const SCHEMA_FILE = "sql/schema.sql";

/**
 * Locate sql/schema.sql by walking up from a module of this project.
 * Works from the TypeScript sources and from the compiled dist/ tree.
 */
export function findSchemaFile(moduleUrl: string): string {
  const start = dirname(fileURLToPath(moduleUrl));
  let dir = start;
  for (;;) {
    const candidate = resolve(dir, SCHEMA_FILE);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`${SCHEMA_FILE} not found above ${start}`);
    }
    dir = parent;
  }
}

export function readSchema(moduleUrl: string): { path: string; sql: string } {
  const path = findSchemaFile(moduleUrl);
  return { path, sql: readFileSync(path, "utf8") };
}
