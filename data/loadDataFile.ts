import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ZodType, ZodTypeDef } from "zod";

const __filename = fileURLToPath(import.meta.url);
const DATA_DIR = path.dirname(__filename);

/**
 * Reads a JSON table shipped beside this module and validates it.
 * Tables are static, so callers load them once at module scope.
 */
export function loadDataFile<T>(
  file: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): T {
  const fullPath = path.join(DATA_DIR, file);
  const raw = fs.readFileSync(fullPath, "utf-8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse data file JSON (${file}): ${message}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `Data file schema validation failed for ${file}: ${result.error.message}`
    );
  }

  return result.data;
}
