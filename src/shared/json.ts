import path from "node:path";
import { readFile } from "node:fs/promises";
import { validateAgainstSchema } from "../quality/schema_validator.ts";

export async function readJson(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Could not parse JSON in ${path.basename(filePath)}: ${reason}`);
  }
}

export async function loadJson<T>(filePath: string, schemaPath?: string): Promise<T> {
  const data = await readJson(path.resolve(filePath));
  if (schemaPath) {
    await validateAgainstSchema(data, schemaPath);
  }
  return data as T;
}
