import { readFile } from "node:fs/promises";
import path from "node:path";
import Ajv2020 from "ajv/dist/2020.js";
import type { ErrorObject, ValidateFunction } from "ajv";

const ajv = new Ajv2020({
  allErrors: true,
  strict: false,
  validateFormats: false
});
const validatorBySchemaPath = new Map<string, ValidateFunction>();

async function compileSchema(schemaPath: string): Promise<ValidateFunction> {
  const cached = validatorBySchemaPath.get(schemaPath);
  if (cached) {
    return cached;
  }
  const raw = await readFile(schemaPath, "utf-8");
  const schema = JSON.parse(raw) as object;
  const validate = ajv.compile(schema);
  validatorBySchemaPath.set(schemaPath, validate);
  return validate;
}

export function formatSchemaErrors(errors: readonly ErrorObject[] | null | undefined): string {
  return (errors ?? [])
    .map((error) => {
      const where = error.instancePath || "/";
      return `${where} ${error.message ?? "validation error"}`;
    })
    .join("; ");
}

export async function validateAgainstSchema(data: unknown, schemaPath: string): Promise<void> {
  const resolvedSchemaPath = path.resolve(schemaPath);
  const validate = await compileSchema(resolvedSchemaPath);
  if (validate(data)) {
    return;
  }

  throw new Error(
    `Schema validation failed (${path.basename(resolvedSchemaPath)}): ${formatSchemaErrors(validate.errors)}`
  );
}
