import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  getSchema: (id: string) => AjvValidateFn | undefined;
  errorsText: (errors: unknown, opts?: { separator?: string; dataVar?: string }) => string;
};

/** A compiled schema: narrows on success, explains on failure. */
export type SchemaGuard<T> = {
  check: (data: unknown) => data is T;
  explain: () => string;
};

export const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

let shared: AjvInstance | null = null;

export function loadAjv(): AjvInstance {
  if (shared) return shared;

  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  shared = ajv;
  return ajv;
}

/**
 * Compile a schema into a type guard for `T`.
 * The caller owns the claim that the schema describes `T`.
 */
export function compileGuard<T>(schema: unknown, dataVar = "config"): SchemaGuard<T> {
  const ajv = loadAjv();
  const id = schemaId(schema);
  const validate = (id ? ajv.getSchema(id) : undefined) ?? ajv.compile(schema);
  return {
    check: (data: unknown): data is T => validate(data),
    explain: () => ajv.errorsText(validate.errors, { separator: "; ", dataVar })
  };
}

function schemaId(schema: unknown): string | undefined {
  if (typeof schema === "object" && schema !== null && "$id" in schema && typeof schema.$id === "string") {
    return schema.$id;
  }
  return undefined;
}

/** Load `<name>.schema.json` from the bundled schemas directory. */
export function readSchema(name: string, schemaDir: string = SCHEMA_DIR): unknown {
  const file = path.join(schemaDir, `${name}.schema.json`);
  if (!fs.existsSync(file)) {
    throw new Error(`Missing schema: ${file}`);
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  return parsed;
}
