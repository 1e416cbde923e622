import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

/** Top-level keys that may be overridden from MELVINCTL_<KEY> variables. */
export const ENV_OVERRIDABLE = ["runs_dir", "default_target"] as const;

const ENV_PREFIX = "MELVINCTL_";

type Doc = Record<string, unknown>;

function isDoc(v: unknown): v is Doc {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Doc, override: Doc): Doc {
  const result: Doc = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const prev = result[key];
    if (isDoc(val) && isDoc(prev)) {
      result[key] = deepMerge(prev, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Doc {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isDoc(parsed)) {
    throw new Error(`Config file is not a mapping: ${filePath}`);
  }
  return parsed;
}

/** Apply MELVINCTL_ prefixed overrides for the flat top-level keys. */
function applyEnvOverrides(config: Doc, env: NodeJS.ProcessEnv): Doc {
  const result = { ...config };
  for (const key of ENV_OVERRIDABLE) {
    const value = env[`${ENV_PREFIX}${key.toUpperCase()}`];
    if (value !== undefined && value !== "") result[key] = value;
  }
  return result;
}

/**
 * Load layered config: base.yaml ← <profile>.yaml ← environment variables.
 * The result is unvalidated; pass it through `validateConfig`.
 *
 * @param profile - Optional profile name (e.g. "container", "evaluation").
 */
export function loadConfig(profile?: string, configDir: string = CONFIG_DIR, env: NodeJS.ProcessEnv = process.env): unknown {
  const base = loadYaml(path.join(configDir, "base.yaml"));

  let merged = base;
  if (profile) {
    const profilePath = path.join(configDir, `${profile}.yaml`);
    if (!fs.existsSync(profilePath)) {
      throw new Error(`Unknown config profile: ${profile} (${profilePath} not found)`);
    }
    merged = deepMerge(base, loadYaml(profilePath));
  }

  return applyEnvOverrides(merged, env);
}
