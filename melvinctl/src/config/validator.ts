import { compileGuard, readSchema } from "../schema/ajv.js";
import type { MelvinctlConfig, TargetConfig } from "../types/config.js";
import { ConfigValidationFailure } from "../core/errors.js";
import { loadConfig, CONFIG_DIR } from "./loader.js";

export type ConfigValidationResult =
  | { valid: true; config: MelvinctlConfig }
  | { valid: false; errors: string };

/** Validate a loaded config against config.schema.json plus cross-field rules. */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const guard = compileGuard<MelvinctlConfig>(readSchema("config"));
  if (!guard.check(raw)) {
    return { valid: false, errors: guard.explain() };
  }

  if (!raw.targets[raw.default_target]) {
    return { valid: false, errors: `default_target "${raw.default_target}" is not a configured target` };
  }

  for (const [name, target] of Object.entries(raw.targets)) {
    if (target.kind === "container" && !target.sshd_path) {
      return { valid: false, errors: `target "${name}" is a container target without sshd_path` };
    }
  }

  return { valid: true, config: raw };
}

/**
 * Load and validate in one step.
 * @throws ConfigValidationFailure with the schema errors
 */
export function loadValidatedConfig(opts: { profile?: string; configDir?: string; env?: NodeJS.ProcessEnv } = {}): MelvinctlConfig {
  const raw = loadConfig(opts.profile, opts.configDir ?? CONFIG_DIR, opts.env ?? process.env);
  const res = validateConfig(raw);
  if (!res.valid) {
    throw new ConfigValidationFailure([{ name: opts.profile ?? "base", problem: "malformed", message: res.errors }]);
  }
  return res.config;
}

export function resolveTarget(config: MelvinctlConfig, name?: string): { name: string; target: TargetConfig } {
  const key = name ?? config.default_target;
  const target = config.targets[key];
  if (!target) {
    throw new Error(`Unknown target "${key}". Configured: ${Object.keys(config.targets).sort().join(", ")}`);
  }
  return { name: key, target };
}
