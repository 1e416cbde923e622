import fs from "node:fs";
import path from "node:path";
import { loadConfig, CONFIG_DIR } from "../config/loader.js";
import { validateConfig, type ConfigValidationResult } from "../config/validator.js";
import { loadWorkflows } from "../ci/workflow.js";
import type { ReleaseManifest } from "../ci/publishers.js";
import { errorMessage, isDeployError, ConfigValidationFailure } from "../core/errors.js";
import { resolveEnvironment } from "../env/resolver.js";
import type { MelvinctlConfig } from "../types/config.js";
import { computeSha256 } from "../util/checksum.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

export type ValidateResult =
  | { ok: true; profiles: string[] }
  | { ok: false; errors: Diagnostic[]; exitCode: ExitCode };

function diag(level: Diagnostic["level"], code: string, message: string, file?: string): Diagnostic {
  return file ? { level, code, message, path: file } : { level, code, message };
}

function listProfiles(configDir: string, exclude: readonly string[]): string[] {
  if (!fs.existsSync(configDir)) return [];
  return fs
    .readdirSync(configDir, { withFileTypes: true })
    .filter((e) => e.isFile() && e.name.endsWith(".yaml") && !exclude.includes(e.name))
    .map((e) => e.name.slice(0, -".yaml".length))
    .sort();
}

function isAsset(v: unknown): v is ReleaseManifest["assets"][number] {
  return (
    typeof v === "object" &&
    v !== null &&
    "name" in v &&
    typeof v.name === "string" &&
    "sha256" in v &&
    typeof v.sha256 === "string"
  );
}

function isReleaseManifest(v: unknown): v is ReleaseManifest {
  return (
    typeof v === "object" &&
    v !== null &&
    "tag" in v &&
    typeof v.tag === "string" &&
    "assets" in v &&
    Array.isArray(v.assets) &&
    v.assets.every(isAsset)
  );
}

function checkProfile(configDir: string, profile: string | undefined, errors: Diagnostic[]): MelvinctlConfig | null {
  const label = profile ?? "base";
  const file = path.join(configDir, `${label}.yaml`);
  let res: ConfigValidationResult;
  try {
    res = validateConfig(loadConfig(profile, configDir, {}));
  } catch (e: unknown) {
    errors.push(diag("error", "CONFIG_READ_FAILED", `Failed to read config (${label}): ${errorMessage(e)}`, file));
    return null;
  }
  if (!res.valid) {
    errors.push(diag("error", "CONFIG_INVALID", `Config invalid (${label}): ${res.errors}`, file));
    return null;
  }

  try {
    resolveEnvironment(res.config.environment ?? {});
  } catch (e: unknown) {
    if (!(e instanceof ConfigValidationFailure)) throw e;
    for (const issue of e.issues) {
      errors.push(diag("error", "ENV_INVALID", `Environment invalid (${label}): ${issue.message}`, file));
    }
  }
  return res.config;
}

/** Every asset listed in a release manifest must exist and match its checksum. */
function checkReleases(releasesDir: string, errors: Diagnostic[]): void {
  if (!fs.existsSync(releasesDir)) return;
  for (const entry of fs.readdirSync(releasesDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const dir = path.join(releasesDir, entry.name);
    const manifestPath = path.join(dir, "manifest.json");
    if (!fs.existsSync(manifestPath)) {
      errors.push(diag("error", "RELEASE_MANIFEST_MISSING", `Missing release manifest: ${manifestPath}`, manifestPath));
      continue;
    }

    let manifest: unknown;
    try {
      manifest = JSON.parse(fs.readFileSync(manifestPath, "utf8"));
    } catch (e: unknown) {
      errors.push(diag("error", "RELEASE_MANIFEST_JSON_INVALID", `Invalid JSON manifest: ${errorMessage(e)}`, manifestPath));
      continue;
    }
    if (!isReleaseManifest(manifest)) {
      errors.push(diag("error", "RELEASE_MANIFEST_INVALID", `Release manifest lacks tag or assets`, manifestPath));
      continue;
    }

    for (const asset of manifest.assets) {
      const file = path.join(dir, path.basename(asset.name));
      if (!fs.existsSync(file)) {
        errors.push(diag("error", "RELEASE_ASSET_MISSING", `Missing release asset: ${file}`, file));
      } else if (computeSha256(file) !== asset.sha256) {
        errors.push(diag("error", "RELEASE_ASSET_CORRUPT", `Checksum mismatch for ${file}`, file));
      }
    }
  }
}

/**
 * Validate every profile, its file-provided environment and the workflow
 * definitions; optionally verify published releases against their manifests.
 */
export async function validateAll(opts: { configDir?: string; releases?: boolean }): Promise<ValidateResult> {
  const configDir = path.resolve(opts.configDir ?? CONFIG_DIR);
  if (!fs.existsSync(configDir)) {
    return {
      ok: false,
      errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)],
      exitCode: EXIT.CONFIG_INVALID
    };
  }

  const errors: Diagnostic[] = [];
  try {
    const base = checkProfile(configDir, undefined, errors);
    const workflowsFile = base?.ci?.workflows;
    const profiles = listProfiles(configDir, ["base.yaml", ...(workflowsFile ? [path.basename(workflowsFile)] : [])]);
    for (const profile of profiles) checkProfile(configDir, profile, errors);

    if (base?.ci && workflowsFile) {
      const file = path.resolve(configDir, workflowsFile);
      try {
        loadWorkflows(file);
      } catch (e: unknown) {
        if (!(e instanceof ConfigValidationFailure)) throw e;
        for (const issue of e.issues) errors.push(diag("error", "WORKFLOWS_INVALID", issue.message, file));
      }
      if (opts.releases) checkReleases(path.resolve(base.ci.releases_dir), errors);
    }

    if (errors.length > 0) return { ok: false, errors, exitCode: EXIT.CONFIG_INVALID };
    return { ok: true, profiles: ["base", ...profiles] };
  } catch (e: unknown) {
    const code = isDeployError(e) ? e.code : "VALIDATE_FAILED";
    return { ok: false, errors: [diag("error", code, errorMessage(e))], exitCode: EXIT.CONFIG_INVALID };
  }
}
