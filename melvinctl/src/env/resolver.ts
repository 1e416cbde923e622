import { compileGuard, type SchemaGuard } from "../schema/ajv.js";
import { ConfigValidationFailure, type ConfigIssue } from "../core/errors.js";
import { TOGGLES, TOGGLE_NAMES, isToggleName, type ToggleKind, type ToggleName } from "./toggles.js";

/** Validated, immutable runtime configuration for one launched session. */
export type EnvironmentConfiguration = Readonly<{
  drsBaseUrl: string;
  rustBacktrace: boolean;
  skipReset: boolean;
  exportOrbit: boolean;
  tryImportOrbit: boolean;
  logMelvinEvents: boolean;
  trackMelvinPos: boolean;
  skipObjectives: readonly number[];
  pullFull: boolean;
}>;

export type RawEnvironment = Readonly<Record<string, string>>;

const VALUE_SCHEMAS: Record<ToggleKind, unknown> = {
  url: {
    $id: "https://melvinctl.local/schemas/toggle-url.json",
    type: "string",
    format: "uri",
    pattern: "^https?://"
  },
  flag: { $id: "https://melvinctl.local/schemas/toggle-flag.json", type: "string", const: "1" },
  "id-list": {
    $id: "https://melvinctl.local/schemas/toggle-id-list.json",
    type: "string",
    pattern: "^\\s*\\d+\\s*(,\\s*\\d+\\s*)*$"
  },
  presence: { $id: "https://melvinctl.local/schemas/toggle-presence.json", type: "string" }
};

const KINDS: readonly ToggleKind[] = ["url", "flag", "id-list", "presence"];

const EXPECTED: Record<ToggleKind, string> = {
  url: "an http(s) URL",
  flag: 'the literal "1"',
  "id-list": "a comma-separated list of integers",
  presence: "any string"
};

let guards: Map<ToggleKind, SchemaGuard<string>> | null = null;

function guardFor(kind: ToggleKind): SchemaGuard<string> {
  if (!guards) {
    guards = new Map();
    for (const k of KINDS) {
      guards.set(k, compileGuard<string>(VALUE_SCHEMAS[k], "value"));
    }
  }
  const guard = guards.get(kind);
  if (!guard) throw new Error(`No schema for toggle kind ${kind}`);
  return guard;
}

/** Parse a SKIP_OBJ value into its sorted, duplicate-free id list. */
export function parseSkipObjectives(value: string): number[] {
  const ids = value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => Number.parseInt(part, 10));
  return [...new Set(ids)].sort((a, b) => a - b);
}

/** Ids that would not survive the trip through `number`. */
function unsafeIds(value: string): string[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0 && !Number.isSafeInteger(Number(part)));
}

export function formatSkipObjectives(ids: readonly number[]): string {
  return ids.join(",");
}

/**
 * Validate a flat toggle map and resolve it into an EnvironmentConfiguration.
 * Every problem is collected before failing.
 * @throws ConfigValidationFailure
 */
export function resolveEnvironment(raw: RawEnvironment): EnvironmentConfiguration {
  const issues: ConfigIssue[] = [];
  const known = new Map<ToggleName, string>();

  for (const [name, value] of Object.entries(raw)) {
    if (!isToggleName(name)) {
      issues.push({
        name,
        problem: "unrecognized",
        message: `${name} is not a recognized toggle (expected one of ${TOGGLE_NAMES.join(", ")})`
      });
      continue;
    }
    known.set(name, value);
  }

  for (const spec of TOGGLES) {
    const value = known.get(spec.name);
    if (value === undefined) {
      if (spec.required) {
        issues.push({ name: spec.name, problem: "missing", message: `${spec.name} is required` });
      }
      continue;
    }
    if (!guardFor(spec.kind).check(value)) {
      issues.push({
        name: spec.name,
        problem: "malformed",
        message: `${spec.name}=${JSON.stringify(value)} must be ${EXPECTED[spec.kind]}`
      });
      continue;
    }
    const unsafe = spec.kind === "id-list" ? unsafeIds(value) : [];
    if (unsafe.length > 0) {
      issues.push({
        name: spec.name,
        problem: "malformed",
        message: `${spec.name} ids ${unsafe.join(", ")} exceed ${Number.MAX_SAFE_INTEGER}`
      });
    }
  }

  if (issues.length > 0) {
    throw new ConfigValidationFailure(issues);
  }

  const flag = (name: ToggleName): boolean => known.get(name) === "1";
  const skip = known.get("SKIP_OBJ");

  return Object.freeze({
    drsBaseUrl: known.get("DRS_BASE_URL") ?? "",
    rustBacktrace: flag("RUST_BACKTRACE"),
    skipReset: flag("SKIP_RESET"),
    exportOrbit: flag("EXPORT_ORBIT"),
    tryImportOrbit: flag("TRY_IMPORT_ORBIT"),
    logMelvinEvents: flag("LOG_MELVIN_EVENTS"),
    trackMelvinPos: flag("TRACK_MELVIN_POS"),
    skipObjectives: Object.freeze(skip === undefined ? [] : parseSkipObjectives(skip)),
    pullFull: (known.get("PULL_FULL") ?? "") !== ""
  });
}

/**
 * The exact environment of the launched process. Unset toggles are omitted
 * and retriever-only toggles never leak into it.
 */
export function serializeEnvironment(cfg: EnvironmentConfiguration): Record<string, string> {
  const env: Record<string, string> = { DRS_BASE_URL: cfg.drsBaseUrl };
  if (cfg.rustBacktrace) env.RUST_BACKTRACE = "1";
  if (cfg.skipReset) env.SKIP_RESET = "1";
  if (cfg.exportOrbit) env.EXPORT_ORBIT = "1";
  if (cfg.tryImportOrbit) env.TRY_IMPORT_ORBIT = "1";
  if (cfg.logMelvinEvents) env.LOG_MELVIN_EVENTS = "1";
  if (cfg.skipObjectives.length > 0) env.SKIP_OBJ = formatSkipObjectives(cfg.skipObjectives);
  if (cfg.trackMelvinPos) env.TRACK_MELVIN_POS = "1";
  return env;
}

/** Parse repeated `--env NAME=VALUE` flags. */
export function parseAssignments(pairs: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  const issues: ConfigIssue[] = [];
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      issues.push({ name: pair, problem: "malformed", message: `--env ${JSON.stringify(pair)} must be NAME=VALUE` });
      continue;
    }
    out[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  if (issues.length > 0) throw new ConfigValidationFailure(issues);
  return out;
}

/**
 * Merge toggle sources, lowest precedence first: config file, invoking
 * process environment, explicit overrides. The process environment is
 * filtered to recognized names since it always carries unrelated variables;
 * the other two sources are passed through so unknown names get rejected.
 */
export function collectEnvironment(sources: {
  file?: Readonly<Record<string, string>>;
  process?: NodeJS.ProcessEnv;
  overrides?: Readonly<Record<string, string>>;
}): Record<string, string> {
  const merged: Record<string, string> = { ...sources.file };
  for (const name of TOGGLE_NAMES) {
    const value = sources.process?.[name];
    if (value !== undefined) merged[name] = value;
  }
  return { ...merged, ...sources.overrides };
}
