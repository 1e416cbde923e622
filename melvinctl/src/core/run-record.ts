import fs from "node:fs";
import { appendFile, mkdir, open, rename, unlink, type FileHandle } from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { compileGuard, readSchema } from "../schema/ajv.js";
import type { DeploymentStatus, DeploymentStep } from "./state-machine.js";

export type StepResult = {
  status: "success" | "failed";
  duration_ms: number;
  error?: string;
};

/** Persistent deployment state stored in `<runs_dir>/<run_id>/state.json`. */
export type DeploymentRecord = {
  version: 1;
  run_id: string;
  target: string;
  session_name: string;
  status: DeploymentStatus;
  started_at: string;
  updated_at: string;
  step_results: Partial<Record<DeploymentStep, StepResult>>;
  outputs?: Record<string, unknown>;
  error: { code: string; message: string } | null;
};

export type RunSummary = {
  run_id: string;
  target: string;
  status: DeploymentStatus | "corrupted";
  updated_at: string;
};

export const STATE_FILE = "state.json";
export const PROGRESS_FILE = "progress.log";

export function makeRunId(): string {
  const ts = new Date().toISOString().replace(/[:.]/g, "-");
  return `${ts}-${crypto.randomBytes(3).toString("hex")}`;
}

export function runDir(runsDir: string, runId: string): string {
  return path.join(runsDir, runId);
}

export async function atomicWriteJson(file: string, data: unknown): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.tmp.${process.pid}.${Date.now()}`;
  const payload = JSON.stringify(data, null, 2) + "\n";

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w");
    await fh.writeFile(payload, "utf8");
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, file);
  } catch (e) {
    if (fh) await fh.close().catch(() => undefined);
    await unlink(tmp).catch(() => undefined);
    throw e;
  }
}

export async function saveRecord(runsDir: string, record: DeploymentRecord): Promise<string> {
  const file = path.join(runDir(runsDir, record.run_id), STATE_FILE);
  await atomicWriteJson(file, record);
  return file;
}

/** One timestamped line per transition. */
export async function appendProgress(runsDir: string, runId: string, line: string): Promise<void> {
  const dir = runDir(runsDir, runId);
  await mkdir(dir, { recursive: true });
  await appendFile(path.join(dir, PROGRESS_FILE), `${new Date().toISOString()} ${line}\n`, "utf8");
}

/** Parsed and schema-checked state.json, or null when it is absent or damaged. */
export function readRecord(runsDir: string, runId: string): DeploymentRecord | null {
  const file = path.join(runDir(runsDir, runId), STATE_FILE);
  if (!fs.existsSync(file)) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch {
    return null;
  }
  const guard = compileGuard<DeploymentRecord>(readSchema("run-record"), "record");
  return guard.check(parsed) ? parsed : null;
}

/** All recorded runs, newest first. */
export function listRuns(runsDir: string): RunSummary[] {
  if (!fs.existsSync(runsDir)) return [];

  const results: RunSummary[] = [];
  for (const entry of fs.readdirSync(runsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    if (!fs.existsSync(path.join(runsDir, entry.name, STATE_FILE))) continue;

    const record = readRecord(runsDir, entry.name);
    results.push(
      record
        ? { run_id: record.run_id, target: record.target, status: record.status, updated_at: record.updated_at }
        : { run_id: entry.name, target: "", status: "corrupted", updated_at: "" }
    );
  }
  return results.sort((a, b) => b.updated_at.localeCompare(a.updated_at) || b.run_id.localeCompare(a.run_id));
}
