import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { EvaluationRetriever, evaluationItems } from "../src/retrieve/retriever.js";
import { retrieve, wantsFullPull } from "../src/commands/retrieve.js";
import { RetrievalFailure } from "../src/core/errors.js";
import { resetLogging, setLogSink } from "../src/log/logger.js";
import { StaticCredentials } from "../src/transport/credentials.js";
import type { RetrieveConfig } from "../src/types/config.js";
import { FakeHost, captureLogs, testConfig, writeConfigDir } from "./fakes.js";

describe("EvaluationRetriever", () => {
  let tmp: string;
  let config: RetrieveConfig;
  let host: FakeHost;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "melvinctl-retrieve-"));
    config = { local_dir: tmp, dumps: "/home/dumps", images: "/home/zo_img", snapshot: "/home/snapshot_full.png" };
    host = new FakeHost();
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
    resetLogging();
  });

  it("skips the snapshot unless a full pull was asked for", () => {
    expect(evaluationItems(config, { pullFull: false })).toEqual({
      items: [
        { remote: "/home/dumps", local: path.join(tmp, "dumps"), recursive: true },
        { remote: "/home/zo_img", local: path.join(tmp, "zo_img"), recursive: true }
      ],
      skipped: ["/home/snapshot_full.png"]
    });
    expect(evaluationItems(config, { pullFull: true }).items.at(-1)).toEqual({
      remote: "/home/snapshot_full.png",
      local: path.join(tmp, "snapshot_full.png"),
      recursive: false
    });
  });

  it("pulls everything in order", async () => {
    const logs = captureLogs();
    setLogSink(logs.sink);
    const retriever = new EvaluationRetriever(host, config);

    const outcome = await retriever.pullEvaluation({ pullFull: true });

    expect(outcome).toEqual({
      pulled: [path.join(tmp, "dumps"), path.join(tmp, "zo_img"), path.join(tmp, "snapshot_full.png")],
      skipped: []
    });
    expect(host.pulls.map((p) => p.remote)).toEqual(["/home/dumps", "/home/zo_img", "/home/snapshot_full.png"]);
    expect(fs.readFileSync(path.join(tmp, "snapshot_full.png"), "utf8")).toBe("/home/snapshot_full.png");
    expect(logs.entries.filter((e) => e.code === "PULL_SKIPPED")).toEqual([]);
  });

  it("logs the skipped snapshot", async () => {
    const logs = captureLogs();
    setLogSink(logs.sink);

    await new EvaluationRetriever(host, config).pullEvaluation({ pullFull: false });

    expect(logs.entries.find((e) => e.code === "PULL_SKIPPED")?.message).toBe(
      "skipping /home/snapshot_full.png (set PULL_FULL to include it)"
    );
  });

  it("stops at the first failed item and reports what was already pulled", async () => {
    host.failPull = "/home/zo_img";

    const err = await new EvaluationRetriever(host, config).pullEvaluation({ pullFull: true }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetrievalFailure);
    if (!(err instanceof RetrievalFailure)) return;
    expect(err.message).toBe("Pulling /home/zo_img failed: no such file: /home/zo_img");
    expect(err.detail).toEqual({ remote: "/home/zo_img", pulled: [path.join(tmp, "dumps")], cause_code: undefined });
    expect(host.pulls.map((p) => p.remote)).toEqual(["/home/dumps"]);
  });
});

describe("retrieve command", () => {
  let tmp: string;
  let configDir: string;
  let host: FakeHost;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "melvinctl-retrieve-cmd-"));
    configDir = writeConfigDir(path.join(tmp, "config"), testConfig(tmp));
    host = new FakeHost();
    setLogSink(captureLogs().sink);
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
    resetLogging();
  });

  const deps = (processEnv: NodeJS.ProcessEnv = {}) => ({
    processEnv,
    credentials: new StaticCredentials({ kind: "agent" }),
    transportFactory: () => host
  });

  it("reads PULL_FULL from the flags, then the environment", () => {
    expect(wantsFullPull({ PULL_FULL: "1" }, {})).toBe(true);
    expect(wantsFullPull({}, { PULL_FULL: "yes" })).toBe(true);
    expect(wantsFullPull({}, {})).toBe(false);
    expect(wantsFullPull({ PULL_FULL: "" }, { PULL_FULL: "1" })).toBe(false);
  });

  it("pulls into --out and prepares the host first", async () => {
    const out = path.join(tmp, "out");

    const res = await retrieve({ configDir, outDir: out }, deps());

    expect(res).toEqual({
      ok: true,
      pulled: [path.join(out, "dumps"), path.join(out, "zo_img")],
      skipped: ["/home/snapshot_full.png"]
    });
    expect(host.prepared).toBe(1);
  });

  it("includes the snapshot with PULL_FULL in the environment", async () => {
    const res = await retrieve({ configDir }, deps({ PULL_FULL: "1" }));

    expect(res.ok && res.pulled.at(-1)).toBe(path.join(tmp, "evaluation", "snapshot_full.png"));
  });

  it("rejects toggles that mean nothing to retrieval", async () => {
    const res = await retrieve({ configDir, env: ["EXPORT_ORBIT=1"] }, deps());

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.exitCode).toBe(2);
    expect(res.error.issues).toEqual([
      { name: "EXPORT_ORBIT", problem: "unrecognized", message: "EXPORT_ORBIT has no effect on retrieval (only PULL_FULL)" }
    ]);
    expect(host.prepared).toBe(0);
  });

  it("exits 14 when an item is missing on the host", async () => {
    host.failPull = "/home/dumps";

    const res = await retrieve({ configDir }, deps());

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.exitCode).toBe(14);
    expect(res.error.code).toBe("RETRIEVAL_FAILED");
  });
});
