import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { deploy, type DeployOpts, type DeployDeps } from "../src/commands/deploy.js";
import { BuildFailure } from "../src/core/errors.js";
import { ExecTimeoutError } from "../src/exec/executor.js";
import { readRecord } from "../src/core/run-record.js";
import { resetLogging, setLogSink } from "../src/log/logger.js";
import { StaticCredentials } from "../src/transport/credentials.js";
import { FakeBuilder, FakeHost, RecordingExecutor, captureLogs, ok, testConfig, writeConfigDir } from "./fakes.js";

describe("deploy command", () => {
  let tmp: string;
  let configDir: string;
  let host: FakeHost;
  let exec: RecordingExecutor;
  let builder: FakeBuilder;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "melvinctl-deploy-cmd-"));
    configDir = writeConfigDir(path.join(tmp, "config"), {
      ...testConfig(tmp),
      environment: { DRS_BASE_URL: "http://10.0.0.1:9000" }
    });
    host = new FakeHost();
    exec = new RecordingExecutor();
    builder = new FakeBuilder(tmp);
    setLogSink(captureLogs().sink);
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
    resetLogging();
  });

  function run(opts: Omit<DeployOpts, "configDir"> = {}, deps: DeployDeps = {}) {
    return deploy(
      { configDir, ...opts },
      {
        exec,
        builder,
        processEnv: {},
        credentials: new StaticCredentials({ kind: "agent" }),
        transportFactory: () => host,
        ...deps
      }
    );
  }

  it("deploys end to end and reports the launched session", async () => {
    const res = await run({ env: ["EXPORT_ORBIT=1"] });

    if (!res.ok) throw new Error(res.error.message);
    expect(res.runId).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-\d{3}Z-[0-9a-f]{6}$/);
    expect(res.status).toBe("launched");
    expect(res.session).toBe("melvin_evaluation");
    expect(res.env).toEqual(["DRS_BASE_URL", "EXPORT_ORBIT"]);
    expect(res.statePath).toBe(path.join(tmp, "runs", res.runId, "state.json"));
    expect(readRecord(path.join(tmp, "runs"), res.runId)?.status).toBe("launched");
    expect(host.sessions.get("melvin_evaluation")?.env).toEqual({
      DRS_BASE_URL: "http://10.0.0.1:9000",
      EXPORT_ORBIT: "1"
    });
  });

  it("rejects an unrecognized toggle before touching anything", async () => {
    const res = await run({ env: ["EXPORT_ORBITT=1"] });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.exitCode).toBe(2);
    expect(res.error.code).toBe("CONFIG_INVALID");
    expect(res.error.issues?.map((i) => [i.name, i.problem])).toEqual([["EXPORT_ORBITT", "unrecognized"]]);
    expect(res.runId).toBeUndefined();
    expect(exec.calls).toEqual([]);
    expect(host.calls).toEqual([]);
    expect(builder.builds).toBe(0);
    expect(fs.existsSync(path.join(tmp, "runs"))).toBe(false);
  });

  it("rejects a malformed flag value", async () => {
    const res = await run({ env: ["RUST_BACKTRACE=full"] });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.issues).toEqual([
      { name: "RUST_BACKTRACE", problem: "malformed", message: 'RUST_BACKTRACE="full" must be the literal "1"' }
    ]);
  });

  it("takes toggles from the invoking environment under the flags", async () => {
    const res = await run(
      { env: ["SKIP_OBJ=9,2"] },
      { processEnv: { DRS_BASE_URL: "http://10.0.0.2:9000", SKIP_OBJ: "1", HOME: "/root" } }
    );

    expect(res.ok).toBe(true);
    expect(host.sessions.get("melvin_evaluation")?.env).toEqual({ DRS_BASE_URL: "http://10.0.0.2:9000", SKIP_OBJ: "2,9" });
  });

  it("never forwards PULL_FULL to the session", async () => {
    const res = await run({ env: ["PULL_FULL=1"] });

    expect(res.ok && res.env).toEqual(["DRS_BASE_URL"]);
    expect(host.sessions.get("melvin_evaluation")?.env).toEqual({ DRS_BASE_URL: "http://10.0.0.1:9000" });
  });

  it("maps a build failure to its exit code and keeps the run record", async () => {
    builder = new FakeBuilder(tmp, new BuildFailure("cargo build exited with 101"));

    const res = await run();

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.exitCode).toBe(10);
    expect(res.status).toBe("failed_build");
    expect(res.error).toEqual({ code: "BUILD_FAILED", message: "cargo build exited with 101" });
    expect(res.statePath && fs.existsSync(res.statePath)).toBe(true);
    expect(host.calls).toEqual([]);
  });

  it("exits 4 when the lease is held", async () => {
    host.dirs.add("/home/.melvinctl.lease");
    host.files.set("/home/.melvinctl.lease/owner", { text: "other-deployer\n", mode: "644" });

    const res = await run();

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.exitCode).toBe(4);
    expect(res.status).toBe("failed_transfer");
    expect(res.error.message).toBe("Deployment lease /home/.melvinctl.lease is held by other-deployer");
  });

  it("records a transfer that timed out over ssh as failed_transfer", async () => {
    const timingOut = new RecordingExecutor((command) => {
      if (command === "scp") throw new ExecTimeoutError("scp", 5000);
      return ok();
    });

    const res = await run({}, { exec: timingOut, transportFactory: undefined });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.exitCode).toBe(11);
    expect(res.status).toBe("failed_transfer");
    expect(res.error).toEqual({
      code: "TRANSFER_FAILED",
      message: "copy melvin-ob on root@10.0.0.5:50000: scp timed out after 5000ms"
    });
    expect(res.runId && readRecord(path.join(tmp, "runs"), res.runId)?.status).toBe("failed_transfer");
    expect(timingOut.calls.filter((c) => c.command === "scp")).toHaveLength(1);
    expect(timingOut.calls.at(-2)?.args.at(-1)).toMatch(/^rm -f -- \/home\/melvin-ob\.part-/);
  });

  it("records a binary that dies at launch as failed_launch", async () => {
    host.crashOnLaunch = 1;

    const res = await run();

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.exitCode).toBe(13);
    expect(res.status).toBe("failed_launch");
    expect(res.error.message).toBe("Session melvin_evaluation exited right after launch (status 1)");
    expect(host.sessions.size).toBe(0);
  });

  it("treats an unknown target as a bad argument", async () => {
    const res = await run({ target: "nope" });

    expect(res).toEqual({
      ok: false,
      error: { code: "INVALID_ARGS", message: 'Unknown target "nope". Configured: bare' },
      exitCode: 3
    });
  });

  it("treats an unknown profile as a bad argument", async () => {
    const res = await run({ profile: "staging" });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.exitCode).toBe(3);
    expect(res.error.message).toBe(`Unknown config profile: staging (${path.join(configDir, "staging.yaml")} not found)`);
  });

  it("reports schema problems in the config as invalid configuration", async () => {
    fs.writeFileSync(path.join(configDir, "broken.yaml"), "transport:\n  timeout_ms: -1\n");

    const res = await run({ profile: "broken" });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.exitCode).toBe(2);
    expect(res.error.issues?.[0]?.name).toBe("broken");
  });
});
