import { describe, expect, it, beforeEach } from "vitest";
import { TmuxSessionManager, launchArgv, type SessionLaunch } from "../src/session/session-manager.js";
import { LaunchFailure, SessionTeardownFailure } from "../src/core/errors.js";
import { FakeHost, fail } from "./fakes.js";

const launch: SessionLaunch = {
  name: "melvin_evaluation",
  command: "/home/melvin-ob",
  env: { DRS_BASE_URL: "http://10.0.0.1:9000", EXPORT_ORBIT: "1" },
  cwd: "/home",
  configPath: "/home/tmux.conf"
};

describe("launchArgv", () => {
  it("launches through env -i with exactly the given variables", () => {
    expect(launchArgv(launch)).toEqual([
      "tmux",
      "-f",
      "/home/tmux.conf",
      "new-session",
      "-d",
      "-s",
      "melvin_evaluation",
      "-c",
      "/home",
      "env",
      "-i",
      "DRS_BASE_URL=http://10.0.0.1:9000",
      "EXPORT_ORBIT=1",
      "/home/melvin-ob"
    ]);
  });

  it("rejects variable names a shell could misread", () => {
    expect(() => launchArgv({ ...launch, env: { "BAD NAME": "1" } })).toThrow(LaunchFailure);
  });
});

describe("TmuxSessionManager", () => {
  let host: FakeHost;
  let sessions: TmuxSessionManager;

  beforeEach(() => {
    host = new FakeHost();
    sessions = new TmuxSessionManager(host);
  });

  it("treats a missing session as already clean, every time", async () => {
    expect(await sessions.ensureCleanSession("melvin_evaluation")).toBe("absent");
    expect(await sessions.ensureCleanSession("melvin_evaluation")).toBe("absent");
    expect(host.sessions.size).toBe(0);
    expect(host.calls).toEqual([
      ["tmux", "kill-session", "-t", "=melvin_evaluation"],
      ["tmux", "has-session", "-t", "=melvin_evaluation"],
      ["tmux", "kill-session", "-t", "=melvin_evaluation"],
      ["tmux", "has-session", "-t", "=melvin_evaluation"]
    ]);
  });

  it("is a no-op to clean twice after a kill", async () => {
    await sessions.launchSession(launch);
    expect(await sessions.ensureCleanSession("melvin_evaluation")).toBe("killed");
    expect(await sessions.ensureCleanSession("melvin_evaluation")).toBe("absent");
    expect(host.sessions.size).toBe(0);
  });

  it("kills an existing session", async () => {
    await sessions.launchSession(launch);
    expect(await sessions.ensureCleanSession("melvin_evaluation")).toBe("killed");
    expect(await sessions.state("melvin_evaluation")).toBe("absent");
  });

  it("targets sessions by exact name", async () => {
    await sessions.ensureCleanSession("melvin");
    expect(host.calls[0]).toEqual(["tmux", "kill-session", "-t", "=melvin"]);
  });

  it("fails teardown when kill-session errors for another reason", async () => {
    host.intercept = (argv) => (argv[1] === "kill-session" ? fail(1, "permission denied") : undefined);
    await expect(sessions.ensureCleanSession("melvin_evaluation")).rejects.toBeInstanceOf(SessionTeardownFailure);
  });

  it("fails teardown when the session survives the kill", async () => {
    await sessions.launchSession(launch);
    host.intercept = (argv) => (argv[1] === "kill-session" ? { code: 0, stdout: "", stderr: "" } : undefined);
    await expect(sessions.ensureCleanSession("melvin_evaluation")).rejects.toThrow(/still running/);
  });

  it("redeploy twice leaves exactly one session with the newest environment", async () => {
    await sessions.redeploy(launch);
    await sessions.redeploy({ ...launch, env: { DRS_BASE_URL: "http://10.0.0.2:9000" } });

    expect([...host.sessions.keys()]).toEqual(["melvin_evaluation"]);
    expect(host.sessions.get("melvin_evaluation")?.env).toEqual({ DRS_BASE_URL: "http://10.0.0.2:9000" });
  });

  it("leaves other sessions alone", async () => {
    await sessions.launchSession({ ...launch, name: "melvin_debug" });
    await sessions.redeploy(launch);
    expect(await sessions.listSessions()).toEqual(["melvin_debug", "melvin_evaluation"]);
  });

  it("launch failure leaves no session behind", async () => {
    host.intercept = (argv) => {
      if (argv.includes("new-session")) {
        host.sessions.set("melvin_evaluation", { command: "", args: [], env: {}, cwd: "/", configPath: null });
        return fail(1, "create window failed");
      }
      return undefined;
    };
    await expect(sessions.launchSession(launch)).rejects.toBeInstanceOf(LaunchFailure);
    expect(host.sessions.has("melvin_evaluation")).toBe(false);
  });

  it("fails launch when the session is gone right after creation", async () => {
    host.intercept = (argv) => (argv[1] === "has-session" ? fail(1, "can't find session") : undefined);
    await expect(sessions.launchSession(launch)).rejects.toThrow(/exited right after launch/);
  });

  it("fails launch when the binary died and tmux kept its pane", async () => {
    host.crashOnLaunch = 101;

    await expect(sessions.launchSession(launch)).rejects.toThrow(
      "Session melvin_evaluation exited right after launch (status 101)"
    );
    expect(host.sessions.has("melvin_evaluation")).toBe(false);
    expect(host.calls.slice(1)).toEqual([
      ["tmux", "has-session", "-t", "=melvin_evaluation"],
      ["tmux", "list-panes", "-t", "=melvin_evaluation", "-F", "#{pane_dead} #{pane_dead_status}"],
      ["tmux", "kill-session", "-t", "=melvin_evaluation"]
    ]);
  });

  it("accepts a launch whose pane is still alive", async () => {
    await sessions.launchSession({ ...launch, settleMs: 5 });
    expect(await sessions.deadPaneStatus("melvin_evaluation")).toBeNull();
  });

  it("lists no sessions when no server runs", async () => {
    expect(await sessions.listSessions()).toEqual([]);
  });

  it("installs tmux only when missing", async () => {
    expect(await sessions.ensureMultiplexer()).toBe(false);
    host.tmuxInstalled = false;
    expect(await sessions.ensureMultiplexer()).toBe(true);
    expect(host.commandsNamed("apt-get")).toEqual([["apt-get", "install", "-y", "tmux"]]);
  });
});
