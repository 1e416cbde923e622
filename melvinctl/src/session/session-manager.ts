import { setTimeout as sleep } from "node:timers/promises";
import { LaunchFailure, SessionTeardownFailure, TransferFailure, errorMessage, isDeployError } from "../core/errors.js";
import { logger as rootLogger, type Logger } from "../log/logger.js";
import type { Transport } from "../transport/transport.js";

export type SessionState = "absent" | "running";

export type SessionLaunch = {
  name: string;
  /** Absolute path of the program to run inside the session. */
  command: string;
  args?: readonly string[];
  /** The complete process environment; nothing else is inherited. */
  env: Readonly<Record<string, string>>;
  cwd: string;
  /** tmux configuration file on the host. */
  configPath?: string;
  /** How long the process must survive before the launch counts. */
  settleMs?: number;
};

/** tmux's ways of saying there is nothing to kill. */
const NOT_FOUND = [/can't find session/i, /no server running/i, /session not found/i, /error connecting to/i];

const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isSessionNotFound(stderr: string): boolean {
  return NOT_FOUND.some((re) => re.test(stderr));
}

/** Exact-match target so `melvin` never hits `melvin_evaluation`. */
function exact(name: string): string {
  return `=${name}`;
}

export function launchArgv(launch: SessionLaunch): string[] {
  const argv = ["tmux"];
  if (launch.configPath) argv.push("-f", launch.configPath);
  argv.push("new-session", "-d", "-s", launch.name, "-c", launch.cwd, "env", "-i");
  for (const [key, value] of Object.entries(launch.env)) {
    if (!ENV_NAME.test(key)) {
      throw new LaunchFailure(`Invalid environment variable name: ${key}`);
    }
    argv.push(`${key}=${value}`);
  }
  argv.push(launch.command, ...(launch.args ?? []));
  return argv;
}

/**
 * Lifecycle of one named, detachable tmux session on a host.
 * The single-deployer assumption (or the remote lease) guarantees nobody
 * recreates the session between teardown and launch.
 */
export class TmuxSessionManager {
  private readonly log: Logger;

  constructor(
    private readonly transport: Transport,
    log?: Logger
  ) {
    this.log = (log ?? rootLogger).child({ stage: "session" });
  }

  /** Install tmux with apt when the host lacks it. Returns true if it installed. */
  async ensureMultiplexer(): Promise<boolean> {
    const which = await this.transport.exec(["sh", "-c", "command -v tmux"]);
    if (which.code === 0) return false;

    this.log.info("TMUX_INSTALL", "tmux missing on host, installing");
    const install = await this.transport.exec(["apt-get", "install", "-y", "tmux"]);
    if (install.code !== 0) {
      throw new TransferFailure(`Installing tmux failed (exit ${install.code})`, { stderr: install.stderr.trim() });
    }
    return true;
  }

  async state(name: string): Promise<SessionState> {
    const res = await this.transport.exec(["tmux", "has-session", "-t", exact(name)]);
    return res.code === 0 ? "running" : "absent";
  }

  /**
   * Exit status of the session's first pane once its process has died.
   * Only visible while `remain-on-exit` keeps the pane; null while it runs.
   */
  async deadPaneStatus(name: string): Promise<string | null> {
    const res = await this.transport.exec(["tmux", "list-panes", "-t", exact(name), "-F", "#{pane_dead} #{pane_dead_status}"]);
    if (res.code !== 0) return null;
    const [dead, status = ""] = (res.stdout.split("\n")[0] ?? "").trim().split(" ");
    return dead === "1" ? status : null;
  }

  async listSessions(): Promise<string[]> {
    const res = await this.transport.exec(["tmux", "list-sessions", "-F", "#{session_name}"]);
    if (res.code !== 0) {
      if (isSessionNotFound(res.stderr)) return [];
      throw new TransferFailure(`tmux list-sessions failed (exit ${res.code})`, { stderr: res.stderr.trim() });
    }
    return res.stdout
      .split("\n")
      .map((l) => l.trim())
      .filter((l) => l.length > 0);
  }

  /**
   * After this resolves no session called `name` exists. A missing session
   * counts as success.
   * @throws SessionTeardownFailure
   */
  async ensureCleanSession(name: string): Promise<"killed" | "absent"> {
    try {
      const res = await this.transport.exec(["tmux", "kill-session", "-t", exact(name)]);
      if (res.code !== 0 && !isSessionNotFound(res.stderr)) {
        throw new SessionTeardownFailure(`tmux kill-session ${name} failed (exit ${res.code})`, {
          session: name,
          stderr: res.stderr.trim()
        });
      }
      if ((await this.state(name)) === "running") {
        throw new SessionTeardownFailure(`Session ${name} is still running after kill`, { session: name });
      }
      const outcome = res.code === 0 ? "killed" : "absent";
      this.log.info("SESSION_CLEAN", `session ${name} ${outcome}`, { session: name });
      return outcome;
    } catch (e: unknown) {
      if (e instanceof SessionTeardownFailure) throw e;
      throw new SessionTeardownFailure(`Tearing down ${name} failed: ${errorMessage(e)}`, { session: name }, { cause: e });
    }
  }

  /**
   * Create a detached session running `launch.command` with exactly
   * `launch.env`. On any failure the session is killed again so the host is
   * never left half-configured.
   * @throws LaunchFailure
   */
  async launchSession(launch: SessionLaunch): Promise<void> {
    const argv = launchArgv(launch);
    try {
      const res = await this.transport.exec(argv);
      if (res.code !== 0) {
        throw new LaunchFailure(`tmux new-session ${launch.name} failed (exit ${res.code})`, {
          session: launch.name,
          stderr: res.stderr.trim()
        });
      }
      if (launch.settleMs) await sleep(launch.settleMs);
      if ((await this.state(launch.name)) !== "running") {
        throw new LaunchFailure(`Session ${launch.name} exited right after launch`, { session: launch.name });
      }
      const exitStatus = await this.deadPaneStatus(launch.name);
      if (exitStatus !== null) {
        throw new LaunchFailure(`Session ${launch.name} exited right after launch (status ${exitStatus || "unknown"})`, {
          session: launch.name
        });
      }
    } catch (e: unknown) {
      await this.discard(launch.name);
      if (e instanceof LaunchFailure) throw e;
      throw new LaunchFailure(`Launching ${launch.name} failed: ${errorMessage(e)}`, { session: launch.name }, { cause: e });
    }
    this.log.info("SESSION_LAUNCHED", `session ${launch.name} running ${launch.command}`, {
      session: launch.name,
      env: Object.keys(launch.env)
    });
  }

  /** Kill-if-exists, then create. Previous process state is discarded. */
  async redeploy(launch: SessionLaunch): Promise<void> {
    await this.ensureCleanSession(launch.name);
    await this.launchSession(launch);
  }

  private async discard(name: string): Promise<void> {
    try {
      await this.transport.exec(["tmux", "kill-session", "-t", exact(name)]);
    } catch (e: unknown) {
      const code = isDeployError(e) ? e.code : "UNKNOWN";
      this.log.warn("SESSION_CLEANUP_FAILED", `could not kill ${name} after failed launch: ${errorMessage(e)}`, { code });
    }
  }
}
