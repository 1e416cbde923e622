import path from "node:path";
import { resolveTarget } from "../config/validator.js";
import { type DeploymentRecord, type RunSummary, listRuns, readRecord } from "../core/run-record.js";
import { ORBIT_STATE_FILE } from "../env/toggles.js";
import { TmuxSessionManager, type SessionState } from "../session/session-manager.js";
import { RemoteLease } from "../transport/lease.js";
import { type CommandDeps, type CommandFailure, type ConnectionOpts, connect, failure, loadCommandConfig } from "./common.js";

export type StatusOpts = ConnectionOpts & {
  runId?: string;
  runsDir?: string;
  /** Also ask the host about the session, orbit state and lease. */
  remote?: boolean;
};

export type RemoteStatus = {
  target: string;
  session: string;
  /** `exited` when the binary died but tmux kept its pane. */
  state: SessionState | "exited";
  /** Other tmux sessions on the host. */
  other_sessions: string[];
  orbit_state: boolean;
  lease_holder: string | null;
};

export type StatusCommandResult =
  | { ok: true; run: DeploymentRecord; remote?: RemoteStatus }
  | { ok: true; runs: RunSummary[]; remote?: RemoteStatus }
  | CommandFailure;

export async function status(opts: StatusOpts, deps: CommandDeps = {}): Promise<StatusCommandResult> {
  try {
    const config = loadCommandConfig(opts, deps);
    const runsDir = path.resolve(opts.runsDir ?? config.runs_dir);

    let remote: RemoteStatus | undefined;
    if (opts.remote) {
      const { target } = resolveTarget(config, opts.target);
      const conn = await connect(config, opts, deps);
      await conn.transport.prepare();
      const sessions = new TmuxSessionManager(conn.transport, conn.log);
      const state = await sessions.state(target.session_name);
      const exited = state === "running" && (await sessions.deadPaneStatus(target.session_name)) !== null;
      const others = (await sessions.listSessions()).filter((name) => name !== target.session_name);
      const orbit = await conn.transport.exec(["test", "-f", path.posix.join(config.session.remote_dir, ORBIT_STATE_FILE)]);
      remote = {
        target: conn.targetName,
        session: target.session_name,
        state: exited ? "exited" : state,
        other_sessions: others,
        orbit_state: orbit.code === 0,
        lease_holder: config.lease?.enabled
          ? (await new RemoteLease(conn.transport, config.lease.path, conn.log).holder()) || null
          : null
      };
    }

    if (opts.runId) {
      const run = readRecord(runsDir, opts.runId);
      if (!run) throw new Error(`No readable run ${opts.runId} under ${runsDir}`);
      return { ok: true, run, remote };
    }
    return { ok: true, runs: listRuns(runsDir), remote };
  } catch (e: unknown) {
    return failure(e);
  }
}
