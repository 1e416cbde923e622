import { RemoteLease } from "../transport/lease.js";
import { type CommandDeps, type CommandFailure, type ConnectionOpts, connect, failure, loadCommandConfig } from "./common.js";

export type UnlockCommandResult =
  | { ok: true; leasePath: string; previousHolder: string | null }
  | CommandFailure;

/** Remove a stale deployment lease left behind by a crashed deployer. */
export async function unlock(opts: ConnectionOpts, deps: CommandDeps = {}): Promise<UnlockCommandResult> {
  try {
    const config = loadCommandConfig(opts, deps);
    if (!config.lease?.enabled) {
      throw new Error(`No deployment lease is configured for profile ${opts.profile ?? "base"}`);
    }
    const conn = await connect(config, opts, deps);
    const lease = new RemoteLease(conn.transport, config.lease.path, conn.log);
    const holder = await lease.holder();
    await lease.forceRelease();
    conn.log.info("LEASE_FORCE_RELEASED", `removed lease ${config.lease.path}`, { previous: holder });
    return { ok: true, leasePath: config.lease.path, previousHolder: holder || null };
  } catch (e: unknown) {
    return failure(e);
  }
}
