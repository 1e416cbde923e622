import os from "node:os";
import path from "node:path";
import { LeaseConflict, TransferFailure } from "../core/errors.js";
import { logger as rootLogger, type Logger } from "../log/logger.js";
import type { Transport } from "./transport.js";

export type LeaseHandle = {
  owner: string;
  release: () => Promise<void>;
};

export function leaseOwner(runId: string): string {
  return `${os.hostname()} pid=${process.pid} run=${runId} at=${new Date().toISOString()}`;
}

/**
 * Advisory deployment lease on the target host. `mkdir` is atomic on POSIX
 * filesystems, so exactly one deployer wins; the owner line lives inside the
 * directory. Nothing enforces the lease against tools that ignore it.
 */
export class RemoteLease {
  private readonly ownerFile: string;
  private readonly log: Logger;

  constructor(
    private readonly transport: Transport,
    private readonly leasePath: string,
    log?: Logger
  ) {
    this.ownerFile = path.posix.join(leasePath, "owner");
    this.log = (log ?? rootLogger).child({ stage: "lease" });
  }

  /** @throws LeaseConflict when another deployer holds the lease */
  async acquire(owner: string): Promise<LeaseHandle> {
    const mk = await this.transport.exec(["mkdir", this.leasePath]);
    if (mk.code !== 0) {
      const exists = await this.transport.exec(["test", "-d", this.leasePath]);
      if (exists.code !== 0) {
        throw new TransferFailure(`Cannot create lease ${this.leasePath}`, { stderr: mk.stderr.trim() });
      }
      throw new LeaseConflict(this.leasePath, await this.holder());
    }

    const write = await this.transport.exec(["sh", "-c", 'printf "%s\\n" "$1" > "$2"', "sh", owner, this.ownerFile]);
    if (write.code !== 0) {
      await this.forceRelease();
      throw new TransferFailure(`Cannot record lease owner in ${this.ownerFile}`, { stderr: write.stderr.trim() });
    }

    this.log.info("LEASE_ACQUIRED", `lease ${this.leasePath} acquired`, { owner });
    return { owner, release: () => this.release(owner) };
  }

  /** Current holder line, or "" when the lease is free or unreadable. */
  async holder(): Promise<string> {
    const res = await this.transport.exec(["cat", this.ownerFile]);
    return res.code === 0 ? res.stdout.trim() : "";
  }

  /** Releases only if the lease still names `owner`. */
  async release(owner: string): Promise<void> {
    const current = await this.holder();
    if (current !== owner) {
      this.log.warn("LEASE_TAKEN", `lease ${this.leasePath} now held by ${current || "nobody"}; leaving it`);
      return;
    }
    await this.forceRelease();
    this.log.info("LEASE_RELEASED", `lease ${this.leasePath} released`);
  }

  async forceRelease(): Promise<void> {
    const res = await this.transport.exec(["rm", "-rf", "--", this.leasePath]);
    if (res.code !== 0) {
      throw new TransferFailure(`Cannot remove lease ${this.leasePath}`, { stderr: res.stderr.trim() });
    }
  }
}
