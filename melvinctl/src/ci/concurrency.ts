import fs from "node:fs";
import path from "node:path";
import { atomicWriteJson } from "../core/run-record.js";
import { logger as rootLogger, type Logger } from "../log/logger.js";

export type GroupHead = {
  run_id: string;
  pid: number;
  joined_at: string;
};

/** A run's membership in a concurrency group. */
export type GroupTicket = {
  group: string;
  runId: string;
  /** True once a newer run has taken over the group. */
  superseded: () => boolean;
  release: () => Promise<void>;
};

/** Thrown by a step that noticed its run lost the group mid-step. */
export class RunSuperseded extends Error {
  constructor(runId: string, group: string) {
    super(`run ${runId} was superseded in group ${group}`);
    this.name = "RunSuperseded";
  }
}

type Holder = {
  runId: string;
  controller: AbortController;
  finished: Promise<void>;
  finish: () => void;
};

function isGroupHead(v: unknown): v is GroupHead {
  return (
    typeof v === "object" &&
    v !== null &&
    "run_id" in v &&
    typeof v.run_id === "string" &&
    "pid" in v &&
    typeof v.pid === "number"
  );
}

/**
 * Concurrency groups. Joining a group with `cancelInProgress` signals the
 * current holder and takes over at once; without it the newcomer waits for
 * the holder to release. Heads of cancelling groups are mirrored to
 * `<stateDir>/<group>.json` so runs in other processes notice they were
 * superseded. Runs check at every step boundary and publishing steps check
 * again right before they replace the published target.
 */
export class ConcurrencyGroups {
  private readonly holders = new Map<string, Holder>();
  private readonly log: Logger;

  constructor(
    private readonly stateDir: string,
    log?: Logger
  ) {
    this.log = (log ?? rootLogger).child({ stage: "ci" });
  }

  async join(group: string, runId: string, cancelInProgress: boolean): Promise<GroupTicket> {
    let current = this.holders.get(group);
    if (current && cancelInProgress) {
      this.log.info("CI_CANCEL_IN_PROGRESS", `run ${runId} supersedes ${current.runId} in group ${group}`);
      current.controller.abort();
    } else {
      while (current) {
        this.log.info("CI_GROUP_WAIT", `run ${runId} waits for ${current.runId} in group ${group}`);
        await current.finished;
        current = this.holders.get(group);
      }
    }

    let finish: () => void = () => undefined;
    const finished = new Promise<void>((resolve) => {
      finish = resolve;
    });
    const holder: Holder = { runId, controller: new AbortController(), finished, finish };
    this.holders.set(group, holder);
    if (cancelInProgress) {
      await atomicWriteJson(this.headFile(group), { run_id: runId, pid: process.pid, joined_at: new Date().toISOString() });
    }

    return {
      group,
      runId,
      superseded: () => holder.controller.signal.aborted || (cancelInProgress && this.headOf(group) !== runId),
      release: () => this.release(group, holder)
    };
  }

  /** The run currently recorded as head of `group`, if any. */
  headOf(group: string): string | null {
    const file = this.headFile(group);
    if (!fs.existsSync(file)) return null;
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
      return isGroupHead(parsed) ? parsed.run_id : null;
    } catch {
      return null;
    }
  }

  private async release(group: string, holder: Holder): Promise<void> {
    if (this.holders.get(group) === holder) {
      this.holders.delete(group);
      if (this.headOf(group) === holder.runId) {
        fs.rmSync(this.headFile(group), { force: true });
      }
    }
    holder.finish();
  }

  private headFile(group: string): string {
    return path.join(this.stateDir, `${group}.json`);
  }
}
