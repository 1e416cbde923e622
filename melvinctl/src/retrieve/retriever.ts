import path from "node:path";
import { RetrievalFailure, errorMessage, isDeployError } from "../core/errors.js";
import type { Transport } from "../transport/transport.js";
import type { RetrieveConfig } from "../types/config.js";
import { logger as rootLogger, type Logger } from "../log/logger.js";

export type PullItem = {
  remote: string;
  local: string;
  recursive: boolean;
};

export type RetrievalOutcome = {
  pulled: string[];
  skipped: string[];
};

/** The fixed evaluation output set. The snapshot is large and opt-in. */
export function evaluationItems(config: RetrieveConfig, opts: { pullFull: boolean }): { items: PullItem[]; skipped: string[] } {
  const into = (remote: string): string => path.join(config.local_dir, path.posix.basename(remote));
  const items: PullItem[] = [
    { remote: config.dumps, local: into(config.dumps), recursive: true },
    { remote: config.images, local: into(config.images), recursive: true }
  ];
  if (opts.pullFull) {
    items.push({ remote: config.snapshot, local: into(config.snapshot), recursive: false });
    return { items, skipped: [] };
  }
  return { items, skipped: [config.snapshot] };
}

export class EvaluationRetriever {
  private readonly log: Logger;

  constructor(
    private readonly transport: Transport,
    private readonly config: RetrieveConfig,
    log?: Logger
  ) {
    this.log = (log ?? rootLogger).child({ stage: "retrieve" });
  }

  /**
   * Copy each item to its local path, in order. Stops at the first failure;
   * items already pulled stay on disk.
   * @throws RetrievalFailure
   */
  async pull(items: readonly PullItem[]): Promise<string[]> {
    const pulled: string[] = [];
    for (const item of items) {
      try {
        await this.transport.pull(item.remote, item.local, { recursive: item.recursive });
      } catch (e: unknown) {
        throw new RetrievalFailure(
          `Pulling ${item.remote} failed: ${errorMessage(e)}`,
          { remote: item.remote, pulled, cause_code: isDeployError(e) ? e.code : undefined },
          { cause: e }
        );
      }
      pulled.push(item.local);
    }
    return pulled;
  }

  async pullEvaluation(opts: { pullFull: boolean }): Promise<RetrievalOutcome> {
    const { items, skipped } = evaluationItems(this.config, opts);
    for (const remote of skipped) {
      this.log.info("PULL_SKIPPED", `skipping ${remote} (set PULL_FULL to include it)`);
    }
    const pulled = await this.pull(items);
    return { pulled, skipped };
  }
}
