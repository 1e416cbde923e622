import path from "node:path";
import { type ConfigIssue, ConfigValidationFailure, RetrievalFailure, errorMessage } from "../core/errors.js";
import { parseAssignments } from "../env/resolver.js";
import { EvaluationRetriever } from "../retrieve/retriever.js";
import { type CommandDeps, type CommandFailure, type ConnectionOpts, connect, failure, loadCommandConfig } from "./common.js";

export type RetrieveOpts = ConnectionOpts & {
  /** Only `PULL_FULL=...` is meaningful here. */
  env?: string[];
  outDir?: string;
};

export type RetrieveCommandResult =
  | { ok: true; pulled: string[]; skipped: string[] }
  | CommandFailure;

/** PULL_FULL from `--env`, else from the invoking environment; presence is what counts. */
export function wantsFullPull(overrides: Readonly<Record<string, string>>, processEnv: NodeJS.ProcessEnv): boolean {
  return (overrides.PULL_FULL ?? processEnv.PULL_FULL ?? "") !== "";
}

export async function retrieve(opts: RetrieveOpts, deps: CommandDeps = {}): Promise<RetrieveCommandResult> {
  try {
    const config = loadCommandConfig(opts, deps);
    const overrides = parseAssignments(opts.env ?? []);
    const stray = Object.keys(overrides).filter((k) => k !== "PULL_FULL");
    if (stray.length > 0) {
      throw new ConfigValidationFailure(
        stray.map((name): ConfigIssue => ({ name, problem: "unrecognized", message: `${name} has no effect on retrieval (only PULL_FULL)` }))
      );
    }

    const conn = await connect(config, opts, deps);
    try {
      await conn.transport.prepare();
    } catch (e: unknown) {
      throw new RetrievalFailure(`Host not reachable: ${errorMessage(e)}`, {}, { cause: e });
    }

    const retriever = new EvaluationRetriever(
      conn.transport,
      { ...config.retrieve, local_dir: path.resolve(opts.outDir ?? config.retrieve.local_dir) },
      conn.log
    );
    const outcome = await retriever.pullEvaluation({
      pullFull: wantsFullPull(overrides, deps.processEnv ?? process.env)
    });
    return { ok: true, ...outcome };
  } catch (e: unknown) {
    return failure(e);
  }
}
