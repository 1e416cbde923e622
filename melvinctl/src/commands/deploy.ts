import path from "node:path";
import { CargoBuilder, type ArtifactBuilder } from "../build/builder.js";
import { DeploymentOrchestrator, type DeploymentResult } from "../core/orchestrator.js";
import { Deployment } from "../core/deployment.js";
import { makeRunId } from "../core/run-record.js";
import type { DeploymentStatus } from "../core/state-machine.js";
import { collectEnvironment, parseAssignments, resolveEnvironment, serializeEnvironment } from "../env/resolver.js";
import { TmuxSessionManager } from "../session/session-manager.js";
import { resolveTarget } from "../config/validator.js";
import type { BuildProfile } from "../types/config.js";
import { exitCodeFor } from "./exit-codes.js";
import { type CommandDeps, type CommandFailure, type ConnectionOpts, connect, failure, loadCommandConfig } from "./common.js";

export type DeployOpts = ConnectionOpts & {
  /** Repeated `NAME=VALUE` toggle overrides. */
  env?: string[];
  buildProfile?: BuildProfile;
  runsDir?: string;
};

export type DeployDeps = CommandDeps & {
  builder?: ArtifactBuilder;
};

export type DeployCommandResult =
  | { ok: true; runId: string; statePath: string; status: DeploymentStatus; session: string; env: string[] }
  | (CommandFailure & { runId?: string; statePath?: string; status?: DeploymentStatus });

/**
 * Build, transfer, replace the session, launch. The environment is resolved
 * and validated before anything touches the host.
 */
export async function deploy(opts: DeployOpts, deps: DeployDeps = {}): Promise<DeployCommandResult> {
  try {
    const config = loadCommandConfig(opts, deps);
    const { target } = resolveTarget(config, opts.target);
    const env = resolveEnvironment(
      collectEnvironment({
        file: config.environment,
        process: deps.processEnv ?? process.env,
        overrides: parseAssignments(opts.env ?? [])
      })
    );

    const conn = await connect(config, opts, deps);
    const runId = makeRunId();
    const builder = deps.builder ?? new CargoBuilder(config.build, conn.exec, conn.log);
    const sessions = new TmuxSessionManager(conn.transport, conn.log);
    const deployment = new Deployment(
      config,
      { runId, sessionName: target.session_name, profile: opts.buildProfile ?? config.build.profile, env },
      builder,
      conn.transport,
      sessions,
      conn.log
    );

    const runsDir = path.resolve(opts.runsDir ?? config.runs_dir);
    const orchestrator = new DeploymentOrchestrator(runsDir, deployment.runStep, conn.log);
    let result: DeploymentResult;
    try {
      result = await orchestrator.run({ runId, target: conn.targetName, sessionName: target.session_name });
    } finally {
      await deployment.close();
    }

    if (result.success) {
      return {
        ok: true,
        runId,
        statePath: result.statePath,
        status: result.final_status,
        session: target.session_name,
        env: Object.keys(serializeEnvironment(env))
      };
    }

    const code = result.error?.code ?? "LAUNCH_FAILED";
    return {
      ok: false,
      error: { code, message: result.error?.message ?? `Deployment ended in ${result.final_status}` },
      exitCode: exitCodeFor(code),
      runId,
      statePath: result.statePath,
      status: result.final_status
    };
  } catch (e: unknown) {
    return failure(e);
  }
}
