import path from "node:path";
import type { Artifact, ArtifactBuilder } from "../build/builder.js";
import type { EnvironmentConfiguration } from "../env/resolver.js";
import { serializeEnvironment } from "../env/resolver.js";
import type { Transport } from "../transport/transport.js";
import { type LeaseHandle, RemoteLease, leaseOwner } from "../transport/lease.js";
import type { TmuxSessionManager } from "../session/session-manager.js";
import type { BuildProfile, MelvinctlConfig } from "../types/config.js";
import { logger as rootLogger, type Logger } from "../log/logger.js";
import { BuildFailure, errorMessage } from "./errors.js";
import type { StepRunner } from "./orchestrator.js";
import type { DeploymentStep } from "./state-machine.js";

export type DeploymentPlan = {
  runId: string;
  sessionName: string;
  profile: BuildProfile;
  env: EnvironmentConfiguration;
};

export type RemoteLayout = {
  binary: string;
  config: string;
  workdir: string;
};

export function remoteLayout(config: MelvinctlConfig): RemoteLayout {
  const dir = config.session.remote_dir;
  return {
    binary: path.posix.join(dir, config.session.binary_name),
    config: path.posix.join(dir, config.session.config_name),
    workdir: dir
  };
}

/**
 * The four deployment steps against one host. Holds the artifact between
 * build and transfer and the lease (when enabled) until `close()`.
 */
export class Deployment {
  private artifact: Artifact | null = null;
  private lease: LeaseHandle | null = null;
  private readonly layout: RemoteLayout;
  private readonly log: Logger;

  constructor(
    private readonly config: MelvinctlConfig,
    private readonly plan: DeploymentPlan,
    private readonly builder: ArtifactBuilder,
    private readonly transport: Transport,
    private readonly sessions: TmuxSessionManager,
    log?: Logger
  ) {
    this.layout = remoteLayout(config);
    this.log = (log ?? rootLogger).child({ run: plan.runId });
  }

  readonly runStep: StepRunner = async (step: DeploymentStep) => {
    switch (step) {
      case "build":
        return this.build();
      case "transfer":
        return this.transfer();
      case "replace_session":
        return { teardown: await this.sessions.ensureCleanSession(this.plan.sessionName) };
      case "launch":
        return this.launch();
    }
  };

  /** Releases the lease if this deployment took it. */
  async close(): Promise<void> {
    const lease = this.lease;
    this.lease = null;
    if (!lease) return;
    try {
      await lease.release();
    } catch (e: unknown) {
      this.log.warn("LEASE_RELEASE_FAILED", `lease not released: ${errorMessage(e)}; run \`melvinctl unlock\``);
    }
  }

  private async build(): Promise<Record<string, unknown>> {
    this.artifact = await this.builder.build({ profile: this.plan.profile });
    return { artifact: { path: this.artifact.outputPath, sha256: this.artifact.sha256 } };
  }

  private async transfer(): Promise<Record<string, unknown>> {
    const artifact = this.artifact;
    if (!artifact) throw new BuildFailure("No artifact to transfer");

    await this.transport.prepare();
    if (this.config.lease?.enabled) {
      this.lease = await new RemoteLease(this.transport, this.config.lease.path, this.log).acquire(
        leaseOwner(this.plan.runId)
      );
    }
    if (this.config.session.install_multiplexer) {
      await this.sessions.ensureMultiplexer();
    }

    await this.transport.copyArtifact(artifact.outputPath, this.layout.binary);
    await this.transport.copyConfig(path.resolve(this.config.session.config_file), this.layout.config);
    return { remote_binary: this.layout.binary };
  }

  private async launch(): Promise<Record<string, unknown>> {
    const env = serializeEnvironment(this.plan.env);
    await this.sessions.launchSession({
      name: this.plan.sessionName,
      command: this.layout.binary,
      env,
      cwd: this.layout.workdir,
      configPath: this.layout.config,
      settleMs: this.config.session.settle_ms
    });
    return { session: this.plan.sessionName, env: Object.keys(env) };
  }
}
