import type { CommandExecutor, ExecResult } from "../exec/executor.js";
import type { TargetConfig } from "../types/config.js";
import { TransferFailure, errorMessage } from "../core/errors.js";
import { logger as rootLogger, type Logger } from "../log/logger.js";
import type { Endpoint, Transport } from "./transport.js";

/** sshd refuses to start without its privilege separation directory. */
export const PRIVSEP_DIR = "/run/sshd";

const LOCAL_TIMEOUT_MS = 30_000;

/**
 * ContainerHost transport: makes sure an sshd runs inside the local
 * container, then delegates everything to a BareHost transport pointed at
 * the container-local endpoint.
 */
export class ContainerTransport implements Transport {
  readonly kind: TargetConfig["kind"] = "container";
  private readonly log: Logger;
  private readonly sshdPath: string;

  constructor(
    target: TargetConfig,
    private readonly inner: Transport,
    private readonly local: CommandExecutor,
    log?: Logger
  ) {
    if (!target.sshd_path) {
      throw new Error("container target requires sshd_path");
    }
    this.sshdPath = target.sshd_path;
    this.log = (log ?? rootLogger).child({ stage: "transport", topology: "container" });
  }

  get endpoint(): Endpoint {
    return this.inner.endpoint;
  }

  async prepare(): Promise<void> {
    await this.ensureSshd();
    await this.inner.prepare();
  }

  /** Starting an sshd that is already running is a no-op. */
  async ensureSshd(): Promise<"already-running" | "started"> {
    const pgrep = await this.runLocal("pgrep", ["-x", "sshd"]);
    if (pgrep.code === 0) {
      this.log.debug("SSHD_RUNNING", "sshd already running");
      return "already-running";
    }

    const mkdir = await this.runLocal("mkdir", ["-p", PRIVSEP_DIR]);
    if (mkdir.code !== 0) {
      throw new TransferFailure(`Cannot create ${PRIVSEP_DIR}`, { stderr: mkdir.stderr.trim() });
    }

    const start = await this.runLocal(this.sshdPath, []);
    if (start.code !== 0) {
      throw new TransferFailure(`${this.sshdPath} exited with ${start.code}`, { stderr: start.stderr.trim() });
    }
    this.log.info("SSHD_STARTED", `started ${this.sshdPath}`);
    return "started";
  }

  exec(argv: readonly string[]): Promise<ExecResult> {
    return this.inner.exec(argv);
  }

  copyArtifact(localPath: string, remotePath: string): Promise<void> {
    return this.inner.copyArtifact(localPath, remotePath);
  }

  copyConfig(localPath: string, remotePath: string): Promise<void> {
    return this.inner.copyConfig(localPath, remotePath);
  }

  pull(remotePath: string, localPath: string, opts?: { recursive?: boolean }): Promise<void> {
    return this.inner.pull(remotePath, localPath, opts);
  }

  private async runLocal(command: string, args: string[]): Promise<ExecResult> {
    try {
      return await this.local.run(command, args, { timeoutMs: LOCAL_TIMEOUT_MS });
    } catch (e: unknown) {
      throw new TransferFailure(`${command} could not be run: ${errorMessage(e)}`, {}, { cause: e });
    }
  }
}
