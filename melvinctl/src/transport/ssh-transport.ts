import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import type { CommandExecutor, ExecResult } from "../exec/executor.js";
import type { TargetConfig, TransportConfig } from "../types/config.js";
import { TransferFailure, errorMessage } from "../core/errors.js";
import { shellJoin } from "../util/sanitize.js";
import { logger as rootLogger, type Logger } from "../log/logger.js";
import type { Credentials } from "./credentials.js";
import { describeEndpoint, type Endpoint, type Transport } from "./transport.js";

/** ssh reserves 255 for its own errors (connection refused, auth failure). */
export const SSH_TRANSPORT_ERROR = 255;

const CONNECT_TIMEOUT_S = 10;

type Invocation = { command: string; args: string[]; env?: Record<string, string> };

function stagingToken(): string {
  return `${process.pid}-${crypto.randomBytes(4).toString("hex")}`;
}

/**
 * BareHost transport: ssh/scp against a fixed endpoint and port.
 */
export class SshTransport implements Transport {
  readonly kind: TargetConfig["kind"] = "bare";
  readonly endpoint: Endpoint;
  private readonly log: Logger;

  constructor(
    target: TargetConfig,
    private readonly credentials: Credentials,
    private readonly local: CommandExecutor,
    private readonly config: TransportConfig,
    log?: Logger
  ) {
    this.endpoint = { host: target.host, port: target.port, user: target.user };
    this.log = (log ?? rootLogger).child({ stage: "transport", endpoint: describeEndpoint(this.endpoint) });
  }

  async prepare(): Promise<void> {
    const res = await this.exec(["true"]);
    if (res.code !== 0) {
      throw new TransferFailure(`Host ${describeEndpoint(this.endpoint)} is not usable (exit ${res.code})`, {
        stderr: res.stderr.trim()
      });
    }
  }

  async exec(argv: readonly string[]): Promise<ExecResult> {
    const inv = this.invocation("ssh", [
      ...this.commonOptions(),
      "-p",
      String(this.endpoint.port),
      this.login(),
      "--",
      shellJoin(argv)
    ]);
    this.log.debug("REMOTE_EXEC", shellJoin(argv));
    const res = await this.run(inv, `remote command ${argv[0] ?? ""}`);
    if (res.code === SSH_TRANSPORT_ERROR) {
      throw new TransferFailure(`ssh to ${describeEndpoint(this.endpoint)} failed`, { stderr: res.stderr.trim() });
    }
    return res;
  }

  async copyArtifact(localPath: string, remotePath: string): Promise<void> {
    await this.stagedCopy(localPath, remotePath, "755");
  }

  async copyConfig(localPath: string, remotePath: string): Promise<void> {
    await this.stagedCopy(localPath, remotePath, "644");
  }

  async pull(remotePath: string, localPath: string, opts: { recursive?: boolean } = {}): Promise<void> {
    const staged = `${localPath}.part-${stagingToken()}`;
    fs.mkdirSync(path.dirname(localPath), { recursive: true });

    const args = [...this.commonOptions(), "-P", String(this.endpoint.port)];
    if (opts.recursive) args.push("-r");
    args.push(`${this.login()}:${remotePath}`, staged);

    let res: ExecResult;
    try {
      res = await this.run(this.invocation("scp", args), `pull ${remotePath}`);
    } catch (e: unknown) {
      fs.rmSync(staged, { recursive: true, force: true });
      throw e;
    }
    if (res.code !== 0) {
      fs.rmSync(staged, { recursive: true, force: true });
      throw new TransferFailure(`Pulling ${remotePath} failed (exit ${res.code})`, { stderr: res.stderr.trim() });
    }

    fs.rmSync(localPath, { recursive: true, force: true });
    fs.renameSync(staged, localPath);
    this.log.info("PULLED", `${remotePath} -> ${localPath}`);
  }

  /** scp to `<dest>.part-<token>`, then chmod and rename into place. */
  private async stagedCopy(localPath: string, remotePath: string, mode: string): Promise<void> {
    if (!fs.existsSync(localPath) || !fs.statSync(localPath).isFile()) {
      throw new TransferFailure(`Local file not found: ${localPath}`);
    }

    const staged = `${remotePath}.part-${stagingToken()}`;
    const mkdir = await this.exec(["mkdir", "-p", path.posix.dirname(remotePath)]);
    if (mkdir.code !== 0) {
      throw new TransferFailure(`Cannot create ${path.posix.dirname(remotePath)} on host`, { stderr: mkdir.stderr.trim() });
    }

    let scp: ExecResult;
    try {
      scp = await this.run(
        this.invocation("scp", [
          ...this.commonOptions(),
          "-P",
          String(this.endpoint.port),
          localPath,
          `${this.login()}:${staged}`
        ]),
        `copy ${path.basename(localPath)}`
      );
    } catch (e: unknown) {
      await this.discard(staged);
      throw e;
    }
    if (scp.code !== 0) {
      await this.discard(staged);
      throw new TransferFailure(`Copying ${localPath} failed (exit ${scp.code})`, { stderr: scp.stderr.trim() });
    }

    for (const argv of [["chmod", mode, staged], ["mv", "-f", "--", staged, remotePath]]) {
      let res: ExecResult;
      try {
        res = await this.exec(argv);
      } catch (e: unknown) {
        await this.discard(staged);
        throw e;
      }
      if (res.code !== 0) {
        await this.discard(staged);
        throw new TransferFailure(`Finalizing ${remotePath} failed at ${argv[0]}`, { stderr: res.stderr.trim() });
      }
    }
    this.log.info("COPIED", `${localPath} -> ${remotePath}`);
  }

  private async discard(staged: string): Promise<void> {
    try {
      await this.exec(["rm", "-f", "--", staged]);
    } catch (e: unknown) {
      this.log.warn("STAGED_FILE_LEFT", `Could not remove ${staged}: ${errorMessage(e)}`);
    }
  }

  private async run(inv: Invocation, what: string): Promise<ExecResult> {
    try {
      return await this.local.run(inv.command, inv.args, { env: inv.env, timeoutMs: this.config.timeout_ms });
    } catch (e: unknown) {
      throw new TransferFailure(`${what} on ${describeEndpoint(this.endpoint)}: ${errorMessage(e)}`, {}, { cause: e });
    }
  }

  private login(): string {
    return `${this.endpoint.user}@${this.endpoint.host}`;
  }

  private commonOptions(): string[] {
    const opts = [
      "-o",
      `StrictHostKeyChecking=${this.config.strict_host_key_checking ?? "accept-new"}`,
      "-o",
      `ConnectTimeout=${CONNECT_TIMEOUT_S}`
    ];
    switch (this.credentials.kind) {
      case "key":
        return [...opts, "-o", "BatchMode=yes", "-o", "IdentitiesOnly=yes", "-i", this.credentials.identityFile];
      case "agent":
        return [...opts, "-o", "BatchMode=yes"];
      case "password":
        return opts;
    }
  }

  /** Passwords travel in SSHPASS on the child only, never in argv. */
  private invocation(program: "ssh" | "scp", args: string[]): Invocation {
    if (this.credentials.kind === "password") {
      return { command: "sshpass", args: ["-e", program, ...args], env: { SSHPASS: this.credentials.secret } };
    }
    return { command: program, args };
  }
}
