import type { CommandExecutor } from "../exec/executor.js";
import type { TargetConfig, TransportConfig } from "../types/config.js";
import type { Logger } from "../log/logger.js";
import type { Credentials } from "./credentials.js";
import { ContainerTransport } from "./container-transport.js";
import { SshTransport } from "./ssh-transport.js";
import type { Transport } from "./transport.js";

export function createTransport(
  target: TargetConfig,
  credentials: Credentials,
  exec: CommandExecutor,
  config: TransportConfig,
  log?: Logger
): Transport {
  const ssh = new SshTransport(target, credentials, exec, config, log);
  return target.kind === "container" ? new ContainerTransport(target, ssh, exec, log) : ssh;
}

export type { Transport, Endpoint } from "./transport.js";
export type { Credentials, CredentialsProvider } from "./credentials.js";
