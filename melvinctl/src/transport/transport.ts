import type { ExecResult } from "../exec/executor.js";
import type { TargetKind } from "../types/config.js";

export type Endpoint = {
  host: string;
  port: number;
  user: string;
};

/**
 * Delivery channel to one target host. Copies are atomic from the caller's
 * view: the destination name only ever holds a complete file. Any failure
 * raises TransferFailure; nothing is retried.
 */
export interface Transport {
  readonly kind: TargetKind;
  readonly endpoint: Endpoint;

  /** Make the endpoint reachable (starts sshd for container targets). Idempotent. */
  prepare(): Promise<void>;

  /** Run argv on the host. Non-zero exits are returned, unreachable hosts throw. */
  exec(argv: readonly string[]): Promise<ExecResult>;

  copyArtifact(localPath: string, remotePath: string): Promise<void>;

  copyConfig(localPath: string, remotePath: string): Promise<void>;

  pull(remotePath: string, localPath: string, opts?: { recursive?: boolean }): Promise<void>;
}

export function describeEndpoint(e: Endpoint): string {
  return `${e.user}@${e.host}:${e.port}`;
}
