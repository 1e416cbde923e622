import fs from "node:fs";
import type { TargetConfig } from "../types/config.js";
import { registerSecret } from "../log/logger.js";

/**
 * How the transport authenticates. Supplied per invocation by the caller;
 * nothing here is read from the config file except an identity file path.
 */
export type Credentials =
  | { kind: "agent" }
  | { kind: "key"; identityFile: string }
  | { kind: "password"; secret: string };

export interface CredentialsProvider {
  resolve(target: TargetConfig): Promise<Credentials>;
}

export const DEFAULT_PASSWORD_ENV = "MELVINCTL_SSH_PASSWORD";

/** Fixed credentials, mostly for tests and embedding. */
export class StaticCredentials implements CredentialsProvider {
  constructor(private readonly credentials: Credentials) {}

  async resolve(): Promise<Credentials> {
    return this.credentials;
  }
}

/**
 * Resolution order: explicit identity file, the target's identity file, a
 * password taken from the named environment variable, then the SSH agent.
 */
export class EnvCredentialsProvider implements CredentialsProvider {
  constructor(
    private readonly opts: { identityFile?: string; passwordEnv?: string; env?: NodeJS.ProcessEnv } = {}
  ) {}

  async resolve(target: TargetConfig): Promise<Credentials> {
    const identity = this.opts.identityFile ?? target.identity_file;
    if (identity) {
      if (!fs.existsSync(identity)) {
        throw new Error(`Identity file not found: ${identity}`);
      }
      return { kind: "key", identityFile: identity };
    }

    const env = this.opts.env ?? process.env;
    const varName = this.opts.passwordEnv ?? DEFAULT_PASSWORD_ENV;
    const secret = env[varName];
    if (secret) {
      registerSecret(secret);
      return { kind: "password", secret };
    }
    if (this.opts.passwordEnv) {
      throw new Error(`Password variable ${varName} is not set`);
    }

    return { kind: "agent" };
  }
}
