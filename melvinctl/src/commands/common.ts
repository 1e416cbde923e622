import { loadValidatedConfig, resolveTarget } from "../config/validator.js";
import { type ConfigIssue, errorMessage, isDeployError, ConfigValidationFailure } from "../core/errors.js";
import { ProcessExecutor, type CommandExecutor } from "../exec/executor.js";
import { logger as rootLogger, type Logger } from "../log/logger.js";
import { EnvCredentialsProvider, type Credentials, type CredentialsProvider } from "../transport/credentials.js";
import { createTransport, type Transport } from "../transport/index.js";
import type { MelvinctlConfig, TargetConfig } from "../types/config.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type CommandError = {
  code: string;
  message: string;
  issues?: ConfigIssue[];
};

export type CommandFailure = { ok: false; error: CommandError; exitCode: ExitCode };

/** Options shared by every command that talks to a host. */
export type ConnectionOpts = {
  configDir?: string;
  profile?: string;
  target?: string;
  identityFile?: string;
  passwordEnv?: string;
};

/** Seams for tests and embedders; everything defaults to the real thing. */
export type CommandDeps = {
  exec?: CommandExecutor;
  credentials?: CredentialsProvider;
  transportFactory?: (target: TargetConfig, credentials: Credentials) => Transport;
  processEnv?: NodeJS.ProcessEnv;
  log?: Logger;
};

/**
 * Taxonomy errors keep their own exit code; anything else is a bad
 * argument (unknown profile, unknown target, missing identity file).
 */
export function failure(e: unknown): CommandFailure {
  if (isDeployError(e)) {
    const error: CommandError = { code: e.code, message: e.message };
    if (e instanceof ConfigValidationFailure) error.issues = e.issues;
    return { ok: false, error, exitCode: exitCodeFor(e.code) };
  }
  return { ok: false, error: { code: "INVALID_ARGS", message: errorMessage(e) }, exitCode: EXIT.INVALID_ARGS };
}

export function loadCommandConfig(opts: ConnectionOpts, deps: CommandDeps = {}): MelvinctlConfig {
  return loadValidatedConfig({ profile: opts.profile, configDir: opts.configDir, env: deps.processEnv ?? process.env });
}

export type Connection = {
  targetName: string;
  target: TargetConfig;
  transport: Transport;
  exec: CommandExecutor;
  log: Logger;
};

export async function connect(config: MelvinctlConfig, opts: ConnectionOpts, deps: CommandDeps = {}): Promise<Connection> {
  const { name, target } = resolveTarget(config, opts.target);
  const log = (deps.log ?? rootLogger).child({ target: name });
  const exec = deps.exec ?? new ProcessExecutor();

  const provider =
    deps.credentials ??
    new EnvCredentialsProvider({ identityFile: opts.identityFile, passwordEnv: opts.passwordEnv, env: deps.processEnv });
  const credentials = await provider.resolve(target);

  const transport = deps.transportFactory
    ? deps.transportFactory(target, credentials)
    : createTransport(target, credentials, exec, config.transport, log);
  return { targetName: name, target, transport, exec, log };
}
