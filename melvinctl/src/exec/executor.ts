import { execFile } from "node:child_process";
import { promisify } from "node:util";

const pExecFile = promisify(execFile);

export const MAX_CMD_BUFFER_SIZE = 50 * 1024 * 1024;

export type ExecOptions = {
  cwd?: string;
  /** Extra variables layered over the parent environment for this child only. */
  env?: Record<string, string>;
  timeoutMs?: number;
};

export type ExecResult = {
  code: number;
  stdout: string;
  stderr: string;
};

/**
 * Runs local programs without a shell. A non-zero exit is a result, not an
 * error; callers decide what an exit code means. Only failures to run at all
 * (missing binary, timeout, signal) reject.
 */
export interface CommandExecutor {
  run(command: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult>;
}

export class ExecTimeoutError extends Error {
  constructor(
    readonly command: string,
    readonly timeoutMs: number
  ) {
    super(`${command} timed out after ${timeoutMs}ms`);
    this.name = "ExecTimeoutError";
  }
}

type ExecFailure = {
  code?: number | string | null;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
  stdout?: string;
  stderr?: string;
  message: string;
};

function isExecFailure(e: unknown): e is ExecFailure {
  return e instanceof Error;
}

export class ProcessExecutor implements CommandExecutor {
  async run(command: string, args: readonly string[], opts: ExecOptions = {}): Promise<ExecResult> {
    try {
      const { stdout, stderr } = await pExecFile(command, [...args], {
        cwd: opts.cwd,
        env: opts.env ? { ...process.env, ...opts.env } : process.env,
        maxBuffer: MAX_CMD_BUFFER_SIZE,
        shell: false,
        timeout: opts.timeoutMs,
        encoding: "utf8"
      });
      return { code: 0, stdout, stderr };
    } catch (e: unknown) {
      if (!isExecFailure(e)) throw e;
      if (e.killed && opts.timeoutMs !== undefined) {
        throw new ExecTimeoutError(command, opts.timeoutMs);
      }
      if (typeof e.code === "number") {
        return { code: e.code, stdout: e.stdout ?? "", stderr: e.stderr ?? "" };
      }
      throw e;
    }
  }
}
