import type { DeployErrorCode } from "../core/errors.js";

/**
 * CLI exit codes. Failure codes are distinct per stage so retry tooling can
 * tell a broken build from an unreachable host.
 */
export const EXIT = {
  SUCCESS: 0,
  CONFIG_INVALID: 2,
  INVALID_ARGS: 3,
  LEASE_CONFLICT: 4,
  BUILD_FAILED: 10,
  TRANSFER_FAILED: 11,
  SESSION_TEARDOWN_FAILED: 12,
  LAUNCH_FAILED: 13,
  RETRIEVAL_FAILED: 14,
  CI_FAILED: 15
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(code: DeployErrorCode): ExitCode {
  return EXIT[code];
}
