/**
 * Deployment error taxonomy. Every failure is terminal for the run that
 * raised it; the operator recovers by re-running the whole deployment.
 */
export type DeployErrorCode =
  | "BUILD_FAILED"
  | "TRANSFER_FAILED"
  | "SESSION_TEARDOWN_FAILED"
  | "LAUNCH_FAILED"
  | "CONFIG_INVALID"
  | "LEASE_CONFLICT"
  | "RETRIEVAL_FAILED"
  | "CI_FAILED";

export class DeployError extends Error {
  readonly code: DeployErrorCode;
  readonly detail: Record<string, unknown>;

  constructor(code: DeployErrorCode, message: string, detail: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeployError";
    this.code = code;
    this.detail = detail;
  }
}

export class BuildFailure extends DeployError {
  constructor(message: string, detail: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super("BUILD_FAILED", message, detail, options);
    this.name = "BuildFailure";
  }
}

export class TransferFailure extends DeployError {
  constructor(message: string, detail: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super("TRANSFER_FAILED", message, detail, options);
    this.name = "TransferFailure";
  }
}

export class SessionTeardownFailure extends DeployError {
  constructor(message: string, detail: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super("SESSION_TEARDOWN_FAILED", message, detail, options);
    this.name = "SessionTeardownFailure";
  }
}

export class LaunchFailure extends DeployError {
  constructor(message: string, detail: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super("LAUNCH_FAILED", message, detail, options);
    this.name = "LaunchFailure";
  }
}

/** One entry per rejected toggle, so the operator sees every problem at once. */
export type ConfigIssue = {
  name: string;
  problem: "unrecognized" | "malformed" | "missing";
  message: string;
};

export class ConfigValidationFailure extends DeployError {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super("CONFIG_INVALID", `Invalid configuration: ${issues.map((i) => i.message).join("; ")}`, {
      issues
    });
    this.name = "ConfigValidationFailure";
    this.issues = issues;
  }
}

export class LeaseConflict extends DeployError {
  constructor(leasePath: string, holder: string) {
    super("LEASE_CONFLICT", `Deployment lease ${leasePath} is held by ${holder || "an unknown deployer"}`, {
      leasePath,
      holder
    });
    this.name = "LeaseConflict";
  }
}

export class RetrievalFailure extends DeployError {
  constructor(message: string, detail: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super("RETRIEVAL_FAILED", message, detail, options);
    this.name = "RetrievalFailure";
  }
}

export class CiFailure extends DeployError {
  constructor(message: string, detail: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super("CI_FAILED", message, detail, options);
    this.name = "CiFailure";
  }
}

export function isDeployError(e: unknown): e is DeployError {
  return e instanceof DeployError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
