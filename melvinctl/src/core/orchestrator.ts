import {
  BuildFailure,
  DeployError,
  LaunchFailure,
  SessionTeardownFailure,
  TransferFailure,
  errorMessage,
  isDeployError
} from "./errors.js";
import { logger as rootLogger, type Logger } from "../log/logger.js";
import { type DeploymentStatus, type DeploymentStep, isTerminal, nextState, pendingStep } from "./state-machine.js";
import { type DeploymentRecord, appendProgress, saveRecord } from "./run-record.js";

export type DeploymentResult = {
  success: boolean;
  run_id: string;
  final_status: DeploymentStatus;
  step_results: DeploymentRecord["step_results"];
  statePath: string;
  error?: DeployError;
};

/** Executes one step; throwing marks the step failed. Returned values land in `outputs`. */
export type StepRunner = (step: DeploymentStep, record: Readonly<DeploymentRecord>) => Promise<Record<string, unknown> | void>;

/** Non-taxonomy errors are attributed to the step they escaped from. */
export function failureFor(step: DeploymentStep, e: unknown): DeployError {
  if (isDeployError(e)) return e;
  const message = `${step} failed: ${errorMessage(e)}`;
  switch (step) {
    case "build":
      return new BuildFailure(message, {}, { cause: e });
    case "transfer":
      return new TransferFailure(message, {}, { cause: e });
    case "replace_session":
      return new SessionTeardownFailure(message, {}, { cause: e });
    case "launch":
      return new LaunchFailure(message, {}, { cause: e });
  }
}

/**
 * Drives one deployment through the state machine.
 *
 * Main loop: run pending step → persist → advance. The first failure is
 * terminal; there are no retries and a failed run is never resumed.
 */
export class DeploymentOrchestrator {
  private readonly log: Logger;

  constructor(
    private readonly runsDir: string,
    private readonly stepRunner: StepRunner,
    log?: Logger
  ) {
    this.log = (log ?? rootLogger).child({ stage: "orchestrator" });
  }

  async run(opts: { runId: string; target: string; sessionName: string }): Promise<DeploymentResult> {
    const now = new Date().toISOString();
    const record: DeploymentRecord = {
      version: 1,
      run_id: opts.runId,
      target: opts.target,
      session_name: opts.sessionName,
      status: "idle",
      started_at: now,
      updated_at: now,
      step_results: {},
      outputs: {},
      error: null
    };
    let statePath = await saveRecord(this.runsDir, record);
    await appendProgress(this.runsDir, opts.runId, `start target=${opts.target} session=${opts.sessionName}`);

    let failure: DeployError | undefined;

    for (let step = pendingStep(record.status); step && !isTerminal(record.status); step = pendingStep(record.status)) {
      const started = Date.now();
      this.log.info("STEP_START", `${step}`, { run: opts.runId, step });

      try {
        const outputs = await this.stepRunner(step, record);
        record.step_results[step] = { status: "success", duration_ms: Date.now() - started };
        if (outputs) record.outputs = { ...record.outputs, ...outputs };
        record.status = nextState(record.status, step, "success");
      } catch (e: unknown) {
        failure = failureFor(step, e);
        record.step_results[step] = { status: "failed", duration_ms: Date.now() - started, error: failure.message };
        record.status = nextState(record.status, step, "failure");
        record.error = { code: failure.code, message: failure.message };
        this.log.error(failure.code, failure.message, { run: opts.runId, step });
      }

      record.updated_at = new Date().toISOString();
      statePath = await saveRecord(this.runsDir, record);
      await appendProgress(this.runsDir, opts.runId, `${step} -> ${record.status}`);
    }

    return {
      success: record.status === "launched",
      run_id: opts.runId,
      final_status: record.status,
      step_results: record.step_results,
      statePath,
      error: failure
    };
  }
}
