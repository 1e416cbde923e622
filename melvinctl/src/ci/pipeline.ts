import { errorMessage } from "../core/errors.js";
import { ACTIONS, type CiContext, type JobState, isActionName } from "./actions.js";
import { RunSuperseded, type ConcurrencyGroups, type GroupTicket } from "./concurrency.js";
import { conditionHolds, matchesPush, type PushEvent } from "./triggers.js";
import { jobOrder, type WorkflowSpec } from "./workflow.js";

export type JobStatus = "success" | "failed" | "skipped" | "cancelled";

export type JobReport = {
  job: string;
  status: JobStatus;
  completed_steps: string[];
  outputs: Record<string, unknown>;
  reason?: string;
};

export type WorkflowStatus = "success" | "failed" | "cancelled" | "not_triggered";

export type WorkflowReport = {
  workflow: string;
  status: WorkflowStatus;
  jobs: JobReport[];
};

export type CiReport = {
  run_id: string;
  event: PushEvent;
  workflows: WorkflowReport[];
};

export function triggeredWorkflows(workflows: readonly WorkflowSpec[], event: PushEvent): WorkflowSpec[] {
  return workflows.filter((wf) => matchesPush(wf.on.push, event));
}

/** A report fails only on a failed job; cancellation and skipping are not failures. */
export function reportFailed(report: CiReport): boolean {
  return report.workflows.some((w) => w.status === "failed");
}

function workflowStatus(jobs: readonly JobReport[]): WorkflowStatus {
  if (jobs.some((j) => j.status === "cancelled")) return "cancelled";
  if (jobs.some((j) => j.status === "failed")) return "failed";
  return "success";
}

/**
 * Runs the workflows a push triggers. Jobs run one at a time in `needs`
 * order; a job whose dependencies did not all succeed is skipped. A run that
 * is superseded in its concurrency group stops before its next step and
 * never reports success.
 */
export class CiRunner {
  constructor(
    private readonly ctx: CiContext,
    private readonly groups: ConcurrencyGroups
  ) {}

  async run(workflows: readonly WorkflowSpec[]): Promise<CiReport> {
    const reports: WorkflowReport[] = [];
    for (const wf of workflows) {
      reports.push(await this.runWorkflow(wf));
    }
    return { run_id: this.ctx.runId, event: this.ctx.event, workflows: reports };
  }

  async runWorkflow(wf: WorkflowSpec): Promise<WorkflowReport> {
    const log = this.ctx.log.child({ workflow: wf.name, run: this.ctx.runId });
    if (!matchesPush(wf.on.push, this.ctx.event)) {
      log.debug("CI_NOT_TRIGGERED", `${wf.name} does not run for ${this.ctx.event.ref}`);
      return { workflow: wf.name, status: "not_triggered", jobs: [] };
    }

    const ticket = wf.concurrency
      ? await this.groups.join(wf.concurrency.group, this.ctx.runId, wf.concurrency.cancel_in_progress ?? false)
      : null;

    const jobs: JobReport[] = [];
    try {
      const finished = new Map<string, JobStatus>();
      for (const name of jobOrder(wf)) {
        const spec = wf.jobs[name];
        if (!spec) continue;

        let report: JobReport;
        const blocked = (spec.needs ?? []).find((d) => finished.get(d) !== "success");
        if (jobs.some((j) => j.status === "cancelled")) {
          report = { job: name, status: "cancelled", completed_steps: [], outputs: {}, reason: "run was superseded" };
        } else if (blocked !== undefined) {
          report = { job: name, status: "skipped", completed_steps: [], outputs: {}, reason: `needs ${blocked}` };
        } else if (!conditionHolds(spec.if, this.ctx.event)) {
          report = { job: name, status: "skipped", completed_steps: [], outputs: {}, reason: `if: ${spec.if ?? "always"}` };
        } else {
          report = await this.runJob(name, spec.steps, ticket);
        }

        log.info(`CI_JOB_${report.status.toUpperCase()}`, `${wf.name}/${name}: ${report.status}`, { reason: report.reason });
        finished.set(name, report.status);
        jobs.push(report);
      }
    } finally {
      await ticket?.release();
    }

    const status = workflowStatus(jobs);
    log.info("CI_WORKFLOW_DONE", `${wf.name}: ${status}`);
    return { workflow: wf.name, status, jobs };
  }

  private async runJob(name: string, steps: readonly string[], ticket: GroupTicket | null): Promise<JobReport> {
    const state: JobState = { files: [], outputs: {} };
    const completed: string[] = [];

    const cancelled = (): JobReport => ({
      job: name,
      status: "cancelled",
      completed_steps: completed,
      outputs: state.outputs,
      reason: "run was superseded"
    });

    for (const step of steps) {
      if (ticket?.superseded()) return cancelled();
      if (!isActionName(step)) {
        return { job: name, status: "failed", completed_steps: completed, outputs: state.outputs, reason: `unknown step ${step}` };
      }
      try {
        await ACTIONS[step](this.ctx, state, ticket);
      } catch (e: unknown) {
        if (e instanceof RunSuperseded) return cancelled();
        return { job: name, status: "failed", completed_steps: completed, outputs: state.outputs, reason: `${step}: ${errorMessage(e)}` };
      }
      completed.push(step);
    }
    if (ticket?.superseded()) return cancelled();
    return { job: name, status: "success", completed_steps: completed, outputs: state.outputs };
  }
}
