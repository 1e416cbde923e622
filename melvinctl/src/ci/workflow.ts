import fs from "node:fs";
import YAML from "yaml";
import { compileGuard, readSchema } from "../schema/ajv.js";
import { ConfigValidationFailure, type ConfigIssue } from "../core/errors.js";
import { isActionName } from "./actions.js";

export type PushFilter = {
  branches?: string[];
  tags?: string[];
};

export type JobCondition = "always" | "tag" | "branch";

export type JobSpec = {
  needs?: string[];
  if?: JobCondition;
  steps: string[];
};

export type ConcurrencySpec = {
  group: string;
  cancel_in_progress?: boolean;
};

export type WorkflowSpec = {
  name: string;
  on: { push: PushFilter };
  concurrency?: ConcurrencySpec;
  jobs: Record<string, JobSpec>;
};

type WorkflowFile = { workflows: WorkflowSpec[] };

/**
 * Jobs in dependency order. Declaration order breaks ties, so independent
 * jobs keep the order they are written in.
 */
export function jobOrder(workflow: WorkflowSpec): string[] {
  const names = Object.keys(workflow.jobs);
  const done = new Set<string>();
  const order: string[] = [];

  while (order.length < names.length) {
    const ready = names.find((n) => !done.has(n) && (workflow.jobs[n]?.needs ?? []).every((d) => done.has(d)));
    if (ready === undefined) {
      const stuck = names.filter((n) => !done.has(n));
      throw new Error(`Workflow ${workflow.name} has a needs cycle among: ${stuck.join(", ")}`);
    }
    done.add(ready);
    order.push(ready);
  }
  return order;
}

function crossCheck(workflows: WorkflowSpec[]): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const seen = new Set<string>();

  for (const wf of workflows) {
    if (seen.has(wf.name)) {
      issues.push({ name: wf.name, problem: "malformed", message: `workflow ${wf.name} is declared twice` });
    }
    seen.add(wf.name);

    for (const [job, spec] of Object.entries(wf.jobs)) {
      for (const dep of spec.needs ?? []) {
        if (!(dep in wf.jobs)) {
          issues.push({ name: `${wf.name}.${job}`, problem: "malformed", message: `${wf.name}.${job} needs unknown job ${dep}` });
        }
      }
      for (const step of spec.steps) {
        if (!isActionName(step)) {
          issues.push({ name: `${wf.name}.${job}`, problem: "unrecognized", message: `${wf.name}.${job} uses unknown step ${step}` });
        }
      }
    }

    if (issues.length === 0) {
      try {
        jobOrder(wf);
      } catch (e: unknown) {
        issues.push({ name: wf.name, problem: "malformed", message: e instanceof Error ? e.message : String(e) });
      }
    }
  }
  return issues;
}

/** Parse and validate workflow definitions. */
export function parseWorkflows(text: string): WorkflowSpec[] {
  const parsed: unknown = YAML.parse(text);
  const guard = compileGuard<WorkflowFile>(readSchema("workflows"), "workflows");
  if (!guard.check(parsed)) {
    throw new ConfigValidationFailure([{ name: "workflows", problem: "malformed", message: guard.explain() }]);
  }

  const issues = crossCheck(parsed.workflows);
  if (issues.length > 0) throw new ConfigValidationFailure(issues);
  return parsed.workflows;
}

export function loadWorkflows(file: string): WorkflowSpec[] {
  if (!fs.existsSync(file)) {
    throw new ConfigValidationFailure([{ name: "workflows", problem: "missing", message: `Workflow file not found: ${file}` }]);
  }
  return parseWorkflows(fs.readFileSync(file, "utf8"));
}
