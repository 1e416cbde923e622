import path from "node:path";
import { CargoBuilder, buildDocs, type ArtifactBuilder } from "../build/builder.js";
import { CiRunner, reportFailed, triggeredWorkflows, type CiReport } from "../ci/pipeline.js";
import { ConcurrencyGroups } from "../ci/concurrency.js";
import { LocalArtifactStore, LocalPagesPublisher, LocalReleasePublisher } from "../ci/publishers.js";
import { parseRef, type PushEvent } from "../ci/triggers.js";
import { loadWorkflows } from "../ci/workflow.js";
import { CONFIG_DIR } from "../config/loader.js";
import { CiFailure, ConfigValidationFailure } from "../core/errors.js";
import { atomicWriteJson, makeRunId, runDir } from "../core/run-record.js";
import { ProcessExecutor } from "../exec/executor.js";
import { GitOperations, type GitReader } from "../git/operations.js";
import { logger as rootLogger } from "../log/logger.js";
import { EXIT } from "./exit-codes.js";
import { type CommandDeps, type CommandFailure, failure, loadCommandConfig } from "./common.js";

export type CiOpts = {
  configDir?: string;
  profile?: string;
  /** Fully qualified ref (`refs/tags/v1.0.0`) or a branch name. */
  ref?: string;
  /** Run only this workflow. */
  workflow?: string;
  runsDir?: string;
  /** Only print which workflows the push would trigger. */
  plan?: boolean;
};

export type CiDeps = CommandDeps & {
  builder?: ArtifactBuilder;
  buildDocs?: () => Promise<string>;
  git?: GitReader;
  groups?: ConcurrencyGroups;
};

export type CiPlan = {
  event: PushEvent;
  triggered: string[];
  not_triggered: string[];
};

export type CiCommandResult =
  | { ok: true; plan: CiPlan }
  | { ok: true; report: CiReport; reportPath: string }
  | (CommandFailure & { report?: CiReport; reportPath?: string });

async function resolveRef(opts: CiOpts, deps: CiDeps): Promise<string> {
  const fromEnv = (deps.processEnv ?? process.env).GITHUB_REF;
  if (opts.ref) return opts.ref;
  if (fromEnv) return fromEnv;
  return new GitOperations(process.cwd(), deps.git).getHeadRef();
}

export async function ci(opts: CiOpts, deps: CiDeps = {}): Promise<CiCommandResult> {
  try {
    const config = loadCommandConfig(opts, deps);
    if (!config.ci) {
      throw new ConfigValidationFailure([{ name: "ci", problem: "missing", message: "No ci section in the configuration" }]);
    }
    const ciConfig = config.ci;
    let workflows = loadWorkflows(path.resolve(opts.configDir ?? CONFIG_DIR, ciConfig.workflows));
    if (opts.workflow) {
      workflows = workflows.filter((w) => w.name === opts.workflow);
      if (workflows.length === 0) throw new Error(`Unknown workflow: ${opts.workflow}`);
    }

    const event = parseRef(await resolveRef(opts, deps));
    const runId = makeRunId();
    const log = (deps.log ?? rootLogger).child({ stage: "ci" });

    if (opts.plan) {
      const triggered = triggeredWorkflows(workflows, event).map((w) => w.name);
      return {
        ok: true,
        plan: { event, triggered, not_triggered: workflows.map((w) => w.name).filter((n) => !triggered.includes(n)) }
      };
    }

    const runsDir = path.resolve(opts.runsDir ?? config.runs_dir);
    const exec = deps.exec ?? new ProcessExecutor();
    const runner = new CiRunner(
      {
        runId,
        event,
        workDir: path.join(runDir(runsDir, runId), "ci-work"),
        artifactName: config.build.package,
        docsRoot: ciConfig.docs_root,
        builder: deps.builder ?? new CargoBuilder(config.build, exec, log),
        buildDocs: deps.buildDocs ?? (() => buildDocs(config.build, exec)),
        artifacts: new LocalArtifactStore(path.resolve(ciConfig.artifacts_dir)),
        releases: new LocalReleasePublisher(path.resolve(ciConfig.releases_dir)),
        pages: new LocalPagesPublisher(path.resolve(ciConfig.pages_dir)),
        log
      },
      deps.groups ?? new ConcurrencyGroups(path.join(runsDir, "ci-groups"), log)
    );

    const report = await runner.run(workflows);
    const reportPath = path.join(runDir(runsDir, runId), "ci-report.json");
    await atomicWriteJson(reportPath, report);

    if (reportFailed(report)) {
      const failed = report.workflows.filter((w) => w.status === "failed").map((w) => w.workflow);
      const err = new CiFailure(`Workflows failed: ${failed.join(", ")}`);
      return { ok: false, error: { code: err.code, message: err.message }, exitCode: EXIT.CI_FAILED, report, reportPath };
    }
    return { ok: true, report, reportPath };
  } catch (e: unknown) {
    return failure(e);
  }
}
