#!/usr/bin/env node

import { Command, Option } from "commander";
import { deploy } from "./commands/deploy.js";
import { retrieve } from "./commands/retrieve.js";
import { ci } from "./commands/ci.js";
import { status } from "./commands/status.js";
import { validateAll } from "./commands/validate.js";
import { unlock } from "./commands/unlock.js";
import type { CommandFailure } from "./commands/common.js";
import { EXIT } from "./commands/exit-codes.js";
import { configureLogging, type OutputFormat } from "./log/logger.js";

type GlobalOpts = {
  config?: string;
  profile?: string;
  format: OutputFormat;
  verbose?: boolean;
};

type HostOpts = GlobalOpts & {
  target?: string;
  identity?: string;
  passwordEnv?: string;
};

const program = new Command();

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function formatOption(): Option {
  return new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human");
}

function setup(opts: GlobalOpts): void {
  configureLogging({ format: opts.format, level: opts.verbose ? "debug" : "info" });
}

function connection(opts: HostOpts) {
  return {
    configDir: opts.config,
    profile: opts.profile,
    target: opts.target,
    identityFile: opts.identity,
    passwordEnv: opts.passwordEnv
  };
}

function writeResult(format: OutputFormat, payload: Record<string, unknown>, human: string): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "info", code: "OK", ...payload }) + "\n");
  } else {
    console.log(human);
  }
}

function fail(format: OutputFormat, res: CommandFailure, extra: Record<string, unknown> = {}): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code: res.error.code, message: res.error.message, ...extra }) + "\n");
    for (const issue of res.error.issues ?? []) {
      process.stdout.write(JSON.stringify({ level: "error", code: "ISSUE", ...issue }) + "\n");
    }
  } else {
    console.error(res.error.message);
    for (const issue of res.error.issues ?? []) console.error(`  - ${issue.message}`);
  }
  process.exit(res.exitCode);
}

function hostCommand(name: string, description: string): Command {
  return program
    .command(name)
    .description(description)
    .option("--config <path>", "Path to config directory")
    .option("--profile <name>", "Config profile layered over base.yaml (e.g. container, evaluation)")
    .option("--target <name>", "Target from the config (default: default_target)")
    .option("--identity <file>", "SSH identity file")
    .option("--password-env <var>", "Read the SSH password from this environment variable")
    .option("--verbose", "Debug logging")
    .addOption(formatOption());
}

program.name("melvinctl").description("Build, deploy and supervise the melvin-ob binary").version("0.1.0");

hostCommand("deploy", "Build the binary, copy it to the target and relaunch its session")
  .option("--env <NAME=VALUE>", "Toggle override (repeatable)", collect, [])
  .addOption(new Option("--build-profile <profile>", "Cargo profile").choices(["debug", "release"]))
  .option("--runs-dir <path>", "Where run records are kept")
  .action(async (opts: HostOpts & { env: string[]; buildProfile?: "debug" | "release"; runsDir?: string }) => {
    setup(opts);
    const res = await deploy({ ...connection(opts), env: opts.env, buildProfile: opts.buildProfile, runsDir: opts.runsDir });
    if (!res.ok) fail(opts.format, res, { runId: res.runId, statePath: res.statePath, status: res.status });
    writeResult(
      opts.format,
      { runId: res.runId, statePath: res.statePath, status: res.status, session: res.session, env: res.env },
      `Deployed: session ${res.session} ${res.status} (run ${res.runId})`
    );
  });

hostCommand("retrieve", "Pull evaluation outputs from the target")
  .option("--env <NAME=VALUE>", "PULL_FULL=1 also pulls the full snapshot", collect, [])
  .option("--out <dir>", "Local destination directory")
  .action(async (opts: HostOpts & { env: string[]; out?: string }) => {
    setup(opts);
    const res = await retrieve({ ...connection(opts), env: opts.env, outDir: opts.out });
    if (!res.ok) fail(opts.format, res);
    writeResult(
      opts.format,
      { pulled: res.pulled, skipped: res.skipped },
      [...res.pulled.map((p) => `pulled ${p}`), ...res.skipped.map((p) => `skipped ${p}`)].join("\n")
    );
  });

hostCommand("status", "Show recorded deployments and, with --remote, the live session")
  .argument("[runId]", "Run id (omit to list all)")
  .option("--remote", "Query the target host")
  .option("--runs-dir <path>", "Where run records are kept")
  .action(async (runId: string | undefined, opts: HostOpts & { remote?: boolean; runsDir?: string }) => {
    setup(opts);
    const res = await status({ ...connection(opts), runId, remote: opts.remote, runsDir: opts.runsDir });
    if (!res.ok) fail(opts.format, res);

    const lines: string[] = [];
    if (res.remote) {
      const r = res.remote;
      lines.push(`${r.target}: session ${r.session} ${r.state}; orbit state ${r.orbit_state ? "present" : "absent"}`);
      if (r.other_sessions.length > 0) lines.push(`other sessions: ${r.other_sessions.join(", ")}`);
      if (r.lease_holder) lines.push(`lease held by ${r.lease_holder}`);
    }
    if ("run" in res) {
      writeResult(opts.format, { run: res.run, remote: res.remote }, [...lines, JSON.stringify(res.run, null, 2)].join("\n"));
      return;
    }
    if (opts.format === "jsonl") {
      if (res.remote) process.stdout.write(JSON.stringify({ level: "info", code: "REMOTE", ...res.remote }) + "\n");
      for (const item of res.runs) process.stdout.write(JSON.stringify(item) + "\n");
      return;
    }
    if (res.runs.length === 0) lines.push("No deployments recorded.");
    for (const item of res.runs) lines.push(`${item.run_id}  ${item.target}  ${item.status}  ${item.updated_at}`);
    console.log(lines.join("\n"));
  });

hostCommand("unlock", "Remove a stale deployment lease on the target").action(async (opts: HostOpts) => {
  setup(opts);
  const res = await unlock(connection(opts));
  if (!res.ok) fail(opts.format, res);
  writeResult(
    opts.format,
    { leasePath: res.leasePath, previousHolder: res.previousHolder },
    `Removed ${res.leasePath}${res.previousHolder ? ` (held by ${res.previousHolder})` : ""}`
  );
});

program
  .command("ci")
  .description("Run the workflows a push would trigger")
  .option("--config <path>", "Path to config directory")
  .option("--profile <name>", "Config profile layered over base.yaml")
  .option("--ref <ref>", "Pushed ref, e.g. refs/tags/v1.0.0 (default: GITHUB_REF, then git HEAD)")
  .option("--workflow <name>", "Run only this workflow")
  .option("--plan", "Only list which workflows would run")
  .option("--runs-dir <path>", "Where run records are kept")
  .option("--verbose", "Debug logging")
  .addOption(formatOption())
  .action(async (opts: GlobalOpts & { ref?: string; workflow?: string; plan?: boolean; runsDir?: string }) => {
    setup(opts);
    const res = await ci({
      configDir: opts.config,
      profile: opts.profile,
      ref: opts.ref,
      workflow: opts.workflow,
      plan: opts.plan,
      runsDir: opts.runsDir
    });
    if (!res.ok) fail(opts.format, res, { report: res.report, reportPath: res.reportPath });
    if ("plan" in res) {
      writeResult(opts.format, { plan: res.plan }, `${res.plan.event.ref}: ${res.plan.triggered.join(", ") || "nothing"} would run`);
      return;
    }
    const summary = res.report.workflows.map((w) => `${w.workflow}: ${w.status}`).join("\n");
    writeResult(opts.format, { report: res.report, reportPath: res.reportPath }, summary);
  });

program
  .command("validate")
  .description("Validate every config profile and the workflow definitions")
  .option("--config <path>", "Path to config directory")
  .option("--releases", "Also verify published releases against their manifests")
  .addOption(formatOption())
  .action(async (opts: { config?: string; releases?: boolean; format: OutputFormat }) => {
    const res = await validateAll({ configDir: opts.config, releases: opts.releases });
    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exit(res.exitCode);
    }
    writeResult(opts.format, { profiles: res.profiles }, `OK (${res.profiles.join(", ")})`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.INVALID_ARGS);
});
