import fs from "node:fs";
import path from "node:path";
import { computeSha256 } from "../util/checksum.js";
import { BuildFailure, errorMessage } from "../core/errors.js";
import type { CommandExecutor, ExecResult } from "../exec/executor.js";
import type { BuildConfig, BuildProfile } from "../types/config.js";
import { logger as rootLogger, type Logger } from "../log/logger.js";

/** A built binary. Immutable; a rebuild produces a new Artifact. */
export type Artifact = Readonly<{
  name: string;
  profile: BuildProfile;
  targetTriple: string;
  outputPath: string;
  sha256: string;
  builtAt: string;
}>;

export interface ArtifactBuilder {
  build(opts?: { profile?: BuildProfile }): Promise<Artifact>;
}

const DEFAULT_BUILD_TIMEOUT_MS = 30 * 60 * 1000;

export function cargoBuildArgs(config: BuildConfig, profile: BuildProfile): string[] {
  const args = ["build"];
  if (profile === "release") args.push("--release");
  args.push("--target", config.target);
  if (config.linker) {
    args.push("--config", `target.${config.target}.linker="${config.linker}"`);
  }
  return args;
}

/** `<crate>/target/<triple>/<release|debug>/<package>` */
export function artifactPath(config: BuildConfig, profile: BuildProfile): string {
  return path.resolve(config.crate_dir, "target", config.target, profile, config.package);
}

/**
 * Cargo builder for the fixed target triple. Stateless: every call runs cargo
 * and hashes whatever it produced.
 */
export class CargoBuilder implements ArtifactBuilder {
  private readonly log: Logger;

  constructor(
    private readonly config: BuildConfig,
    private readonly exec: CommandExecutor,
    log?: Logger
  ) {
    this.log = (log ?? rootLogger).child({ stage: "build" });
  }

  async build(opts: { profile?: BuildProfile } = {}): Promise<Artifact> {
    const profile = opts.profile ?? this.config.profile;
    const args = cargoBuildArgs(this.config, profile);
    const env: Record<string, string> = {};
    if (this.config.rustflags) env.RUSTFLAGS = this.config.rustflags;

    this.log.info("BUILD_START", `cargo ${args.join(" ")}`, { target: this.config.target, profile });

    let result: ExecResult;
    try {
      result = await this.exec.run("cargo", args, {
        cwd: path.resolve(this.config.crate_dir),
        env,
        timeoutMs: this.config.timeout_ms ?? DEFAULT_BUILD_TIMEOUT_MS
      });
    } catch (e: unknown) {
      throw new BuildFailure(`cargo could not be run: ${errorMessage(e)}`, { args }, { cause: e });
    }

    if (result.code !== 0) {
      throw new BuildFailure(`cargo build exited with ${result.code}`, {
        args,
        stderr: tail(result.stderr)
      });
    }

    const outputPath = artifactPath(this.config, profile);
    if (!fs.existsSync(outputPath) || !fs.statSync(outputPath).isFile()) {
      throw new BuildFailure(`cargo build succeeded but ${outputPath} is missing`, { args });
    }

    const artifact: Artifact = Object.freeze({
      name: this.config.package,
      profile,
      targetTriple: this.config.target,
      outputPath,
      sha256: computeSha256(outputPath),
      builtAt: new Date().toISOString()
    });
    this.log.info("BUILD_OK", `built ${outputPath}`, { sha256: artifact.sha256 });
    return artifact;
  }
}

/** `cargo doc --no-deps --workspace`; returns the rendered doc root. */
export async function buildDocs(config: BuildConfig, exec: CommandExecutor): Promise<string> {
  const cwd = path.resolve(config.crate_dir);
  let result: ExecResult;
  try {
    result = await exec.run("cargo", ["doc", "--no-deps", "--workspace"], {
      cwd,
      timeoutMs: config.timeout_ms ?? DEFAULT_BUILD_TIMEOUT_MS
    });
  } catch (e: unknown) {
    throw new BuildFailure(`cargo doc could not be run: ${errorMessage(e)}`, {}, { cause: e });
  }
  if (result.code !== 0) {
    throw new BuildFailure(`cargo doc exited with ${result.code}`, { stderr: tail(result.stderr) });
  }
  const docDir = path.join(cwd, "target", "doc");
  if (!fs.existsSync(docDir)) {
    throw new BuildFailure(`cargo doc succeeded but ${docDir} is missing`);
  }
  return docDir;
}

function tail(s: string, lines = 20): string {
  return s.trimEnd().split("\n").slice(-lines).join("\n");
}
