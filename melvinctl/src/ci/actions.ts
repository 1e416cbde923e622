import type { ArtifactBuilder } from "../build/builder.js";
import { CiFailure } from "../core/errors.js";
import type { Logger } from "../log/logger.js";
import { RunSuperseded, type GroupTicket } from "./concurrency.js";
import { injectRedirect } from "./docs.js";
import type { ArtifactStore, PagesPublisher, ReleasePublisher } from "./publishers.js";
import type { PushEvent } from "./triggers.js";

/** Everything a step may touch. Shared by all jobs of one CI run. */
export type CiContext = {
  runId: string;
  event: PushEvent;
  /** Scratch directory for downloaded artifacts. */
  workDir: string;
  artifactName: string;
  docsRoot: string;
  builder: ArtifactBuilder;
  buildDocs: () => Promise<string>;
  artifacts: ArtifactStore;
  releases: ReleasePublisher;
  pages: PagesPublisher;
  log: Logger;
};

/** Per-job scratch state. Jobs share nothing except through the artifact store. */
export type JobState = {
  files: string[];
  docDir?: string;
  outputs: Record<string, unknown>;
};

/** `ticket` is the run's concurrency group membership, null outside a group. */
export type Action = (ctx: CiContext, job: JobState, ticket: GroupTicket | null) => Promise<void>;

function requireDocs(job: JobState): string {
  if (!job.docDir) throw new CiFailure("No rendered docs in this job; run build-docs first");
  return job.docDir;
}

export const ACTIONS = {
  "build-binary": async (ctx, job) => {
    const artifact = await ctx.builder.build({ profile: "release" });
    job.files = [artifact.outputPath];
    job.outputs.binary = { path: artifact.outputPath, sha256: artifact.sha256 };
  },
  "upload-artifact": async (ctx, job) => {
    if (job.files.length === 0) throw new CiFailure("Nothing to upload; run build-binary first");
    const stored = await ctx.artifacts.upload(ctx.runId, ctx.artifactName, job.files);
    job.outputs.uploaded = stored.map((f) => f.name);
  },
  "download-artifact": async (ctx, job) => {
    job.files = await ctx.artifacts.download(ctx.runId, ctx.artifactName, ctx.workDir);
  },
  "publish-release": async (ctx, job) => {
    if (ctx.event.kind !== "tag") throw new CiFailure(`Releases need a tag push, got ${ctx.event.ref}`);
    const manifest = await ctx.releases.publish(ctx.event.name, job.files);
    job.outputs.release = manifest;
  },
  "build-docs": async (ctx, job) => {
    job.docDir = await ctx.buildDocs();
  },
  "inject-redirect": async (ctx, job) => {
    injectRedirect(requireDocs(job), ctx.docsRoot);
  },
  "publish-pages": async (ctx, job, ticket) => {
    const deployed = await ctx.pages.publish(requireDocs(job), { commit: () => !ticket?.superseded() });
    if (!deployed) throw new RunSuperseded(ctx.runId, ticket?.group ?? "none");
    job.outputs.pages = { root: deployed.root, files: Object.keys(deployed.files).length };
  }
} satisfies Record<string, Action>;

export type ActionName = keyof typeof ACTIONS;

export function isActionName(name: string): name is ActionName {
  return Object.prototype.hasOwnProperty.call(ACTIONS, name);
}
