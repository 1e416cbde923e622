import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { computeSha256, computeTreeSha256 } from "../util/checksum.js";
import { sanitizePathComponent } from "../util/sanitize.js";
import { atomicWriteJson } from "../core/run-record.js";

export type StoredFile = {
  name: string;
  path: string;
  sha256: string;
  size: number;
};

/** Hand-off of build outputs between jobs of one CI run. */
export interface ArtifactStore {
  upload(runId: string, name: string, files: readonly string[]): Promise<StoredFile[]>;
  download(runId: string, name: string, destDir: string): Promise<string[]>;
}

export type ReleaseManifest = {
  tag: string;
  published_at: string;
  assets: Array<Omit<StoredFile, "path">>;
};

export interface ReleasePublisher {
  publish(tag: string, files: readonly string[]): Promise<ReleaseManifest>;
}

export type PagesDeployment = {
  root: string;
  /** sha256 per published file, keyed by site-relative path. */
  files: Record<string, string>;
};

export type PublishOptions = {
  /** Asked right before the swap; returning false leaves the site untouched. */
  commit?: () => boolean;
};

export interface PagesPublisher {
  /**
   * Replace the published site with the contents of `bundleDir`.
   * Resolves to null when `commit` refused the swap.
   */
  publish(bundleDir: string, opts?: PublishOptions): Promise<PagesDeployment | null>;
}

function token(): string {
  return `${process.pid}-${crypto.randomBytes(4).toString("hex")}`;
}

function describe(file: string): StoredFile {
  return { name: path.basename(file), path: file, sha256: computeSha256(file), size: fs.statSync(file).size };
}

/**
 * Fill a staging directory beside `dest`, then swap it in with renames.
 * Returns false, leaving `dest` as it was, when `commit` says no.
 */
function swapDirectory(dest: string, fill: (staged: string) => void, commit: () => boolean = () => true): boolean {
  const staged = `${dest}.part-${token()}`;
  const old = `${dest}.old-${token()}`;
  fs.mkdirSync(path.dirname(dest), { recursive: true });
  try {
    fs.mkdirSync(staged, { recursive: true });
    fill(staged);
    if (!commit()) return false;
    if (fs.existsSync(dest)) fs.renameSync(dest, old);
    fs.renameSync(staged, dest);
    return true;
  } finally {
    fs.rmSync(staged, { recursive: true, force: true });
    fs.rmSync(old, { recursive: true, force: true });
  }
}

export class LocalArtifactStore implements ArtifactStore {
  constructor(private readonly root: string) {}

  async upload(runId: string, name: string, files: readonly string[]): Promise<StoredFile[]> {
    const dest = this.dirFor(runId, name);
    for (const file of files) {
      if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
        throw new Error(`Artifact file not found: ${file}`);
      }
    }
    swapDirectory(dest, (staged) => {
      for (const file of files) fs.copyFileSync(file, path.join(staged, path.basename(file)));
    });
    return files.map((f) => describe(path.join(dest, path.basename(f))));
  }

  async download(runId: string, name: string, destDir: string): Promise<string[]> {
    const src = this.dirFor(runId, name);
    if (!fs.existsSync(src)) {
      throw new Error(`No artifact named ${name} in run ${runId}`);
    }
    fs.mkdirSync(destDir, { recursive: true });
    const out: string[] = [];
    for (const entry of fs.readdirSync(src).sort()) {
      const target = path.join(destDir, entry);
      fs.copyFileSync(path.join(src, entry), target);
      out.push(target);
    }
    return out;
  }

  private dirFor(runId: string, name: string): string {
    return path.join(this.root, sanitizePathComponent(runId), sanitizePathComponent(name));
  }
}

/**
 * Releases as `<root>/<tag>/` holding the assets and a `manifest.json` with
 * their checksums. Publishing an existing tag replaces its assets.
 */
export class LocalReleasePublisher implements ReleasePublisher {
  constructor(private readonly root: string) {}

  async publish(tag: string, files: readonly string[]): Promise<ReleaseManifest> {
    if (files.length === 0) throw new Error(`Release ${tag} has no assets`);
    const dest = path.join(this.root, sanitizePathComponent(tag));

    const manifest: ReleaseManifest = {
      tag,
      published_at: new Date().toISOString(),
      assets: files.map((f) => {
        const { name, sha256, size } = describe(f);
        return { name, sha256, size };
      })
    };
    swapDirectory(dest, (staged) => {
      for (const file of files) fs.copyFileSync(file, path.join(staged, path.basename(file)));
    });
    await atomicWriteJson(path.join(dest, "manifest.json"), manifest);
    return manifest;
  }
}

/** Static site published to one directory, swapped in whole. */
export class LocalPagesPublisher implements PagesPublisher {
  constructor(private readonly root: string) {}

  async publish(bundleDir: string, opts: PublishOptions = {}): Promise<PagesDeployment | null> {
    if (!fs.existsSync(path.join(bundleDir, "index.html"))) {
      throw new Error(`Pages bundle ${bundleDir} has no index.html`);
    }
    const swapped = swapDirectory(
      this.root,
      (staged) => {
        fs.cpSync(bundleDir, staged, { recursive: true });
      },
      opts.commit
    );
    if (!swapped) return null;
    return { root: this.root, files: computeTreeSha256(this.root) };
  }
}
