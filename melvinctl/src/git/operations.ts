import { simpleGit } from "simple-git";

/** The slice of simple-git this module needs; tests pass a fake. */
export interface GitReader {
  raw(args: string[]): Promise<string>;
  revparse(args: string[]): Promise<string>;
}

/**
 * Git operations wrapper — abstracts simple-git for testability.
 */
export class GitOperations {
  private git: GitReader;

  constructor(repoPath: string, git?: GitReader) {
    this.git = git ?? simpleGit(repoPath);
  }

  /** Get HEAD SHA of a ref (defaults to current HEAD). */
  async getCurrentSha(ref = "HEAD"): Promise<string> {
    return (await this.git.revparse([ref])).trim();
  }

  /** Tags that point at HEAD, sorted. */
  async getHeadTags(): Promise<string[]> {
    const out = await this.git.raw(["tag", "--points-at", "HEAD"]);
    return out
      .split("\n")
      .map((t) => t.trim())
      .filter((t) => t.length > 0)
      .sort();
  }

  /**
   * The ref a push of HEAD would carry: a tag pointing at HEAD wins over the
   * branch, as a tag push is what triggers releases.
   */
  async getHeadRef(): Promise<string> {
    const [tag] = await this.getHeadTags();
    if (tag !== undefined) return `refs/tags/${tag}`;

    const branch = (await this.git.revparse(["--abbrev-ref", "HEAD"])).trim();
    if (branch === "HEAD" || branch.length === 0) {
      throw new Error("HEAD is detached and untagged; pass --ref");
    }
    return `refs/heads/${branch}`;
  }
}
