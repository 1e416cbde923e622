import { describe, expect, it, vi } from "vitest";
import { GitOperations } from "../src/git/operations.js";

function fakeGit(tags: string, branch: string) {
  return {
    raw: vi.fn(async (_args: string[]) => tags),
    revparse: vi.fn(async (args: string[]) => (args[0] === "--abbrev-ref" ? branch : "0123abcd\n"))
  };
}

describe("git operations", () => {
  it("reads the HEAD sha", async () => {
    const git = fakeGit("", "main\n");
    expect(await new GitOperations("/repo", git).getCurrentSha()).toBe("0123abcd");
    expect(git.revparse).toHaveBeenCalledWith(["HEAD"]);
  });

  it("lists tags at HEAD sorted", async () => {
    const git = fakeGit("v1.1.0\nv1.0.0\n\n", "main\n");
    expect(await new GitOperations("/repo", git).getHeadTags()).toEqual(["v1.0.0", "v1.1.0"]);
    expect(git.raw).toHaveBeenCalledWith(["tag", "--points-at", "HEAD"]);
  });

  it("prefers a tag over the branch for the pushed ref", async () => {
    expect(await new GitOperations("/repo", fakeGit("v2.0.0\n", "main\n")).getHeadRef()).toBe("refs/tags/v2.0.0");
  });

  it("uses the branch when HEAD is untagged", async () => {
    expect(await new GitOperations("/repo", fakeGit("", "feature/docs\n")).getHeadRef()).toBe("refs/heads/feature/docs");
  });

  it("refuses a detached, untagged HEAD", async () => {
    await expect(new GitOperations("/repo", fakeGit("", "HEAD\n")).getHeadRef()).rejects.toThrow(
      "HEAD is detached and untagged; pass --ref"
    );
  });
});
