import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

/** Compute SHA256 hash of a file. */
export function computeSha256(filePath: string): string {
  const content = fs.readFileSync(filePath);
  return createHash("sha256").update(content).digest("hex");
}

/** SHA256 of every file below `dir`, keyed by forward-slash relative path. */
export function computeTreeSha256(dir: string): Record<string, string> {
  const out: Record<string, string> = {};
  const walk = (rel: string): void => {
    const abs = rel ? path.join(dir, rel) : dir;
    for (const entry of fs.readdirSync(abs, { withFileTypes: true })) {
      const child = rel ? `${rel}/${entry.name}` : entry.name;
      if (entry.isDirectory()) walk(child);
      else if (entry.isFile()) out[child] = computeSha256(path.join(dir, child));
    }
  };
  walk("");
  return out;
}
