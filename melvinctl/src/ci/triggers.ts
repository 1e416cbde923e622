import { minimatch } from "minimatch";
import type { JobCondition, PushFilter } from "./workflow.js";

export type RefKind = "branch" | "tag";

export type PushEvent = {
  /** Fully qualified ref, e.g. `refs/tags/v1.2.0`. */
  ref: string;
  kind: RefKind;
  /** Short name: branch or tag name. */
  name: string;
};

const HEADS = "refs/heads/";
const TAGS = "refs/tags/";

/** Bare names are taken as branches. */
export function parseRef(ref: string): PushEvent {
  if (ref.startsWith(TAGS)) return { ref, kind: "tag", name: ref.slice(TAGS.length) };
  if (ref.startsWith(HEADS)) return { ref, kind: "branch", name: ref.slice(HEADS.length) };
  return { ref: `${HEADS}${ref}`, kind: "branch", name: ref };
}

/**
 * Patterns are applied in order; a `!pattern` that matches excludes a name an
 * earlier pattern included.
 */
export function matchesPatterns(name: string, patterns: readonly string[]): boolean {
  let matched = false;
  for (const pattern of patterns) {
    if (pattern.startsWith("!")) {
      if (matched && minimatch(name, pattern.slice(1))) matched = false;
    } else if (!matched && minimatch(name, pattern)) {
      matched = true;
    }
  }
  return matched;
}

/**
 * Push trigger semantics: no filter at all matches every push; once either
 * filter is given, a ref of the other kind only matches if that kind has a
 * filter too.
 */
export function matchesPush(filter: PushFilter, event: PushEvent): boolean {
  const { branches, tags } = filter;
  if (branches === undefined && tags === undefined) return true;

  const patterns = event.kind === "branch" ? branches : tags;
  return patterns !== undefined && matchesPatterns(event.name, patterns);
}

export function conditionHolds(condition: JobCondition | undefined, event: PushEvent): boolean {
  switch (condition ?? "always") {
    case "always":
      return true;
    case "tag":
      return event.kind === "tag";
    case "branch":
      return event.kind === "branch";
  }
}
