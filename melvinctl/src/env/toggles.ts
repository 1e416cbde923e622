/**
 * The environment contract of the launched binary. The binary reads these
 * names verbatim, so this table must not drift from what it expects.
 */
export type ToggleKind = "url" | "flag" | "id-list" | "presence";

export type ToggleSpec = {
  name: string;
  kind: ToggleKind;
  required: boolean;
  /** Forwarded into the launched process (false for retriever-only toggles). */
  forwarded: boolean;
  description: string;
};

export const TOGGLES = [
  { name: "DRS_BASE_URL", kind: "url", required: true, forwarded: true, description: "Base endpoint of the DRS backend." },
  { name: "RUST_BACKTRACE", kind: "flag", required: false, forwarded: true, description: "Full stack traces on fatal failure." },
  { name: "SKIP_RESET", kind: "flag", required: false, forwarded: true, description: "Skip the initial reset handshake." },
  { name: "EXPORT_ORBIT", kind: "flag", required: false, forwarded: true, description: "Periodically persist orbit state to orbit.bin." },
  { name: "TRY_IMPORT_ORBIT", kind: "flag", required: false, forwarded: true, description: "Load orbit.bin on startup if present." },
  { name: "LOG_MELVIN_EVENTS", kind: "flag", required: false, forwarded: true, description: "Verbose logging of announcements." },
  { name: "SKIP_OBJ", kind: "id-list", required: false, forwarded: true, description: "Objective ids to skip, comma separated." },
  { name: "TRACK_MELVIN_POS", kind: "flag", required: false, forwarded: true, description: "Position-tracking instrumentation." },
  { name: "PULL_FULL", kind: "presence", required: false, forwarded: false, description: "Retriever: also pull the full snapshot." }
] as const satisfies readonly ToggleSpec[];

export type ToggleName = (typeof TOGGLES)[number]["name"];

export const TOGGLE_NAMES: readonly string[] = TOGGLES.map((t) => t.name);

export function isToggleName(name: string): name is ToggleName {
  return TOGGLE_NAMES.includes(name);
}

/** Local file the binary writes with EXPORT_ORBIT and reads with TRY_IMPORT_ORBIT. */
export const ORBIT_STATE_FILE = "orbit.bin";
