/**
 * Deployment steps in order. Each success advances the run to the state
 * named after the step's outcome.
 */
export const DEPLOYMENT_STEPS = ["build", "transfer", "replace_session", "launch"] as const;

export type DeploymentStep = (typeof DEPLOYMENT_STEPS)[number];

export type DeploymentStatus =
  | "idle"
  | "built"
  | "transferred"
  | "session_replaced"
  | "launched"
  | `failed_${DeploymentStep}`;

export type TransitionEvent = "success" | "failure";

const REACHED: Record<DeploymentStep, DeploymentStatus> = {
  build: "built",
  transfer: "transferred",
  replace_session: "session_replaced",
  launch: "launched"
};

const PRECONDITION: Record<DeploymentStep, DeploymentStatus> = {
  build: "idle",
  transfer: "built",
  replace_session: "transferred",
  launch: "session_replaced"
};

/** The step that runs next from `status`, or null when the run is over. */
export function pendingStep(status: DeploymentStatus): DeploymentStep | null {
  return DEPLOYMENT_STEPS.find((s) => PRECONDITION[s] === status) ?? null;
}

export function isTerminal(status: DeploymentStatus): boolean {
  return status === "launched" || status.startsWith("failed_");
}

/**
 * Pure function: given current state + step event, return next state.
 * A step reported from a state it cannot run in is a programming error.
 */
export function nextState(current: DeploymentStatus, step: DeploymentStep, event: TransitionEvent): DeploymentStatus {
  if (PRECONDITION[step] !== current) {
    throw new Error(`Step ${step} cannot run from state ${current}`);
  }
  return event === "success" ? REACHED[step] : `failed_${step}`;
}
