import { SessionPhase } from "../shared/types/state.types";

const transitionRules: Record<SessionPhase, SessionPhase[]> = {
  collecting_info: ["collecting_info", "confirming", "completed"],
  confirming: ["confirming", "interviewing", "completed"],
  interviewing: ["interviewing", "completed"],
  completed: [],
};

export function isAllowedTransition(from: SessionPhase, to: SessionPhase): boolean {
  return transitionRules[from].includes(to);
}

export function acceptsInput(phase: SessionPhase): boolean {
  return transitionRules[phase].length > 0;
}
