import { INFO_FIELDS } from "../shared/constants";
import { CandidateProfile, EvaluationResult } from "../shared/types/domain.types";
import { SessionEndReason, SessionState } from "../shared/types/state.types";
import { buildInterviewSummary } from "../interviews/interview-summary";
import { assertTransition } from "./state-machine";

// Every helper returns a new SessionState; inputs are never mutated.

export function createSessionState(): SessionState {
  return {
    phase: "collecting_info",
    fieldIndex: 0,
    candidate: {},
    questions: [],
    questionIndex: 0,
    results: [],
    summary: null,
    endedBy: null,
  };
}

export function recordInfoField(state: SessionState, patch: Partial<CandidateProfile>): SessionState {
  const fieldIndex = state.fieldIndex + 1;
  const phase = fieldIndex >= INFO_FIELDS.length ? "confirming" : "collecting_info";
  assertTransition(state.phase, phase);
  return {
    ...state,
    phase,
    fieldIndex,
    candidate: { ...state.candidate, ...patch },
  };
}

export function startInterview(state: SessionState, questions: ReadonlyArray<string>): SessionState {
  assertTransition(state.phase, "interviewing");
  if (questions.length === 0) {
    throw new Error("Cannot start an interview without questions");
  }
  return {
    ...state,
    phase: "interviewing",
    questions: [...questions],
    questionIndex: 0,
  };
}

export function recordResult(state: SessionState, result: EvaluationResult): SessionState {
  assertTransition(state.phase, "interviewing");
  const results = [...state.results, result];
  const questionIndex = state.questionIndex + 1;
  if (questionIndex >= state.questions.length) {
    return completeSession({ ...state, results, questionIndex }, "finished");
  }
  return {
    ...state,
    results,
    questionIndex,
  };
}

export function completeSession(state: SessionState, endedBy: SessionEndReason): SessionState {
  assertTransition(state.phase, "completed");
  return {
    ...state,
    phase: "completed",
    summary: buildInterviewSummary(state.results),
    endedBy,
  };
}

export function currentQuestion(state: SessionState): string | null {
  if (state.phase !== "interviewing") {
    return null;
  }
  return state.questions[state.questionIndex] ?? null;
}
