import { CandidateProfile, EvaluationResult, InterviewSummary } from "./domain.types";

export type SessionPhase = "collecting_info" | "confirming" | "interviewing" | "completed";

export type SessionEndReason = "finished" | "exit";

export interface SessionState {
  readonly phase: SessionPhase;
  readonly fieldIndex: number;
  readonly candidate: Readonly<Partial<CandidateProfile>>;
  readonly questions: ReadonlyArray<string>;
  readonly questionIndex: number;
  readonly results: ReadonlyArray<EvaluationResult>;
  readonly summary: InterviewSummary | null;
  readonly endedBy: SessionEndReason | null;
}

export interface ConversationTurn {
  state: SessionState;
  replies: string[];
}
