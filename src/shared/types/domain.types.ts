export interface CandidateProfile {
  name: string;
  email: string;
  phone: string;
  experience: number;
  position: string;
  location: string;
  techStack: string[];
}

export type CandidateProfileField = keyof CandidateProfile;

export interface EvaluationResult {
  readonly question: string;
  readonly answer: string;
  readonly score: number;
  readonly feedback: string;
}

export type PerformanceLabel = "Excellent" | "Good" | "Needs Improvement" | "Poor";

export interface InterviewSummary {
  totalQuestions: number;
  averageScore: number;
  performance: PerformanceLabel;
}

/**
 * Stored and HTTP-facing candidate shape. Keys follow the JSON file layout,
 * which predates the camelCase domain types.
 */
export interface CandidateRecord {
  name: string;
  email: string;
  phone: string;
  experience: number;
  position: string;
  location: string;
  tech_stack: string[];
  questions: string[];
  results?: EvaluationResult[];
  summary?: InterviewSummary | null;
  completed_at?: string;
}
