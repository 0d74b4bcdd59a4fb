import { CandidateProfileField } from "./types/domain.types";

export interface InfoFieldDefinition {
  key: CandidateProfileField;
  label: string;
}

export const INFO_FIELDS: ReadonlyArray<InfoFieldDefinition> = [
  { key: "name", label: "Full Name" },
  { key: "email", label: "Email Address" },
  { key: "phone", label: "Phone Number" },
  { key: "experience", label: "Years of Experience" },
  { key: "position", label: "Desired Position" },
  { key: "location", label: "Current Location" },
  { key: "techStack", label: "Tech Stack (comma-separated, e.g., Python, Django, PostgreSQL)" },
];

export const EXIT_COMMANDS: ReadonlyArray<string> = ["exit", "quit", "bye"];
export const CONFIRM_COMMANDS: ReadonlyArray<string> = ["start", "yes", "y", "confirm", "ok"];

export const MAX_INTERVIEW_QUESTIONS = 5;
export const MIN_SCORE = 0;
export const MAX_SCORE = 10;
export const DEFAULT_SCORE = 5;

export const QUESTION_ERROR_PREFIX = "Error generating questions";
export const DEFAULT_EVALUATION_FEEDBACK = "Good attempt! Keep practicing.";
