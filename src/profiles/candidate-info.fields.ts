import {
  CandidateProfile,
  CandidateProfileField,
  CandidateRecord,
  EvaluationResult,
  InterviewSummary,
} from "../shared/types/domain.types";
import { sanitize, validateEmail, validatePhone } from "../shared/utils/validation";
import { parseExperienceYears } from "./parsers/experience.parser";
import { parseTechStack } from "./parsers/tech-stack.parser";

/**
 * Validates one intake answer. Returns the profile patch for the field, or null
 * when the input has to be asked for again.
 */
export function parseInfoField(
  key: CandidateProfileField,
  text: string,
): Partial<CandidateProfile> | null {
  const value = sanitize(text);
  switch (key) {
    case "name":
      return value ? { name: value } : null;
    case "position":
      return value ? { position: value } : null;
    case "location":
      return value ? { location: value } : null;
    case "email":
      return validateEmail(value) ? { email: value } : null;
    case "phone":
      return validatePhone(value) ? { phone: value } : null;
    case "experience": {
      const years = parseExperienceYears(value);
      return years === null ? null : { experience: years };
    }
    case "techStack": {
      const techStack = parseTechStack(value);
      return techStack.length > 0 ? { techStack } : null;
    }
  }
}

export function isCompleteProfile(candidate: Partial<CandidateProfile>): candidate is CandidateProfile {
  return (
    typeof candidate.name === "string" &&
    typeof candidate.email === "string" &&
    typeof candidate.phone === "string" &&
    typeof candidate.experience === "number" &&
    typeof candidate.position === "string" &&
    typeof candidate.location === "string" &&
    Array.isArray(candidate.techStack) &&
    candidate.techStack.length > 0
  );
}

export function formatFieldValue(candidate: Partial<CandidateProfile>, key: CandidateProfileField): string {
  const value = candidate[key];
  if (Array.isArray(value)) {
    return value.join(", ");
  }
  return value === undefined ? "" : String(value);
}

export function toCandidateRecord(input: {
  profile: CandidateProfile;
  questions: ReadonlyArray<string>;
  results?: ReadonlyArray<EvaluationResult>;
  summary?: InterviewSummary | null;
  completedAt?: string;
}): CandidateRecord {
  const record: CandidateRecord = {
    name: input.profile.name,
    email: input.profile.email,
    phone: input.profile.phone,
    experience: input.profile.experience,
    position: input.profile.position,
    location: input.profile.location,
    tech_stack: [...input.profile.techStack],
    questions: [...input.questions],
  };
  if (input.results) {
    record.results = [...input.results];
  }
  if (input.summary !== undefined) {
    record.summary = input.summary;
  }
  if (input.completedAt) {
    record.completed_at = input.completedAt;
  }
  return record;
}
