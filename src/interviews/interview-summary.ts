import { EvaluationResult, InterviewSummary } from "../shared/types/domain.types";
import { performanceLabel } from "./fallback-scorer";

export function buildInterviewSummary(results: ReadonlyArray<EvaluationResult>): InterviewSummary | null {
  if (results.length === 0) {
    return null;
  }
  const total = results.reduce((sum, result) => sum + result.score, 0);
  const averageScore = total / results.length;
  return {
    totalQuestions: results.length,
    averageScore,
    performance: performanceLabel(averageScore),
  };
}
