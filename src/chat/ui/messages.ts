import { INFO_FIELDS } from "../../shared/constants";
import { CandidateProfile, EvaluationResult, InterviewSummary } from "../../shared/types/domain.types";
import { formatFieldValue } from "../../profiles/candidate-info.fields";

export function welcomeMessage(): string {
  return "Welcome! I will conduct an interactive technical interview. Type 'exit' anytime to leave.";
}

export function infoPrompt(fieldLabel: string): string {
  return `Please provide your ${fieldLabel}.`;
}

export function infoFallbackPrompt(fieldLabel: string): string {
  return [
    `Sorry, I didn't understand your response for ${fieldLabel}.`,
    "Could you please rephrase or provide a valid input?",
  ].join(" ");
}

export function profileSummaryMessage(candidate: Partial<CandidateProfile>): string {
  return [
    "Here are the details you provided:",
    ...INFO_FIELDS.map((field) => `${field.label}: ${formatFieldValue(candidate, field.key)}`),
  ].join("\n");
}

export function confirmPrompt(): string {
  return "Type 'start' to begin the technical interview.";
}

export function interviewIntroMessage(): string {
  return "Great! Let's start your technical interview. I'll ask you questions one by one and evaluate your answers.";
}

export function questionGenerationFailedMessage(): string {
  return "Sorry, there was an error generating questions. Please try again later.";
}

export function questionMessage(index: number, question: string): string {
  return `Question ${index + 1}: ${question}`;
}

export function emptyAnswerMessage(): string {
  return "Please provide an answer before submitting.";
}

export function evaluationMessage(result: EvaluationResult): string {
  return [`Score: ${result.score}/10`, `Feedback: ${result.feedback}`].join("\n");
}

export function sessionEndedMessage(): string {
  return "Session ended. Goodbye!";
}

export function finalSummaryMessage(
  summary: InterviewSummary,
  results: ReadonlyArray<EvaluationResult>,
): string {
  const lines = [
    "Interview Complete!",
    "",
    "Final Evaluation:",
    `- Total Questions: ${summary.totalQuestions}`,
    `- Average Score: ${summary.averageScore.toFixed(1)}/10`,
    `- Overall Performance: ${summary.performance}`,
    "",
    "Detailed Results:",
  ];
  results.forEach((result, index) => {
    lines.push(
      `Question ${index + 1}: ${truncate(result.question, 50)}`,
      `Score: ${result.score}/10`,
      `Feedback: ${result.feedback}`,
    );
  });
  return lines.join("\n");
}

export function completedMessage(): string {
  return "Thank you for your time! Your interview results have been recorded. Our team will contact you soon.";
}

function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars)}...`;
}
