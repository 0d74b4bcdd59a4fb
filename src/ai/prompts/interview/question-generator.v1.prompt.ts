export const QUESTION_GENERATOR_V1_PROMPT_NAME = "interview_question_generator_v1";

export function buildQuestionGeneratorV1Prompt(techStack: ReadonlyArray<string>): string {
  return [
    `You are a technical interviewer. Given the following tech stack: ${techStack.join(", ")},`,
    "generate 3-5 specific technical interview questions.",
    "Questions should be clear, relevant, and test practical knowledge.",
    "Format each question as a numbered list starting with 1.",
    "Focus on actual technical questions, not domain categories.",
  ].join(" ");
}
