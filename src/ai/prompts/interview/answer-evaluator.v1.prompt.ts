export const ANSWER_EVALUATOR_V1_PROMPT_NAME = "interview_answer_evaluator_v1";

export function buildAnswerEvaluatorV1Prompt(input: { question: string; answer: string }): string {
  return [
    "You are a technical interviewer evaluating a candidate's answer.",
    `Question: ${input.question}`,
    `Candidate's Answer: ${input.answer}`,
    "",
    "Please evaluate this answer on a scale of 0-10 and provide constructive feedback.",
    "Consider:",
    "- Technical accuracy and depth",
    "- Practical examples provided",
    "- Code quality (if applicable)",
    "- Clarity of explanation",
    "",
    "Respond in this format:",
    "Score: X/10",
    "Feedback: [Your detailed feedback here]",
  ].join("\n");
}
