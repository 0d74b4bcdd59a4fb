import "dotenv/config";
import { LlmClient } from "../src/ai/llm.client";
import { createLogger } from "../src/config/logger";
import { AnswerEvaluatorService } from "../src/interviews/answer-evaluator.service";
import { QuestionGeneratorService, isQuestionGenerationError } from "../src/interviews/question-generator.service";

async function run(): Promise<void> {
  const apiKey = process.env.GEMINI_API_KEY?.trim();
  if (!apiKey) {
    throw new Error("GEMINI_API_KEY is required for sanity:answer-evaluator");
  }

  const logger = createLogger();
  const llmClient = new LlmClient({ apiKey, model: process.env.GEMINI_MODEL }, logger);
  const generator = new QuestionGeneratorService(llmClient, logger);
  const evaluator = new AnswerEvaluatorService(llmClient, logger);

  const questions = await generator.generateQuestions(["Python", "PostgreSQL"]);
  console.log("Generated questions:", questions);
  if (isQuestionGenerationError(questions)) {
    throw new Error(`Question generation failed: ${questions[0]}`);
  }

  const question = "How do you handle exceptions in Python? Provide an example.";
  const vagueAnswer = "You just handle them somehow.";
  const detailedAnswer =
    "I wrap the risky call in try/except, catch the narrowest exception class, log it and re-raise a domain error. For example: def load(path): try: return json.load(open(path)) except FileNotFoundError: return {}.";

  const vague = await evaluator.evaluateAnswer(question, vagueAnswer);
  const detailed = await evaluator.evaluateAnswer(question, detailedAnswer);

  console.log("Vague answer evaluation:", vague);
  console.log("Detailed answer evaluation:", detailed);

  if (detailed.score <= vague.score) {
    throw new Error("Expected the detailed answer to score higher than the vague one");
  }

  console.log("answer-evaluator sanity passed");
}

run().catch((error) => {
  console.error("answer-evaluator sanity failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
