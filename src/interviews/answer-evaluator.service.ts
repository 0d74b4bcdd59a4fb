import { TextCompletionClient } from "../ai/llm.client";
import { attemptWithFallback } from "../ai/llm.safe";
import {
  ANSWER_EVALUATOR_V1_PROMPT_NAME,
  buildAnswerEvaluatorV1Prompt,
} from "../ai/prompts/interview/answer-evaluator.v1.prompt";
import { errorMessage, Logger } from "../config/logger";
import { DEFAULT_EVALUATION_FEEDBACK, DEFAULT_SCORE } from "../shared/constants";
import { AnswerEvaluation } from "../shared/types/answer-evaluator.types";
import { clampScore, scoreFallback } from "./fallback-scorer";

export interface AnswerScorer {
  evaluateAnswer(question: string, answer: string): Promise<AnswerEvaluation>;
}

const SCORE_PATTERN = /(\d+)\/10/;

export class AnswerEvaluatorService implements AnswerScorer {
  constructor(
    private readonly llmClient: TextCompletionClient,
    private readonly logger: Logger,
    private readonly timeoutMs?: number,
  ) {}

  async evaluateAnswer(question: string, answer: string): Promise<AnswerEvaluation> {
    const prompt = buildAnswerEvaluatorV1Prompt({ question, answer });
    const result = await attemptWithFallback<AnswerEvaluation>({
      operation: ANSWER_EVALUATOR_V1_PROMPT_NAME,
      primary: async () => {
        const content = await this.llmClient.generateText(prompt, {
          promptName: ANSWER_EVALUATOR_V1_PROMPT_NAME,
        });
        return parseEvaluationResponse(content);
      },
      fallback: () => scoreFallback(question, answer),
      onFailure: (error) => ({
        score: DEFAULT_SCORE,
        feedback: `Error evaluating answer: ${errorMessage(error)}. Please try again.`,
      }),
      timeoutMs: this.timeoutMs,
      logger: this.logger,
    });

    this.logger.info("interview.answer.evaluated", {
      score: result.value.score,
      source: result.source,
      answerLength: answer.length,
    });
    return result.value;
  }
}

export function parseEvaluationResponse(content: string): AnswerEvaluation {
  const match = SCORE_PATTERN.exec(content);
  const score = match ? Number(match[1]) : DEFAULT_SCORE;
  const rest = match ? content.slice(match.index + match[0].length) : content;
  const feedback = rest.replace(/Feedback:/g, "").trim();
  return {
    score: clampScore(score),
    feedback: feedback || DEFAULT_EVALUATION_FEEDBACK,
  };
}
