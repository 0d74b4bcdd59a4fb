import { TextCompletionClient } from "../ai/llm.client";
import { attemptWithFallback } from "../ai/llm.safe";
import {
  buildQuestionGeneratorV1Prompt,
  QUESTION_GENERATOR_V1_PROMPT_NAME,
} from "../ai/prompts/interview/question-generator.v1.prompt";
import { errorMessage, Logger } from "../config/logger";
import { MAX_INTERVIEW_QUESTIONS, QUESTION_ERROR_PREFIX } from "../shared/constants";
import { getFallbackQuestions } from "./fallback-questions";

export interface QuestionSource {
  generateQuestions(techStack: ReadonlyArray<string>): Promise<string[]>;
}

const LIST_MARKER_PREFIX = /^[\d.)\-\s]+/;

export class QuestionGeneratorService implements QuestionSource {
  constructor(
    private readonly llmClient: TextCompletionClient,
    private readonly logger: Logger,
    private readonly timeoutMs?: number,
  ) {}

  /**
   * Always resolves to 1-5 entries. A single entry starting with
   * "Error generating questions" reports a non-transient upstream failure;
   * use `isQuestionGenerationError` to detect it.
   */
  async generateQuestions(techStack: ReadonlyArray<string>): Promise<string[]> {
    const prompt = buildQuestionGeneratorV1Prompt(techStack);
    const result = await attemptWithFallback<string[]>({
      operation: QUESTION_GENERATOR_V1_PROMPT_NAME,
      primary: async () => {
        const content = await this.llmClient.generateText(prompt, {
          promptName: QUESTION_GENERATOR_V1_PROMPT_NAME,
        });
        return parseQuestionList(content);
      },
      fallback: () => getFallbackQuestions(techStack),
      onFailure: (error) => [`${QUESTION_ERROR_PREFIX}: ${errorMessage(error)}`],
      timeoutMs: this.timeoutMs,
      logger: this.logger,
    });

    this.logger.info("interview.questions.generated", {
      techStack: techStack.join(", "),
      questions: result.value.length,
      source: result.source,
    });
    return result.value;
  }
}

export function parseQuestionList(content: string): string[] {
  const questions: string[] = [];
  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    if (!line || !(/^\d/.test(line) || line.startsWith("-"))) {
      continue;
    }
    const question = line.replace(LIST_MARKER_PREFIX, "").trim();
    if (question) {
      questions.push(question);
    }
  }
  if (questions.length === 0) {
    return [content.trim()];
  }
  return questions.slice(0, MAX_INTERVIEW_QUESTIONS);
}

export function isQuestionGenerationError(questions: ReadonlyArray<string>): boolean {
  return questions.length === 0 || (questions.length === 1 && questions[0].startsWith(QUESTION_ERROR_PREFIX));
}
