import express, { Express, NextFunction, Request, Response } from "express";
import { EnvConfig } from "./config/env";
import { createLogger, errorMessage, Logger } from "./config/logger";
import { LlmClient, TextCompletionClient } from "./ai/llm.client";
import { buildInterviewApiController } from "./api/interview-api.controller";
import { AnswerEvaluatorService } from "./interviews/answer-evaluator.service";
import { InterviewEngine } from "./interviews/interview.engine";
import { QuestionGeneratorService } from "./interviews/question-generator.service";
import { CandidateStorageService } from "./storage/candidate-storage.service";

export interface AppServices {
  llmClient: TextCompletionClient;
  questionGenerator: QuestionGeneratorService;
  answerEvaluator: AnswerEvaluatorService;
  candidateStore: CandidateStorageService;
  interviewEngine: InterviewEngine;
}

export interface AppContext {
  app: Express;
  logger: Logger;
  services: AppServices;
}

export interface CreateAppOptions {
  logger?: Logger;
  llmClient?: TextCompletionClient;
}

export function createServices(env: EnvConfig, logger: Logger, llmClient?: TextCompletionClient): AppServices {
  const client =
    llmClient ??
    new LlmClient(
      {
        apiKey: env.geminiApiKey,
        model: env.geminiModel,
        baseUrl: env.geminiApiBaseUrl,
      },
      logger,
    );
  const questionGenerator = new QuestionGeneratorService(client, logger, env.llmTimeoutMs);
  const answerEvaluator = new AnswerEvaluatorService(client, logger, env.llmTimeoutMs);
  const candidateStore = new CandidateStorageService(env.candidatesFilePath, logger);
  const interviewEngine = new InterviewEngine({
    questionGenerator,
    answerEvaluator,
    logger,
    candidateStore: env.saveCandidates ? candidateStore : undefined,
  });
  return {
    llmClient: client,
    questionGenerator,
    answerEvaluator,
    candidateStore,
    interviewEngine,
  };
}

export function createApp(env: EnvConfig, options?: CreateAppOptions): AppContext {
  const logger = options?.logger ?? createLogger({ minLevel: env.logLevel });
  const services = createServices(env, logger, options?.llmClient);
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({
      ok: true,
      llmConfigured: services.llmClient.isConfigured(),
      model: services.llmClient.getModelName(),
    });
  });

  app.use(
    buildInterviewApiController({
      questionGenerator: services.questionGenerator,
      candidateStore: services.candidateStore,
      logger,
    }),
  );

  app.use((_request: Request, response: Response) => {
    response.status(404).json({ error: "Not found" });
  });

  app.use((error: unknown, request: Request, response: Response, _next: NextFunction) => {
    const status = readHttpStatus(error);
    if (status >= 500) {
      logger.error("http.request.failed", {
        route: request.path,
        error: errorMessage(error),
      });
    }
    response.status(status).json({ error: status >= 500 ? "Internal server error" : errorMessage(error) });
  });

  return { app, logger, services };
}

// body-parser attaches `status` to malformed JSON and oversized payload errors.
function readHttpStatus(error: unknown): number {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status >= 400 && error.status < 600 ? error.status : 500;
  }
  return 500;
}
