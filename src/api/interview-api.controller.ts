import { Request, Response, Router } from "express";
import { errorMessage, Logger } from "../config/logger";
import { QuestionSource } from "../interviews/question-generator.service";
import { CandidateStore } from "../storage/candidate-storage.service";
import { CandidateRecord } from "../shared/types/domain.types";

interface InterviewApiControllerDeps {
  questionGenerator: QuestionSource;
  candidateStore: CandidateStore;
  logger: Logger;
}

export function buildInterviewApiController(deps: InterviewApiControllerDeps): Router {
  const router = Router();

  router.post("/generate_questions", async (request: Request, response: Response) => {
    const techStack = readTechStack(request.body);
    if (!techStack) {
      response.status(400).json({ error: "Tech stack required." });
      return;
    }

    try {
      const questions = await deps.questionGenerator.generateQuestions(techStack);
      response.status(200).json({ questions });
    } catch (error) {
      deps.logger.error("api.generate_questions.failed", { error: errorMessage(error) });
      response.status(500).json({ error: "Failed to generate questions." });
    }
  });

  router.post("/save_candidate", async (request: Request, response: Response) => {
    const parsed = parseCandidateRecord(request.body);
    if (!parsed.ok) {
      response.status(422).json({ error: "Invalid candidate record.", fields: parsed.invalidFields });
      return;
    }

    try {
      await deps.candidateStore.appendCandidate(parsed.record);
      response.status(200).json({ status: "success" });
    } catch (error) {
      deps.logger.error("api.save_candidate.failed", { error: errorMessage(error) });
      response.status(500).json({ error: "Failed to save candidate." });
    }
  });

  return router;
}

function readTechStack(body: unknown): string[] | null {
  const techStack = isRecord(body) ? body.tech_stack : undefined;
  if (!isStringArray(techStack) || techStack.length === 0) {
    return null;
  }
  return techStack;
}

export function parseCandidateRecord(
  body: unknown,
): { ok: true; record: CandidateRecord } | { ok: false; invalidFields: string[] } {
  if (!isRecord(body)) {
    return { ok: false, invalidFields: ["body"] };
  }

  const invalidFields: string[] = [];
  const text = (key: string): string => {
    const value = body[key];
    if (typeof value !== "string") {
      invalidFields.push(key);
      return "";
    }
    return value;
  };
  const strings = (key: string, fallback?: string[]): string[] => {
    const value = body[key];
    if (value === undefined && fallback) {
      return fallback;
    }
    if (!isStringArray(value)) {
      invalidFields.push(key);
      return [];
    }
    return value;
  };

  const name = text("name");
  const email = text("email");
  const phone = text("phone");
  const experience = body.experience;
  if (typeof experience !== "number" || !Number.isInteger(experience)) {
    invalidFields.push("experience");
  }
  const position = text("position");
  const location = text("location");
  const techStack = strings("tech_stack");
  const questions = strings("questions", []);

  if (invalidFields.length > 0 || typeof experience !== "number") {
    return { ok: false, invalidFields };
  }

  return {
    ok: true,
    record: {
      name,
      email,
      phone,
      experience,
      position,
      location,
      tech_stack: techStack,
      questions,
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}
