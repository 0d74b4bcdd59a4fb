import fetch from "node-fetch";
import { errorMessage, Logger } from "../config/logger";
import { DEFAULT_GEMINI_API_BASE_URL, DEFAULT_GEMINI_MODEL } from "../config/env";

export interface GenerateContentRequestBody {
  contents: Array<{
    parts: Array<{
      text: string;
    }>;
  }>;
}

interface FetchResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
  json(): Promise<unknown>;
}

export type FetchLike = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body: string;
  },
) => Promise<FetchResponseLike>;

export interface LlmCallOptions {
  promptName?: string;
}

/** The seam the question and answer services depend on. */
export interface TextCompletionClient {
  isConfigured(): boolean;
  getModelName(): string;
  generateText(prompt: string, options?: LlmCallOptions): Promise<string>;
}

export interface LlmClientConfig {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
}

export const MISSING_CREDENTIAL_ERROR = "missing_credential: GEMINI_API_KEY is not set";

export class LlmClient implements TextCompletionClient {
  private readonly model: string;
  private readonly baseUrl: string;

  constructor(
    private readonly config: LlmClientConfig,
    private readonly logger: Logger,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.model = config.model || DEFAULT_GEMINI_MODEL;
    this.baseUrl = config.baseUrl || DEFAULT_GEMINI_API_BASE_URL;
  }

  isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  getModelName(): string {
    return this.model;
  }

  buildRequestBody(prompt: string): GenerateContentRequestBody {
    return {
      contents: [{ parts: [{ text: prompt }] }],
    };
  }

  buildRequestUrl(apiKey: string): string {
    return `${this.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent?key=${encodeURIComponent(apiKey)}`;
  }

  async generateText(prompt: string, options?: LlmCallOptions): Promise<string> {
    const promptName = options?.promptName ?? "text_completion";
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      throw new Error(MISSING_CREDENTIAL_ERROR);
    }

    const startedAt = Date.now();
    try {
      const response = await this.fetchImpl(this.buildRequestUrl(apiKey), {
        method: "POST",
        headers: {
          "content-type": "application/json",
        },
        body: JSON.stringify(this.buildRequestBody(prompt)),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`Gemini API error: HTTP ${response.status} - ${body}`);
      }

      const content = extractCandidateText(await response.json());
      if (!content) {
        throw new Error("Gemini response does not contain candidate text");
      }

      this.logger.info("llm.call.completed", {
        promptName,
        modelName: this.model,
        latencyMs: Date.now() - startedAt,
        tokenEstimate: estimateTokenCount(prompt, content),
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        promptName,
        modelName: this.model,
        latencyMs: Date.now() - startedAt,
        error: errorMessage(error),
      });
      throw error;
    }
  }
}

/** Reads `candidates[0].content.parts[0].text`; anything else yields null. */
export function extractCandidateText(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.candidates)) {
    return null;
  }
  const candidate: unknown = body.candidates[0];
  if (!isRecord(candidate) || !isRecord(candidate.content) || !Array.isArray(candidate.content.parts)) {
    return null;
  }
  const part: unknown = candidate.content.parts[0];
  if (!isRecord(part) || typeof part.text !== "string") {
    return null;
  }
  return part.text;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function estimateTokenCount(prompt: string, output: string): number {
  const totalChars = prompt.length + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}
