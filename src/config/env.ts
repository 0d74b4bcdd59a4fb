import dotenv from "dotenv";
import path from "node:path";
import { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  geminiApiKey?: string;
  geminiModel: string;
  geminiApiBaseUrl: string;
  llmTimeoutMs: number;
  candidatesFilePath: string;
  saveCandidates: boolean;
}

export const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";
export const DEFAULT_GEMINI_API_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";
export const DEFAULT_LLM_TIMEOUT_MS = 30_000;

// Value shipped in .env.example; treated the same as an unset key.
const API_KEY_PLACEHOLDER = "your_gemini_api_key_here";

function getOptionalTrimmed(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const timeoutRaw = source.LLM_TIMEOUT_MS ?? String(DEFAULT_LLM_TIMEOUT_MS);
  const llmTimeoutMs = Number(timeoutRaw);
  const logLevel = parseLogLevel((source.LOG_LEVEL ?? "info").trim().toLowerCase());
  const saveCandidates = parseBoolean(source.SAVE_CANDIDATES ?? "true");

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(llmTimeoutMs) || llmTimeoutMs < 1000) {
    throw new Error(`Invalid LLM_TIMEOUT_MS value: ${timeoutRaw}`);
  }

  const apiKey = getOptionalTrimmed(source, "GEMINI_API_KEY");

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel,
    geminiApiKey: apiKey === API_KEY_PLACEHOLDER ? undefined : apiKey,
    geminiModel: getOptionalTrimmed(source, "GEMINI_MODEL") ?? DEFAULT_GEMINI_MODEL,
    geminiApiBaseUrl: (getOptionalTrimmed(source, "GEMINI_API_BASE_URL") ?? DEFAULT_GEMINI_API_BASE_URL).replace(
      /\/+$/,
      "",
    ),
    llmTimeoutMs,
    candidatesFilePath: path.resolve(
      process.cwd(),
      getOptionalTrimmed(source, "CANDIDATES_FILE") ?? path.join("data", "candidates.json"),
    ),
    saveCandidates,
  };
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
