import { errorMessage, Logger } from "../config/logger";
import { DEFAULT_LLM_TIMEOUT_MS } from "../config/env";

export type AttemptSource = "remote" | "fallback" | "error";

export interface AttemptResult<T> {
  value: T;
  source: AttemptSource;
  error_code?: "missing_credential" | "timeout" | "transient_failure" | "llm_failure";
}

export interface AttemptWithFallbackArgs<T> {
  operation: string;
  primary: () => Promise<T>;
  fallback: () => T | Promise<T>;
  onFailure: (error: unknown) => T;
  isTransient?: (error: unknown) => boolean;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * One remote attempt, no retry. Transient upstream trouble routes to the
 * deterministic fallback; anything else becomes the caller's error-shaped value.
 */
export async function attemptWithFallback<T>(args: AttemptWithFallbackArgs<T>): Promise<AttemptResult<T>> {
  const isTransient = args.isTransient ?? isTransientError;
  try {
    const value = await withTimeout(args.primary(), normalizeTimeout(args.timeoutMs));
    return { value, source: "remote" };
  } catch (error) {
    if (isTransient(error)) {
      const errorCode = classifyTransient(error);
      args.logger?.warn("llm.safe.fallback", {
        operation: args.operation,
        errorCode,
        error: errorMessage(error),
      });
      return { value: await args.fallback(), source: "fallback", error_code: errorCode };
    }
    args.logger?.error("llm.safe.failed", {
      operation: args.operation,
      error: errorMessage(error),
    });
    return { value: args.onFailure(error), source: "error", error_code: "llm_failure" };
  }
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`timeout after ${timeoutMs}ms`));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

export function isMissingCredentialError(error: unknown): boolean {
  return errorMessage(error).toLowerCase().startsWith("missing_credential");
}

export function isTimeoutError(error: unknown): boolean {
  return errorMessage(error).toLowerCase().includes("timeout");
}

export function isTransientError(error: unknown): boolean {
  const message = errorMessage(error).toLowerCase();
  return (
    isMissingCredentialError(error) ||
    isTimeoutError(error) ||
    message.includes("429") ||
    message.includes("503") ||
    message.includes("overloaded") ||
    message.includes("quota") ||
    message.includes("rate limit") ||
    message.includes("resource_exhausted") ||
    message.includes("unavailable")
  );
}

function classifyTransient(error: unknown): "missing_credential" | "timeout" | "transient_failure" {
  if (isMissingCredentialError(error)) {
    return "missing_credential";
  }
  if (isTimeoutError(error)) {
    return "timeout";
  }
  return "transient_failure";
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_LLM_TIMEOUT_MS;
}
