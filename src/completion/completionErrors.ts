import {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from "openai";
import { CompletionFailureKind } from "../models/PipelineResult";

/**
 * Raised by completion providers for conditions the SDK does not report itself,
 * such as a missing API key or an empty response.
 */
export class CompletionServiceError extends Error {
  readonly kind: CompletionFailureKind;

  constructor(kind: CompletionFailureKind, message: string) {
    super(message);
    this.name = "CompletionServiceError";
    this.kind = kind;
  }
}

export interface ClassifiedCompletionError {
  kind: CompletionFailureKind;
  message: string;
}

function classifyStatus(status: number | undefined): CompletionFailureKind {
  if (status === undefined) return "service-unavailable";
  if (status === 401 || status === 403) return "auth-error";
  if (status === 429) return "rate-limited";
  if (status === 408) return "timeout";
  if (status >= 500 || status === 409) return "service-unavailable";
  return "malformed-response";
}

/**
 * Map anything a provider throws onto a completion failure class.
 * The SDK's subclasses are checked before APIError because they extend it.
 */
export function classifyCompletionError(error: unknown): ClassifiedCompletionError {
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof CompletionServiceError) {
    return { kind: error.kind, message };
  }
  if (error instanceof APIConnectionTimeoutError || error instanceof APIUserAbortError) {
    return { kind: "timeout", message };
  }
  if (error instanceof APIConnectionError) {
    return { kind: "service-unavailable", message };
  }
  if (error instanceof APIError) {
    return { kind: classifyStatus(error.status), message };
  }
  if (error instanceof Error && error.name === "AbortError") {
    return { kind: "timeout", message };
  }
  return { kind: "service-unavailable", message };
}
