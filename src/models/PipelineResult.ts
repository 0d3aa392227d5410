/**
 * Stage results threaded through the recommendation pipeline.
 * Every recoverable failure is a value, not an exception, so each stage's
 * signature shows whether it can route the request to the fallback path.
 */

export type Result<T, F> = { ok: true; value: T } | { ok: false; failure: F };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<F>(failure: F): { ok: false; failure: F } {
  return { ok: false, failure };
}

export type CompletionFailureKind =
  | "timeout"
  | "rate-limited"
  | "service-unavailable"
  | "malformed-response"
  | "auth-error";

/**
 * The completion service could not produce usable output.
 *
 * @property cancelled - True when the caller aborted the request rather than the per-call timeout firing
 */
export interface ExternalServiceFailure {
  type: "external-service";
  kind: CompletionFailureKind;
  message: string;
  attempts: number;
  cancelled: boolean;
}

/**
 * The response did not contain a structurally valid allocation block.
 */
export interface MalformedAllocationFailure {
  type: "malformed-allocation";
  issues: string[];
}

/**
 * A structurally valid proposal could not be brought within the portfolio invariants.
 *
 * @property clippedExcess - Percentage points removed by ceiling clipping before the adjuster gave up
 */
export interface ConstraintRepairFailure {
  type: "constraint-repair";
  message: string;
  clippedExcess: number;
}

/**
 * A defect inside the AI path (a thrown error where a result was expected).
 */
export interface UnexpectedFailure {
  type: "unexpected";
  message: string;
}

export type RecoverableFailure =
  | ExternalServiceFailure
  | MalformedAllocationFailure
  | ConstraintRepairFailure
  | UnexpectedFailure;

/**
 * Short human-readable reason used in logs and fallback rationale text.
 */
export function describeFailure(failure: RecoverableFailure): string {
  switch (failure.type) {
    case "external-service":
      return failure.cancelled ? "request cancelled" : failure.kind;
    case "malformed-allocation":
      return "unusable allocation in response";
    case "constraint-repair":
      return "proposal outside allocation limits";
    case "unexpected":
      return "internal error";
  }
}
