import { setTimeout as sleep } from "node:timers/promises";
import { AllocationRequest } from "../engine/requestBuilder";
import {
  CompletionFailureKind,
  ExternalServiceFailure,
  fail,
  ok,
  Result,
} from "../models/PipelineResult";
import { classifyCompletionError } from "./completionErrors";

export interface CompletionCallOptions {
  signal: AbortSignal;
  timeoutMs: number;
}

/**
 * A transport that turns an allocation request into raw response text.
 * Implementations throw on failure and must stop work when `signal` aborts.
 */
export interface CompletionProvider {
  complete(request: AllocationRequest, options: CompletionCallOptions): Promise<string>;
}

/**
 * @property timeoutMs - Upper bound for a single attempt
 * @property maxRetries - Retries after the first attempt for transient failures
 * @property baseDelayMs - Wait before the first retry; later waits multiply by backoffMultiplier
 * @property wait - Backoff timer, replaceable in tests; must reject when the signal aborts
 */
export interface CompletionClientOptions {
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
  backoffMultiplier: number;
  wait?: (delayMs: number, signal?: AbortSignal) => Promise<void>;
}

export interface CompletionSuccess {
  text: string;
  attempts: number;
}

interface AttemptFailure {
  kind: CompletionFailureKind;
  message: string;
  cancelled: boolean;
}

const RETRYABLE_KINDS: ReadonlySet<CompletionFailureKind> = new Set<CompletionFailureKind>([
  "timeout",
  "rate-limited",
  "service-unavailable",
]);

const defaultWait = async (delayMs: number, signal?: AbortSignal): Promise<void> => {
  await sleep(delayMs, undefined, { signal });
};

/**
 * Calls a completion provider with a per-attempt timeout, caller cancellation
 * and exponential backoff for transient failures. Never throws.
 */
export class CompletionClient {
  private readonly wait: (delayMs: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly provider: CompletionProvider,
    private readonly options: CompletionClientOptions
  ) {
    this.wait = options.wait ?? defaultWait;
  }

  /** Backoff before retry number `retry` (1-based). */
  getBackoffDelay(retry: number): number {
    return this.options.baseDelayMs * Math.pow(this.options.backoffMultiplier, retry - 1);
  }

  async complete(
    request: AllocationRequest,
    { signal }: { signal?: AbortSignal } = {}
  ): Promise<Result<CompletionSuccess, ExternalServiceFailure>> {
    let attempts = 0;

    for (;;) {
      if (signal?.aborted) {
        return fail(this.cancelledFailure(attempts));
      }

      attempts += 1;
      const outcome = await this.attempt(request, signal);
      if (outcome.ok) {
        return ok({ text: outcome.value, attempts });
      }

      const failure = outcome.failure;
      const retriesUsed = attempts - 1;
      if (failure.cancelled || !RETRYABLE_KINDS.has(failure.kind) || retriesUsed >= this.options.maxRetries) {
        return fail<ExternalServiceFailure>({ type: "external-service", ...failure, attempts });
      }

      try {
        await this.wait(this.getBackoffDelay(attempts), signal);
      } catch (error) {
        if (signal?.aborted) {
          return fail(this.cancelledFailure(attempts));
        }
        const { kind, message } = classifyCompletionError(error);
        return fail<ExternalServiceFailure>({ type: "external-service", kind, message, attempts, cancelled: false });
      }
    }
  }

  private async attempt(
    request: AllocationRequest,
    signal: AbortSignal | undefined
  ): Promise<Result<string, AttemptFailure>> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    // Rejects once the attempt is aborted, whether or not the provider honours its signal.
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(new Error("Completion attempt aborted")),
        { once: true }
      );
    });

    try {
      const text = await Promise.race([
        this.provider.complete(request, { signal: controller.signal, timeoutMs }),
        aborted,
      ]);
      return ok(text);
    } catch (error) {
      if (signal?.aborted) {
        return fail<AttemptFailure>({ kind: "timeout", message: "Completion request cancelled by caller", cancelled: true });
      }
      if (timedOut) {
        return fail<AttemptFailure>({ kind: "timeout", message: `Completion call exceeded ${timeoutMs}ms`, cancelled: false });
      }
      return fail<AttemptFailure>({ ...classifyCompletionError(error), cancelled: false });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private cancelledFailure(attempts: number): ExternalServiceFailure {
    return {
      type: "external-service",
      kind: "timeout",
      message: "Completion request cancelled by caller",
      attempts,
      cancelled: true,
    };
  }
}
