import { randomUUID } from "node:crypto";
import { CompletionClient } from "../completion/completionClient";
import { OpenAICompletionProvider } from "../completion/openAIProvider";
import { CompletionConfig, getConfig } from "../config";
import { parseAllocationResponse, ParsedProposal } from "../engine/allocationParser";
import { AdjustmentOptions, adjustAllocation } from "../engine/constraintAdjuster";
import { getFallbackAllocation } from "../engine/fallbackRules";
import { classifyGoals } from "../engine/goalClassifier";
import { calculateFinancialMetrics } from "../engine/metrics";
import {
  buildPortfolio,
  describeAdjustment,
  synthesizeNextSteps,
  synthesizeRationale,
} from "../engine/portfolioBuilder";
import { buildAllocationRequest } from "../engine/requestBuilder";
import { emitPipelineLog, PipelineState } from "../logging/pipelineLogs";
import { AllocationCandidate, isSameAllocation } from "../models/AssetClass";
import { FinancialMetrics } from "../models/FinancialMetrics";
import { GoalRecord } from "../models/Goal";
import {
  describeFailure,
  fail,
  ok,
  RecoverableFailure,
  Result,
  UnexpectedFailure,
} from "../models/PipelineResult";
import { Portfolio, Provenance } from "../models/Portfolio";
import { UserProfile } from "../models/UserProfile";
import { RISK_TIER_CEILINGS } from "../utils/constants";

/**
 * Per-request state. Created for each run and never shared between runs.
 */
interface RequestContext {
  requestId: string;
  trail: PipelineState[];
  profile: UserProfile;
  metrics: FinancialMetrics;
  goals: GoalRecord[];
  ceilings: AllocationCandidate;
  signal?: AbortSignal;
}

interface AcceptedProposal {
  allocation: AllocationCandidate;
  proposal: ParsedProposal;
}

export interface RecommendationRun {
  requestId: string;
  portfolio: Portfolio;
  trail: PipelineState[];
  failure: RecoverableFailure | null;
}

/**
 * @property adjustment - Overrides for constraint repair (clipping limit, rounding)
 * @property now - Clock used for generatedAt
 */
export interface PipelineOptions {
  adjustment?: Partial<AdjustmentOptions>;
  now?: () => Date;
}

/**
 * Turns a validated profile into a portfolio.
 *
 * The AI path (request → completion → parse → adjust) runs first; any failure on it,
 * including a thrown error, routes the request to the rule-based allocator, so a
 * portfolio is always returned.
 */
export class RecommendationPipeline {
  constructor(
    private readonly client: CompletionClient,
    private readonly options: PipelineOptions = {}
  ) {}

  async recommend(profile: UserProfile, { signal }: { signal?: AbortSignal } = {}): Promise<Portfolio> {
    const run = await this.run(profile, { signal });
    return run.portfolio;
  }

  async run(profile: UserProfile, { signal }: { signal?: AbortSignal } = {}): Promise<RecommendationRun> {
    const requestId = randomUUID();
    const trail: PipelineState[] = [];
    this.record({ requestId, trail }, "START");

    const context: RequestContext = {
      requestId,
      trail,
      profile,
      metrics: calculateFinancialMetrics(profile),
      goals: classifyGoals(profile.goals),
      ceilings: { ...RISK_TIER_CEILINGS[profile.riskTolerance] },
      signal,
    };
    this.record(context, "METRICS_COMPUTED");

    let outcome: Result<AcceptedProposal, RecoverableFailure>;
    try {
      outcome = await this.proposeWithAI(context);
    } catch (error) {
      outcome = fail<UnexpectedFailure>({
        type: "unexpected",
        message: error instanceof Error ? error.message : String(error),
      });
    }

    let portfolio: Portfolio;
    let failure: RecoverableFailure | null = null;
    if (outcome.ok) {
      portfolio = this.buildAIPortfolio(context, outcome.value);
    } else {
      failure = outcome.failure;
      this.record(context, "FALLBACK", { failure });
      portfolio = this.buildFallbackPortfolio(context, failure);
    }

    this.record(context, "DONE", { provenance: portfolio.provenance });
    return { requestId, portfolio, trail: [...trail], failure };
  }

  private async proposeWithAI(context: RequestContext): Promise<Result<AcceptedProposal, RecoverableFailure>> {
    const request = buildAllocationRequest({
      profile: context.profile,
      metrics: context.metrics,
      goals: context.goals,
    });

    this.record(context, "REQUEST_SENT");
    const completion = await this.client.complete(request, { signal: context.signal });
    if (!completion.ok) {
      return completion;
    }

    const parsed = parseAllocationResponse(completion.value.text);
    if (!parsed.ok) {
      return parsed;
    }
    this.record(context, "PARSED_OK");

    const adjusted = adjustAllocation(parsed.value.allocation, context.ceilings, this.options.adjustment);
    if (!adjusted.ok) {
      return adjusted;
    }
    this.record(context, "ADJUSTED_OK");

    return ok({ allocation: adjusted.value, proposal: parsed.value });
  }

  private buildAIPortfolio(context: RequestContext, accepted: AcceptedProposal): Portfolio {
    const { profile, metrics, goals } = context;
    const { allocation, proposal } = accepted;

    // Model-written rationale is kept only when repair left the weights untouched.
    let rationale: string;
    if (!isSameAllocation(allocation, proposal.allocation)) {
      rationale = [
        synthesizeRationale(allocation, metrics, profile.timeHorizonYears),
        describeAdjustment(proposal.allocation, profile.riskTolerance),
      ].join(" ");
    } else {
      rationale = proposal.rationale ?? synthesizeRationale(allocation, metrics, profile.timeHorizonYears);
    }

    return buildPortfolio({
      allocation,
      provenance: "ai-generated",
      riskTolerance: profile.riskTolerance,
      horizonYears: profile.timeHorizonYears,
      age: profile.age,
      metrics,
      goals,
      rationale,
      nextSteps: proposal.nextSteps.length > 0 ? proposal.nextSteps : synthesizeNextSteps(metrics, goals),
      generatedAt: this.options.now?.(),
    });
  }

  private buildFallbackPortfolio(context: RequestContext, failure: RecoverableFailure): Portfolio {
    const { profile, metrics, goals } = context;
    const { allocation } = getFallbackAllocation(metrics.riskScore, profile.timeHorizonYears);

    return buildPortfolio({
      allocation,
      provenance: "fallback-rule-based",
      riskTolerance: profile.riskTolerance,
      horizonYears: profile.timeHorizonYears,
      age: profile.age,
      metrics,
      goals,
      rationale: synthesizeRationale(allocation, metrics, profile.timeHorizonYears, describeFailure(failure)),
      nextSteps: synthesizeNextSteps(metrics, goals),
      generatedAt: this.options.now?.(),
    });
  }

  private record(
    context: Pick<RequestContext, "requestId" | "trail">,
    state: PipelineState,
    extra: { failure?: RecoverableFailure; provenance?: Provenance } = {}
  ): void {
    context.trail.push(state);
    emitPipelineLog({
      requestId: context.requestId,
      state,
      provenance: extra.provenance ?? null,
      failureType: extra.failure?.type ?? null,
      detail: extra.failure ? failureDetail(extra.failure) : null,
    });
  }
}

function failureDetail(failure: RecoverableFailure): string {
  switch (failure.type) {
    case "malformed-allocation":
      return failure.issues.join("; ");
    case "external-service":
      return `${failure.kind} after ${failure.attempts} attempt(s): ${failure.message}`;
    case "constraint-repair":
    case "unexpected":
      return failure.message;
  }
}

/**
 * Wire the default pipeline: OpenAI-compatible provider, retrying client, env config.
 */
export function createRecommendationPipeline(
  config: CompletionConfig = getConfig().completion,
  options: PipelineOptions = {}
): RecommendationPipeline {
  const provider = new OpenAICompletionProvider(config);
  const client = new CompletionClient(provider, {
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
    baseDelayMs: config.backoffBaseMs,
    backoffMultiplier: config.backoffMultiplier,
  });
  return new RecommendationPipeline(client, options);
}
