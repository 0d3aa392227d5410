import { z } from "zod";
import { AllocationCandidate } from "../models/AssetClass";
import { GOAL_CATEGORIES } from "../models/Goal";
import { RISK_TOLERANCES, UserProfile } from "../models/UserProfile";
import { InputValidationError } from "./errors";

/**
 * Zod validation schemas for input data validation.
 * Anything crossing a trust boundary (request bodies, data files, completion
 * output) is parsed through one of these before the engine sees it.
 */

const amount = z.number().finite().min(0);

/**
 * Schema for a single debt. Interest rate is in percent (e.g., 9.5 means 9.5%).
 */
export const DebtSchema = z.object({
  principal: amount,
  interestRatePct: z.number().finite().min(0).max(100),
  monthlyPayment: amount,
});

/**
 * Schema for the user profile. All amounts are monthly except principal and assets.
 */
export const UserProfileSchema = z.object({
  income: z.object({
    monthlySalary: amount,
    additionalIncome: amount.default(0),
  }),
  expenses: z.object({
    fixed: amount,
    variable: amount.default(0),
  }),
  debts: z.array(DebtSchema).default([]),
  assets: z
    .object({
      savings: amount.default(0),
      existingInvestments: amount.default(0),
    })
    .default({}),
  age: z.number().int().min(18).max(100),
  riskTolerance: z.enum(RISK_TOLERANCES),
  timeHorizonYears: z.number().positive().max(60),
  goals: z.array(z.string().trim().min(1)).min(1),
});

export type UserProfileInput = z.input<typeof UserProfileSchema>;

/**
 * Schema for the goal keyword table shipped in src/data.
 * "other" is not listed there; it is the catch-all for unmatched text.
 */
export const GoalKeywordTableSchema = z.object({
  categories: z
    .array(
      z.object({
        category: z.enum(GOAL_CATEGORIES).refine((category) => category !== "other", {
          message: "\"other\" is reserved for unmatched goals",
        }),
        priority: z.number().int().min(1),
        keywords: z.array(z.string().trim().min(1)).min(1),
        compoundHeads: z.array(z.string().trim().regex(/^[a-z]+$/i)).default([]),
      })
    )
    .min(1),
});

const weight = z.number().finite().min(0).max(100);

/**
 * Schema for an allocation block once its keys are normalized.
 * Every asset class is required and nothing else is allowed.
 */
export const AllocationBlockSchema = z
  .object({
    equities: weight,
    bonds: weight,
    realEstate: weight,
    cashEquivalents: weight,
    alternatives: weight,
  })
  .strict() satisfies z.ZodType<AllocationCandidate>;

const stepsField = z.union([z.string(), z.array(z.string())]);

/**
 * Optional prose fields that may accompany an allocation block.
 */
export const ProposalMetaSchema = z.object({
  rationale: z.string().optional(),
  narrative: z.string().optional(),
  nextSteps: stepsField.optional(),
  next_steps: stepsField.optional(),
});

export type ProposalMeta = z.infer<typeof ProposalMetaSchema>;

/**
 * Formats zod issues as "path: message" strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Validates raw input and returns a UserProfile.
 *
 * @throws InputValidationError when the input does not match UserProfileSchema
 */
export function parseUserProfile(input: unknown): UserProfile {
  const result = UserProfileSchema.safeParse(input);
  if (!result.success) {
    throw new InputValidationError(formatIssues(result.error));
  }
  return result.data;
}
