import { NextFunction, Request, Response, Router } from "express";
import { classifyGoals } from "../engine/goalClassifier";
import { calculateFinancialMetrics } from "../engine/metrics";
import { RecommendationPipeline } from "../planner/recommendationPipeline";
import { InputValidationError } from "../utils/errors";
import { parseUserProfile } from "../utils/validation";

const PROFILE_FIELDS = [
  "income.monthlySalary",
  "income.additionalIncome (optional)",
  "expenses.fixed",
  "expenses.variable (optional)",
  "debts[] (optional: principal, interestRatePct, monthlyPayment)",
  "assets.savings (optional)",
  "assets.existingInvestments (optional)",
  "age",
  "riskTolerance (conservative | moderate | aggressive)",
  "timeHorizonYears",
  "goals[]",
];

function sendValidationError(res: Response, error: InputValidationError): void {
  res.status(400).json({
    error: "Invalid user profile",
    issues: error.issues,
  });
}

export function createRouter(pipeline: RecommendationPipeline): Router {
  const router = Router();

  /**
   * GET /api
   * List the available endpoints
   */
  router.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Investment Allocation Advisor API",
      endpoints: {
        recommendation: "POST /api/recommendation",
        metrics: "POST /api/metrics",
        health: "GET /api/health",
      },
    });
  });

  /**
   * GET /api/recommendation
   * Get information about the recommendation endpoint
   */
  router.get("/recommendation", (req: Request, res: Response) => {
    res.json({
      method: "POST",
      description: "Recommend an asset allocation for a user profile",
      endpoint: "/api/recommendation",
      requiredFields: PROFILE_FIELDS,
      example: "See example-profile.json in the project root",
      note: "This endpoint requires a POST request with JSON body. Use a tool like curl, Postman, or fetch API.",
    });
  });

  /**
   * POST /api/recommendation
   * Validate the profile and return a finalized portfolio. The pipeline is
   * cancelled when the client disconnects before the response is written.
   */
  router.post("/recommendation", async (req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    try {
      const profile = parseUserProfile(req.body);
      const portfolio = await pipeline.recommend(profile, { signal: controller.signal });
      if (controller.signal.aborted) {
        return;
      }
      res.json(portfolio);
    } catch (error) {
      if (error instanceof InputValidationError) {
        sendValidationError(res, error);
        return;
      }
      next(error);
    }
  });

  /**
   * POST /api/metrics
   * Derived metrics and classified goals, without an allocation
   */
  router.post("/metrics", (req: Request, res: Response, next: NextFunction) => {
    try {
      const profile = parseUserProfile(req.body);
      res.json({
        metrics: calculateFinancialMetrics(profile),
        goals: classifyGoals(profile.goals),
      });
    } catch (error) {
      if (error instanceof InputValidationError) {
        sendValidationError(res, error);
        return;
      }
      next(error);
    }
  });

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return router;
}
