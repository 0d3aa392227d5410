import express from "express";
import { getConfig } from "../config";
import { createRecommendationPipeline, RecommendationPipeline } from "../planner/recommendationPipeline";
import { createRouter } from "./routes";

export interface AppOptions {
  pipeline?: RecommendationPipeline;
}

export function createApp(options: AppOptions = {}): express.Express {
  const app = express();
  const pipeline = options.pipeline ?? createRecommendationPipeline();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // CORS headers for development
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Routes
  app.use("/api", createRouter(pipeline));

  // Root endpoint
  app.get("/", (req, res) => {
    res.json({
      message: "Investment Allocation Advisor API",
      version: "1.0.0",
      endpoints: {
        recommendation: "POST /api/recommendation",
        metrics: "POST /api/metrics",
        health: "GET /api/health",
      },
    });
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    console.error("Unhandled error:", err);
    if (res.headersSent) {
      next(err);
      return;
    }
    // Body-parser errors carry their own 4xx status.
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
    res.status(status).json({
      error: status === 500 ? "Internal server error" : "Bad request",
      message: err instanceof Error ? err.message : String(err),
    });
  });

  return app;
}

// Start server
if (require.main === module) {
  const { port } = getConfig();
  createApp().listen(port, () => {
    console.log(`Server running on port ${port}`);
    console.log(`API available at http://localhost:${port}/api`);
  });
}

export default createApp;
