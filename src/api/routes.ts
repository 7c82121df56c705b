import { Router, Request, Response } from "express";
import { z } from "zod";
import { analyseFinancialHealth } from "../analyzer/healthAnalyzer";
import { resolveBenchmark } from "../engine/benchmarkResolver";
import { calculateMetrics } from "../engine/metricsCalculator";
import { classifyCityTier, classifyIncomeBracket } from "../engine/segmentClassifier";
import { Benchmark } from "../models/Benchmark";
import { METRIC_NAMES, MetricName } from "../models/Metric";
import { loadAnalysisConfig, validateAnalysisConfig } from "../utils/config";
import { FinanceHealthError, RequestValidationError, errorMessage } from "../utils/errors";
import { logError, logWarn } from "../utils/logger";
import { createSeededRandom } from "../utils/random";
import { describeIssues, parseAnalysisRequest, parseUserProfile } from "../utils/validation";

const router = Router();

const analysisConfig = loadAnalysisConfig();
validateAnalysisConfig(analysisConfig);

const BenchmarkQuerySchema = z.object({
  city: z.string().min(1),
  income: z.coerce.number().min(0),
});

/**
 * Maps an error onto a response: 400 for invalid input, 422 for analysis
 * failures, 500 for anything else.
 */
function sendError(res: Response, error: unknown, action: string): void {
  if (error instanceof RequestValidationError) {
    logWarn(`${action}: ${error.message}`);
    res.status(400).json({ error: "Invalid request", issues: error.issues });
    return;
  }
  if (error instanceof FinanceHealthError) {
    logWarn(`${action}: ${error.message}`);
    res.status(422).json({ error: error.code, message: error.message });
    return;
  }
  logError(`Error in ${action}:`, error);
  res.status(500).json({
    error: "Internal server error",
    message: errorMessage(error),
  });
}

/**
 * GET /api/analyse
 * Get information about the analysis endpoint
 */
router.get("/analyse", (req: Request, res: Response) => {
  res.json({
    method: "POST",
    description: "Analyse a personal financial profile and return a health report",
    endpoint: "/api/analyse",
    requiredFields: ["userProfile", "weights (optional)", "seed (optional)"],
    example: "See example-profile.json file in the project root",
    note: "This endpoint requires a POST request with JSON body. Use a tool like curl, Postman, or fetch API.",
  });
});

/**
 * POST /api/analyse
 * Full analysis: metrics, verdicts, scores, feedback and scoring table
 */
router.post("/analyse", (req: Request, res: Response) => {
  try {
    const { userProfile, weights, seed } = parseAnalysisRequest(req.body);

    const report = analyseFinancialHealth(userProfile, {
      weights,
      config: analysisConfig,
      random: seed === undefined ? undefined : createSeededRandom(seed),
    });

    res.json(report);
  } catch (error: unknown) {
    sendError(res, error, "analysis");
  }
});

/**
 * POST /api/metrics
 * Derived metrics with benchmarks, before weighting and scoring
 */
router.post("/metrics", (req: Request, res: Response) => {
  try {
    const userProfile = parseUserProfile(req.body?.userProfile);
    res.json(calculateMetrics(userProfile, analysisConfig));
  } catch (error: unknown) {
    sendError(res, error, "metric calculation");
  }
});

/**
 * GET /api/benchmarks?city=Pune&income=120000
 * Benchmarks for the segment a city and monthly income fall into
 */
router.get("/benchmarks", (req: Request, res: Response) => {
  try {
    const parsed = BenchmarkQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw new RequestValidationError(describeIssues(parsed.error));
    }

    const cityTier = classifyCityTier(parsed.data.city);
    const incomeBracket = classifyIncomeBracket(parsed.data.income);
    const benchmarks: Record<string, Benchmark | null> = {};
    METRIC_NAMES.forEach((name: MetricName) => {
      benchmarks[name] = resolveBenchmark(name, cityTier, incomeBracket);
    });

    res.json({ cityTier, incomeBracket, benchmarks });
  } catch (error: unknown) {
    sendError(res, error, "benchmark lookup");
  }
});

/**
 * GET /api
 * API information endpoint
 */
router.get("/", (req: Request, res: Response) => {
  res.json({
    message: "Personal Finance Health API",
    version: "1.0.0",
    endpoints: {
      analyse: "POST /api/analyse - Full financial health report",
      metrics: "POST /api/metrics - Derived metrics with benchmarks",
      benchmarks: "GET /api/benchmarks?city=&income= - Benchmarks for a city and monthly income",
      health: "GET /api/health - Health check",
    },
  });
});

/**
 * GET /api/health
 * Health check endpoint
 */
router.get("/health", (req: Request, res: Response) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

export default router;
