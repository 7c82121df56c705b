import { z } from "zod";
import { Glossary, HealthReport } from "../models/HealthReport";
import { UserProfile } from "../models/UserProfile";
import { calculateMetrics } from "../engine/metricsCalculator";
import { buildScoringTable } from "../engine/scoringTable";
import { applyScores } from "../engine/scorer";
import { applyVerdicts } from "../engine/verdictClassifier";
import { assignWeights, resolveWeights } from "../engine/weights";
import { assembleFeedback } from "../feedback/feedbackAssembler";
import { FeedbackTemplates } from "../feedback/templates";
import { AnalysisConfig, DEFAULT_ANALYSIS_CONFIG, validateAnalysisConfig } from "../utils/config";
import { logDebug, logInfo } from "../utils/logger";
import { roundTo } from "../utils/math";
import { RandomSource, defaultRandom } from "../utils/random";
import glossaryData from "../data/glossary.json";

export const DEFAULT_GLOSSARY: Glossary = z.record(z.string(), z.string()).parse(glossaryData);

export interface AnalysisOptions {
  /** Loose metric labels to raw weights; normalized to sum to 100. Defaults apply when absent. */
  weights?: Record<string, number>;
  config?: AnalysisConfig;
  random?: RandomSource;
  glossary?: Glossary;
  templates?: FeedbackTemplates;
}

/**
 * Runs the full analysis for one profile: metrics, weights, verdicts, scores,
 * feedback and the scoring table.
 *
 * Holds no state between calls.
 */
export function analyseFinancialHealth(
  profile: UserProfile | null | undefined,
  options: AnalysisOptions = {}
): HealthReport {
  const config = options.config ?? DEFAULT_ANALYSIS_CONFIG;
  validateAnalysisConfig(config);

  const calculated = calculateMetrics(profile, config);
  const weights = resolveWeights(options.weights);
  logDebug(`Resolved weights: ${JSON.stringify(weights)}`);

  const weighted = assignWeights(calculated, weights);
  const classified = applyVerdicts(weighted, config.verdictThresholds);
  const scored = applyScores(classified, config.scoring);

  const feedback = assembleFeedback({
    profile,
    metrics: scored,
    config,
    random: options.random ?? defaultRandom,
    templates: options.templates,
  });

  const scoringTable = buildScoringTable(scored);
  const totalScore = roundTo(
    Object.values(scored.metrics).reduce((sum, metric) => sum + metric.assignedScore, 0),
    2
  );

  logInfo(
    `Analysis complete: score ${totalScore}, ${feedback.commendable.length} commendable, ` +
      `${feedback.review.length} review, ${feedback.improvement.length} improvement`
  );

  return {
    metrics: scored,
    commendableAreas: feedback.commendable,
    reviewAreas: feedback.review,
    areasForImprovement: feedback.improvement,
    scoringTable,
    totalScore,
    glossary: options.glossary ?? DEFAULT_GLOSSARY,
  };
}
