import {
  CommendablePoint,
  FeedbackSections,
  ImprovementPoint,
  ReviewPoint,
} from "../models/FeedbackPoint";
import {
  BAD_VERDICTS,
  GOOD_VERDICTS,
  Metric,
  MetricName,
  PersonalFinanceMetrics,
  REVIEW_VERDICTS,
  Verdict,
  listMetrics,
} from "../models/Metric";
import { UserProfile, isDebtFree } from "../models/UserProfile";
import { AnalysisConfig, DEFAULT_ANALYSIS_CONFIG } from "../utils/config";
import { FeedbackAssemblyError } from "../utils/errors";
import { RandomSource, defaultRandom } from "../utils/random";
import { GapContext, buildGapContext, computeGap } from "./gap";
import { generateHeader } from "./headers";
import { sortByAgePriority } from "./ordering";
import {
  DEFAULT_TEMPLATES,
  FeedbackTemplates,
  TemplateValues,
  lookupTemplate,
  renderTemplate,
} from "./templates";

export interface AssembleFeedbackInput {
  profile: UserProfile | null | undefined;
  metrics: PersonalFinanceMetrics | null | undefined;
  config?: AnalysisConfig;
  random?: RandomSource;
  templates?: FeedbackTemplates;
}

const COMMENDABLE_FALLBACK = "This metric is well within its ideal range. Great work!";
const IMPROVEMENT_FALLBACK = "This metric is far from its ideal range.";
const ACTIONABLE_FALLBACK = "Work towards bringing it back within the recommended range.";

const DEBT_FREE_HEADER = "Debt Free";
const DEBT_FREE_SCENARIO =
  "Great work being debt-free! With no outstanding loans, every rupee you earn can go towards your goals.";

function hasVerdictIn(metric: Metric, verdicts: readonly Verdict[]): metric is Metric & { verdict: Verdict } {
  return metric.verdict !== null && verdicts.includes(metric.verdict);
}

/**
 * Values substituted into a metric's templates. Insurance metrics are shown in
 * rupees: the user's cover and the benchmark rescaled to cover amounts.
 */
function templateValues(metric: Metric, context: GapContext): TemplateValues {
  const lo = metric.benchmark?.min ?? 0;
  const hi = metric.benchmark?.max ?? 0;
  const values: TemplateValues = {
    user_value: metric.value ?? 0,
    min_val: lo,
    max_val: hi,
    gap_amt: computeGap(metric, context),
  };

  if (metric.metricName === "health_insurance_adequacy") {
    const perUnit = context.familySize * context.medicalCoverFactor;
    return { ...values, user_value: context.medicalCover, min_val: lo * perUnit, max_val: hi * perUnit };
  }
  if (metric.metricName === "term_insurance_adequacy") {
    const perUnit = 12 * context.totalMonthlyIncome * context.termCoverFactor;
    return { ...values, user_value: context.termCover, min_val: lo * perUnit, max_val: hi * perUnit };
  }
  return values;
}

/**
 * Turns verdicts into commendable, review and improvement points.
 *
 * Good and excellent metrics are commended. High metrics go to review when a review
 * template exists for them; any remaining out-of-range metric becomes an
 * improvement point. A metric lands in at most one list. Each list is ordered by
 * what matters most at the user's age.
 *
 * @throws FeedbackAssemblyError when the profile or metrics are missing
 */
export function assembleFeedback(input: AssembleFeedbackInput): FeedbackSections {
  const { profile, metrics } = input;
  if (!profile) {
    throw new FeedbackAssemblyError("a user profile");
  }
  if (!metrics) {
    throw new FeedbackAssemblyError("derived metrics");
  }
  const config = input.config ?? DEFAULT_ANALYSIS_CONFIG;
  const random = input.random ?? defaultRandom;
  const templates = input.templates ?? DEFAULT_TEMPLATES;

  const context = buildGapContext(profile, metrics, config);
  const analysed = new Set<MetricName>();
  const all = listMetrics(metrics);

  const commendable: CommendablePoint[] = [];
  for (const metric of all) {
    if (!hasVerdictIn(metric, GOOD_VERDICTS) || analysed.has(metric.metricName)) continue;
    const template = lookupTemplate(templates.commendable, metric.metricName, metric.verdict);
    commendable.push({
      kind: "commendable",
      metricName: metric.metricName,
      header: generateHeader(metric.metricName, metric.verdict, templates.headers, random),
      currentScenario: template ? renderTemplate(template, templateValues(metric, context)) : COMMENDABLE_FALLBACK,
    });
    analysed.add(metric.metricName);
  }

  if (config.includeDebtFreeCommendation && isDebtFree(profile)) {
    commendable.push({
      kind: "commendable",
      metricName: "debt_free",
      header: DEBT_FREE_HEADER,
      currentScenario: DEBT_FREE_SCENARIO,
    });
  }

  // Review runs before improvement: high metrics without a review template fall through.
  const review: ReviewPoint[] = [];
  for (const metric of all) {
    if (!hasVerdictIn(metric, REVIEW_VERDICTS) || analysed.has(metric.metricName)) continue;
    const template = lookupTemplate(templates.review, metric.metricName, metric.verdict);
    if (!template) continue;
    review.push({
      kind: "review",
      metricName: metric.metricName,
      header: generateHeader(metric.metricName, metric.verdict, templates.headers, random),
      currentScenario: renderTemplate(template, templateValues(metric, context)),
    });
    analysed.add(metric.metricName);
  }

  const improvement: ImprovementPoint[] = [];
  for (const metric of all) {
    if (!hasVerdictIn(metric, BAD_VERDICTS) || analysed.has(metric.metricName)) continue;
    const template = lookupTemplate(templates.improvement, metric.metricName, metric.verdict);
    const values = templateValues(metric, context);
    improvement.push({
      kind: "improvement",
      metricName: metric.metricName,
      header: generateHeader(metric.metricName, metric.verdict, templates.headers, random),
      currentScenario: template ? renderTemplate(template.currentScenario, values) : IMPROVEMENT_FALLBACK,
      actionable: template ? renderTemplate(template.actionable, values) : ACTIONABLE_FALLBACK,
    });
    analysed.add(metric.metricName);
  }

  const age = profile.personal.age;
  return {
    commendable: sortByAgePriority(commendable, age),
    review: sortByAgePriority(review, age),
    improvement: sortByAgePriority(improvement, age),
  };
}
