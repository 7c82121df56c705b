import { Benchmark, CityTier, IncomeBracket } from "./Benchmark";

/**
 * Derived metric data structures
 */

export const RATIO_METRICS = [
  "savings_income_ratio",
  "investment_income_ratio",
  "expense_income_ratio",
  "debt_income_ratio",
  "emergency_fund_ratio",
  "liquidity_ratio",
  "asset_liability_ratio",
  "housing_income_ratio",
] as const;

export const ADEQUACY_METRICS = [
  "health_insurance_adequacy",
  "term_insurance_adequacy",
  "net_worth_adequacy",
  "retirement_adequacy",
] as const;

/** Assessable metrics in canonical order. */
export const METRIC_NAMES = [...RATIO_METRICS, ...ADEQUACY_METRICS] as const;

export type RatioMetricName = (typeof RATIO_METRICS)[number];
export type AdequacyMetricName = (typeof ADEQUACY_METRICS)[number];
export type MetricName = (typeof METRIC_NAMES)[number];

export type BandVerdict =
  | "extremely_low"
  | "low"
  | "good"
  | "excellent"
  | "high"
  | "extremely_high";

export type Verdict = BandVerdict | "error_computing_metric" | "no_benchmark_provided";

export const GOOD_VERDICTS: readonly Verdict[] = ["good", "excellent"];
export const REVIEW_VERDICTS: readonly Verdict[] = ["high", "extremely_high"];
export const BAD_VERDICTS: readonly Verdict[] = ["extremely_low", "low", "high", "extremely_high"];

/**
 * A single assessable metric.
 *
 * @property value - Rounded to 2 decimals; null when the metric could not be computed
 * @property error - Why the value is null
 * @property verdict - Null until the verdict stage has run
 * @property assignedScore - Points awarded, between 0 and weight
 */
export interface Metric {
  metricName: MetricName;
  value: number | null;
  error?: string;
  benchmark: Benchmark | null;
  verdict: Verdict | null;
  weight: number;
  assignedScore: number;
}

export type MetricMap = Record<MetricName, Metric>;

export interface AssetClassDistribution {
  liquid: number;
  equity: number;
  debt: number;
  retirement: number;
  realEstate: number;
}

export interface PersonalFinanceMetrics {
  cityTier: CityTier;
  incomeBracket: IncomeBracket;
  yearsToRetirement: number;
  totalAssets: number;
  totalLiabilities: number;
  totalMonthlyIncome: number;
  totalMonthlyExpense: number;
  totalMonthlyEmi: number;
  totalMonthlyInvestments: number;
  targetRetirementCorpus: number;
  /** Empty when total assets are zero */
  assetClassDistribution: Partial<AssetClassDistribution>;
  metrics: MetricMap;
}

export function isMetricName(name: string): name is MetricName {
  return METRIC_NAMES.some((metric) => metric === name);
}

export function isRatioMetric(name: MetricName): name is RatioMetricName {
  return RATIO_METRICS.some((metric) => metric === name);
}

/**
 * "savings_income_ratio" -> "Savings Income Ratio"
 */
export function toReadableName(name: string): string {
  return name
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}

/**
 * Builds a full metric map by calling `build` once per metric name
 */
export function buildMetricMap(build: (name: MetricName) => Metric): MetricMap {
  return {
    savings_income_ratio: build("savings_income_ratio"),
    investment_income_ratio: build("investment_income_ratio"),
    expense_income_ratio: build("expense_income_ratio"),
    debt_income_ratio: build("debt_income_ratio"),
    emergency_fund_ratio: build("emergency_fund_ratio"),
    liquidity_ratio: build("liquidity_ratio"),
    asset_liability_ratio: build("asset_liability_ratio"),
    housing_income_ratio: build("housing_income_ratio"),
    health_insurance_adequacy: build("health_insurance_adequacy"),
    term_insurance_adequacy: build("term_insurance_adequacy"),
    net_worth_adequacy: build("net_worth_adequacy"),
    retirement_adequacy: build("retirement_adequacy"),
  };
}

/**
 * Returns a copy of the metrics with every metric passed through `update`
 */
export function mapMetrics(
  pfm: PersonalFinanceMetrics,
  update: (metric: Metric) => Metric
): PersonalFinanceMetrics {
  return { ...pfm, metrics: buildMetricMap((name) => update(pfm.metrics[name])) };
}

/**
 * Metrics in canonical order
 */
export function listMetrics(pfm: PersonalFinanceMetrics): Metric[] {
  return METRIC_NAMES.map((name) => pfm.metrics[name]);
}
