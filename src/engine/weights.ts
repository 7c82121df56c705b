import { MetricName, PersonalFinanceMetrics, isMetricName, mapMetrics } from "../models/Metric";
import { InvalidConfigurationError } from "../utils/errors";
import { logWarn } from "../utils/logger";

/**
 * Weights used when the caller supplies none. Sums to 100.
 */
export const DEFAULT_METRIC_WEIGHTS: Record<MetricName, number> = {
  savings_income_ratio: 12,
  investment_income_ratio: 10,
  expense_income_ratio: 8,
  debt_income_ratio: 10,
  emergency_fund_ratio: 10,
  liquidity_ratio: 5,
  asset_liability_ratio: 7,
  housing_income_ratio: 6,
  health_insurance_adequacy: 8,
  term_insurance_adequacy: 8,
  net_worth_adequacy: 6,
  retirement_adequacy: 10,
};

/**
 * "Savings-Income Ratio" -> "savings_income_ratio"
 */
export function normalizeMetricKey(label: string): string {
  return label.trim().toLowerCase().replace(/[-\s]+/g, "_");
}

/**
 * Scales raw weights to non-negative integers that sum to exactly 100.
 *
 * Negative weights count as 0. Each weight is scaled to its share of 100 and
 * floored; the points lost to flooring go one each to the largest remainders,
 * earlier keys first on ties. When every weight is 0 the shares are equal.
 *
 * @throws InvalidConfigurationError when a weight is not a finite number
 *
 * @example
 * ```ts
 * postProcessWeights({ a: 1, b: 1, c: 1 }) // { a: 34, b: 33, c: 33 }
 * ```
 */
export function postProcessWeights(raw: Record<string, number>): Record<string, number> {
  const entries = Object.entries(raw);
  if (entries.length === 0) {
    return {};
  }

  const invalid = entries.filter(([, value]) => !Number.isFinite(value)).map(([key]) => key);
  if (invalid.length > 0) {
    throw new InvalidConfigurationError(
      invalid.map((key) => `Weight for '${key}' must be a finite number`)
    );
  }

  const clipped = entries.map(([key, value]): [string, number] => [key, Math.max(0, value)]);
  // Relative to the largest weight, so neither the sum nor the shares overflow
  const largest = Math.max(...clipped.map(([, value]) => value));
  const relative = clipped.map(([key, value]): [string, number] => [
    key,
    largest > 0 ? value / largest : 0,
  ]);
  const total = relative.reduce((sum, [, value]) => sum + value, 0);

  const scaled = relative.map(([key, value], index) => {
    const share = total > 0 ? (value * 100) / total : 100 / relative.length;
    const floored = Math.floor(share);
    return { key, index, floored, remainder: share - floored };
  });

  let shortfall = 100 - scaled.reduce((sum, item) => sum + item.floored, 0);
  const byRemainder = [...scaled].sort((a, b) => b.remainder - a.remainder || a.index - b.index);
  for (const item of byRemainder) {
    if (shortfall <= 0) break;
    item.floored += 1;
    shortfall -= 1;
  }

  const result: Record<string, number> = {};
  for (const item of scaled) {
    result[item.key] = item.floored;
  }
  return result;
}

/**
 * Normalizes weight labels and drops the ones that name no metric.
 * A label repeated under different spellings keeps its last value.
 */
export function normalizeWeightKeys(weights: Record<string, number>): Record<string, number> {
  const normalized: Record<string, number> = {};
  for (const [label, value] of Object.entries(weights)) {
    const key = normalizeMetricKey(label);
    if (isMetricName(key)) {
      normalized[key] = value;
    } else {
      logWarn(`Ignoring weight for unknown metric '${label}'.`);
    }
  }
  return normalized;
}

/**
 * Turns caller weights (or the defaults) into integer weights summing to 100,
 * keyed by metric name.
 */
export function resolveWeights(weights?: Record<string, number>): Record<string, number> {
  return postProcessWeights(normalizeWeightKeys(weights ?? DEFAULT_METRIC_WEIGHTS));
}

/**
 * Copies the metrics with each weight set from the map. Metrics without a weight get 0.
 */
export function assignWeights(
  pfm: PersonalFinanceMetrics,
  weights: Record<string, number>
): PersonalFinanceMetrics {
  const normalized = normalizeWeightKeys(weights);
  return mapMetrics(pfm, (metric) => ({
    ...metric,
    weight: normalized[metric.metricName] ?? 0,
  }));
}
