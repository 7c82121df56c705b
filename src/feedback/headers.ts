import { MetricName, Verdict, isRatioMetric, toReadableName } from "../models/Metric";
import { RandomSource, pickOne } from "../utils/random";
import { HeaderTemplates } from "./templates";

function isGood(verdict: Verdict): boolean {
  return verdict === "good" || verdict === "excellent";
}

function isLow(verdict: Verdict): boolean {
  return verdict === "low" || verdict === "extremely_low";
}

/**
 * Picks a header for a feedback point, e.g. "Healthy Savings Income Ratio" or
 * "Insufficient Term Insurance Adequacy".
 */
export function generateHeader(
  metricName: MetricName,
  verdict: Verdict,
  headers: HeaderTemplates,
  random: RandomSource
): string {
  const pools = isRatioMetric(metricName) ? headers.ratio : headers.adequacy;
  let pool: readonly [string, ...string[]];
  if (isGood(verdict)) {
    pool = pools.good;
  } else {
    pool = isLow(verdict) ? pools.badLow : pools.badHigh;
  }

  return pickOne(pool, random).replace("{metric_name}", toReadableName(metricName));
}
