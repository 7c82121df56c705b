import { Benchmark } from "../models/Benchmark";
import { PersonalFinanceMetrics, Verdict, mapMetrics } from "../models/Metric";
import { VerdictThresholds } from "../utils/config";

/**
 * Places a value in one of seven bands around its benchmark (lo, hi):
 *
 *   extremely_low < lo·extremeLow <= low < lo·low <= good < lo <= excellent < hi
 *   <= good < hi·high <= high < hi·extremeHigh <= extremely_high
 *
 * A value exactly at lo is excellent; a value exactly at hi is good.
 */
export function classifyVerdict(
  value: number | null,
  benchmark: Benchmark | null,
  thresholds: VerdictThresholds
): Verdict {
  if (value === null) {
    return "error_computing_metric";
  }
  if (!benchmark) {
    return "no_benchmark_provided";
  }

  const { min: lo, max: hi } = benchmark;
  if (value < lo * thresholds.extremeLow) return "extremely_low";
  if (value < lo * thresholds.low) return "low";
  if (value < lo) return "good";
  if (value < hi) return "excellent";
  if (value < hi * thresholds.high) return "good";
  if (value < hi * thresholds.extremeHigh) return "high";
  return "extremely_high";
}

export function applyVerdicts(
  pfm: PersonalFinanceMetrics,
  thresholds: VerdictThresholds
): PersonalFinanceMetrics {
  return mapMetrics(pfm, (metric) => ({
    ...metric,
    verdict: classifyVerdict(metric.value, metric.benchmark, thresholds),
  }));
}
