import { Metric, PersonalFinanceMetrics, mapMetrics } from "../models/Metric";
import { ScoringOptions } from "../utils/config";
import { clamp, roundTo } from "../utils/math";

/**
 * Points awarded to a metric, between 0 and its weight.
 *
 * Inside the benchmark range the full weight is awarded. Above the range a flat
 * share (overPerformanceFactor) applies when configured. Otherwise the award
 * decays with distance from the range:
 *
 *   weight × (base + (1 − base) × ratio)³
 *
 * where ratio is value/lo below the range and hi/value above it, clamped to [0, 1].
 * Unscorable metrics (no value, no benchmark, no weight) get 0.
 */
export function scoreMetric(metric: Metric, weight: number, options: ScoringOptions): number {
  const { value, benchmark } = metric;
  if (value === null || !Number.isFinite(weight) || weight <= 0 || !benchmark) {
    return 0;
  }

  const { min: lo, max: hi } = benchmark;
  if (value >= lo && value <= hi) {
    return weight;
  }

  if (value > hi && options.overPerformanceFactor !== null) {
    return roundTo(clamp(options.overPerformanceFactor, 0, 1) * weight, 2);
  }

  let ratio: number;
  if (value < lo) {
    ratio = lo > 0 ? value / lo : 0;
  } else {
    ratio = value > 0 ? hi / value : 0;
  }

  const base = options.baseValue;
  const score = weight * Math.pow(base + (1 - base) * clamp(ratio, 0, 1), 3);
  return roundTo(clamp(score, 0, weight), 2);
}

export function applyScores(pfm: PersonalFinanceMetrics, options: ScoringOptions): PersonalFinanceMetrics {
  return mapMetrics(pfm, (metric) => ({
    ...metric,
    assignedScore: scoreMetric(metric, metric.weight, options),
  }));
}
