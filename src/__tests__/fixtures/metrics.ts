import { Benchmark } from '../../models/Benchmark';
import { Metric, MetricName } from '../../models/Metric';

/**
 * Builds a single metric with sensible defaults for unit tests
 */
export function makeMetric(
  metricName: MetricName,
  value: number | null,
  benchmark: Benchmark | null,
  extra: Partial<Metric> = {}
): Metric {
  return {
    metricName,
    value,
    benchmark,
    verdict: null,
    weight: 10,
    assignedScore: 0,
    ...extra,
  };
}
