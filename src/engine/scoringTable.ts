import { formatBenchmark } from "../models/Benchmark";
import { PersonalFinanceMetrics, listMetrics, toReadableName } from "../models/Metric";
import { ScoringTableRow } from "../models/HealthReport";
import { roundTo } from "../utils/math";

/**
 * One display row per metric in canonical order, followed by a Total row.
 */
export function buildScoringTable(pfm: PersonalFinanceMetrics): ScoringTableRow[] {
  const rows: ScoringTableRow[] = listMetrics(pfm).map((metric) => ({
    metric: toReadableName(metric.metricName),
    weight: metric.weight,
    benchmark: formatBenchmark(metric.benchmark),
    userValue: metric.value,
    verdict: metric.verdict ? toReadableName(metric.verdict) : "N/A",
    pointsAwarded: metric.assignedScore,
  }));

  const totalWeight = rows.reduce((sum, row) => sum + row.weight, 0);
  const totalPoints = rows.reduce((sum, row) => sum + row.pointsAwarded, 0);

  rows.push({
    metric: "Total",
    weight: totalWeight,
    benchmark: "",
    userValue: null,
    verdict: "",
    pointsAwarded: roundTo(totalPoints, 2),
  });
  return rows;
}
