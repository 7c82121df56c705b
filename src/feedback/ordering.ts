import { MetricName } from "../models/Metric";
import { FeedbackSubject } from "../models/FeedbackPoint";
import { AgeBand, getAgeBand } from "../utils/time";

/**
 * Metrics that matter most at each life stage, most important first.
 */
export const AGE_BAND_PRIORITIES: Record<AgeBand, readonly MetricName[]> = {
  under30: [
    "emergency_fund_ratio",
    "expense_income_ratio",
    "savings_income_ratio",
    "debt_income_ratio",
    "liquidity_ratio",
    "investment_income_ratio",
  ],
  under45: [
    "emergency_fund_ratio",
    "health_insurance_adequacy",
    "term_insurance_adequacy",
    "savings_income_ratio",
    "retirement_adequacy",
  ],
  under60: ["retirement_adequacy", "net_worth_adequacy", "asset_liability_ratio", "liquidity_ratio"],
  senior: ["liquidity_ratio", "asset_liability_ratio", "emergency_fund_ratio"],
};

/**
 * Orders points by the priority list for the given age. Points for metrics not on
 * the list follow in their original order.
 */
export function sortByAgePriority<T extends { metricName: FeedbackSubject }>(points: T[], age: number): T[] {
  const priority = AGE_BAND_PRIORITIES[getAgeBand(age)];
  const rank = (point: T): number => {
    const index = priority.findIndex((name) => name === point.metricName);
    return index === -1 ? priority.length : index;
  };
  // Array.prototype.sort is stable
  return [...points].sort((a, b) => rank(a) - rank(b));
}
