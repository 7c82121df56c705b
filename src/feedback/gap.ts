import { Metric, PersonalFinanceMetrics } from "../models/Metric";
import { UserProfile, getFamilySize } from "../models/UserProfile";
import { AnalysisConfig } from "../utils/config";
import { monthsToRetirement } from "../utils/time";

/**
 * Amounts a gap is measured against
 */
export interface GapContext {
  totalMonthlyIncome: number;
  /** Monthly expenses plus EMIs */
  monthlyOutflow: number;
  targetRetirementCorpus: number;
  totalAssets: number;
  totalLiabilities: number;
  medicalCover: number;
  termCover: number;
  familySize: number;
  monthsToRetirement: number;
  medicalCoverFactor: number;
  termCoverFactor: number;
  minGapAmount: number;
}

export function buildGapContext(
  profile: UserProfile,
  pfm: PersonalFinanceMetrics,
  config: AnalysisConfig
): GapContext {
  return {
    totalMonthlyIncome: pfm.totalMonthlyIncome,
    monthlyOutflow: pfm.totalMonthlyExpense + pfm.totalMonthlyEmi,
    targetRetirementCorpus: pfm.targetRetirementCorpus,
    totalAssets: pfm.totalAssets,
    totalLiabilities: pfm.totalLiabilities,
    medicalCover: profile.insurance.totalMedicalCover,
    termCover: profile.insurance.totalTermCover,
    familySize: getFamilySize(profile),
    monthsToRetirement: monthsToRetirement(profile.personal.age, profile.personal.expectedRetirementAge),
    medicalCoverFactor: config.medicalCoverFactor,
    termCoverFactor: config.termCoverFactor,
    minGapAmount: config.minGapAmount,
  };
}

function distances(value: number, lo: number, hi: number, scale: number): number[] {
  return [Math.abs((lo - value) * scale), Math.abs((hi - value) * scale)];
}

/**
 * Rupee amount needed to bring a metric to the nearer edge of its benchmark.
 *
 * Income ratios are measured in monthly income, reserve ratios in monthly outflow,
 * retirement in monthly contribution towards the target corpus, the asset-liability
 * ratio in loan balance and insurance in cover. The result is never below
 * `minGapAmount`; metrics without a rupee basis get `minGapAmount`.
 */
export function computeGap(metric: Metric, context: GapContext): number {
  const { value, benchmark } = metric;
  if (value === null || !benchmark) {
    return context.minGapAmount;
  }
  const { min: lo, max: hi } = benchmark;

  let gaps: number[];
  switch (metric.metricName) {
    case "savings_income_ratio":
    case "investment_income_ratio":
    case "expense_income_ratio":
    case "housing_income_ratio":
    case "debt_income_ratio":
      gaps = distances(value, lo, hi, context.totalMonthlyIncome);
      break;
    case "emergency_fund_ratio":
    case "liquidity_ratio":
      gaps = distances(value, lo, hi, context.monthlyOutflow);
      break;
    case "retirement_adequacy":
      gaps = distances(value, lo, hi, context.targetRetirementCorpus).map(
        (gap) => gap / Math.max(1, context.monthsToRetirement)
      );
      break;
    case "asset_liability_ratio":
      gaps = [
        Math.abs(context.totalLiabilities - context.totalAssets / (lo || 1)),
        Math.abs(context.totalLiabilities - context.totalAssets / (hi || 1)),
      ];
      break;
    case "health_insurance_adequacy": {
      const perUnit = context.familySize * context.medicalCoverFactor;
      gaps = [Math.abs(context.medicalCover - lo * perUnit), Math.abs(context.medicalCover - hi * perUnit)];
      break;
    }
    case "term_insurance_adequacy": {
      const perUnit = 12 * context.totalMonthlyIncome * context.termCoverFactor;
      gaps = [Math.abs(context.termCover - lo * perUnit), Math.abs(context.termCover - hi * perUnit)];
      break;
    }
    default:
      return context.minGapAmount;
  }

  const gap = Math.min(...gaps);
  if (!Number.isFinite(gap)) {
    return context.minGapAmount;
  }
  return Math.max(gap, context.minGapAmount);
}
