import { MetricName, Metric, PersonalFinanceMetrics, AssetClassDistribution, buildMetricMap } from "../models/Metric";
import { MetricResult, metricFailed, metricOk } from "../models/MetricResult";
import {
  UserProfile,
  getFamilySize,
  getTotalAssets,
  getTotalLiabilities,
  getTotalMonthlyEmi,
  getTotalMonthlyExpense,
  getTotalMonthlyIncome,
  getTotalMonthlyInvestments,
} from "../models/UserProfile";
import { AnalysisConfig, DEFAULT_ANALYSIS_CONFIG } from "../utils/config";
import { InvalidMetricParameterError, MissingProfileError } from "../utils/errors";
import { logWarn } from "../utils/logger";
import { roundTo } from "../utils/math";
import { getNetWorthMultiplier, yearsToRetirement } from "../utils/time";
import { resolveBenchmark } from "./benchmarkResolver";
import { computeRetirementCorpusFutureValue, computeTargetRetirementCorpus } from "./retirement";
import { classifyCityTier, classifyIncomeBracket } from "./segmentClassifier";

/**
 * Divides two amounts into a metric value rounded to 2 decimals.
 * A zero or non-finite denominator yields the error variant.
 */
function ratio(
  metric: MetricName,
  numerator: number,
  denominator: number,
  parameter: string
): MetricResult {
  if (denominator === 0 || !Number.isFinite(denominator)) {
    return metricFailed(new InvalidMetricParameterError(metric, parameter));
  }
  const value = numerator / denominator;
  if (!Number.isFinite(value)) {
    return metricFailed(new InvalidMetricParameterError(metric, parameter));
  }
  return metricOk(roundTo(value, 2));
}

function computeAssetClassDistribution(
  profile: UserProfile,
  totalAssets: number
): Partial<AssetClassDistribution> {
  if (totalAssets <= 0) {
    return {};
  }
  const { asset } = profile;
  return {
    liquid: (asset.totalSavingsBalance + asset.totalEmergencyFund) / totalAssets,
    equity: asset.totalEquityInvestments / totalAssets,
    debt: asset.totalDebtInvestments / totalAssets,
    retirement: asset.totalRetirementInvestments / totalAssets,
    realEstate: asset.totalRealEstateInvestments / totalAssets,
  };
}

/**
 * Derives aggregates, the 12 assessable metrics and their benchmarks from a profile.
 *
 * A metric whose inputs make it uncomputable (e.g. no liabilities for the
 * asset-liability ratio) is recorded with a null value and an error message; the
 * remaining metrics are still computed. Verdicts, weights and scores are left for
 * the later pipeline stages.
 *
 * @throws MissingProfileError when no profile is supplied
 * @throws InvalidConfigurationError when the retirement horizon is invalid
 */
export function calculateMetrics(
  profile: UserProfile | null | undefined,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG
): PersonalFinanceMetrics {
  if (!profile) {
    throw new MissingProfileError();
  }

  const totalMonthlyIncome = getTotalMonthlyIncome(profile);
  const totalMonthlyExpense = getTotalMonthlyExpense(profile);
  const totalMonthlyEmi = getTotalMonthlyEmi(profile);
  const totalMonthlyInvestments = getTotalMonthlyInvestments(profile);
  const totalAssets = getTotalAssets(profile);
  const totalLiabilities = getTotalLiabilities(profile);
  const monthlyOutflow = totalMonthlyExpense + totalMonthlyEmi;
  const annualIncome = totalMonthlyIncome * 12;

  const cityTier = classifyCityTier(profile.personal.city);
  const incomeBracket = classifyIncomeBracket(totalMonthlyIncome);

  const targetRetirementCorpus = computeTargetRetirementCorpus(profile, config.retirement);
  const projectedRetirementCorpus = computeRetirementCorpusFutureValue(profile, config.retirement);

  const results: Record<MetricName, MetricResult> = {
    savings_income_ratio: ratio(
      "savings_income_ratio",
      totalMonthlyIncome - monthlyOutflow,
      totalMonthlyIncome,
      "total_monthly_income"
    ),
    investment_income_ratio: ratio(
      "investment_income_ratio",
      totalMonthlyInvestments,
      totalMonthlyIncome,
      "total_monthly_income"
    ),
    expense_income_ratio: ratio(
      "expense_income_ratio",
      monthlyOutflow,
      totalMonthlyIncome,
      "total_monthly_income"
    ),
    debt_income_ratio: ratio(
      "debt_income_ratio",
      totalMonthlyEmi,
      totalMonthlyIncome,
      "total_monthly_income"
    ),
    emergency_fund_ratio: ratio(
      "emergency_fund_ratio",
      profile.asset.totalEmergencyFund,
      monthlyOutflow,
      "total_monthly_outflow"
    ),
    liquidity_ratio: ratio(
      "liquidity_ratio",
      profile.asset.totalSavingsBalance,
      monthlyOutflow,
      "total_monthly_outflow"
    ),
    asset_liability_ratio: ratio(
      "asset_liability_ratio",
      totalAssets,
      totalLiabilities,
      "total_liabilities"
    ),
    housing_income_ratio: ratio(
      "housing_income_ratio",
      profile.expense.housingCost + profile.liability.homeLoanEmi,
      totalMonthlyIncome,
      "total_monthly_income"
    ),
    health_insurance_adequacy: ratio(
      "health_insurance_adequacy",
      profile.insurance.totalMedicalCover,
      getFamilySize(profile) * config.medicalCoverFactor,
      "recommended_medical_cover"
    ),
    term_insurance_adequacy: ratio(
      "term_insurance_adequacy",
      profile.insurance.totalTermCover,
      annualIncome * config.termCoverFactor,
      "recommended_term_cover"
    ),
    net_worth_adequacy: ratio(
      "net_worth_adequacy",
      totalAssets - totalLiabilities,
      annualIncome * getNetWorthMultiplier(profile.personal.age),
      "expected_net_worth"
    ),
    retirement_adequacy: ratio(
      "retirement_adequacy",
      projectedRetirementCorpus,
      targetRetirementCorpus,
      "target_retirement_corpus"
    ),
  };

  const metrics = buildMetricMap((name): Metric => {
    const result = results[name];
    const benchmark = resolveBenchmark(name, cityTier, incomeBracket);
    if (!result.ok) {
      logWarn(`${result.error.message} Recording it as an error.`);
      return {
        metricName: name,
        value: null,
        error: result.error.message,
        benchmark,
        verdict: null,
        weight: 0,
        assignedScore: 0,
      };
    }
    return {
      metricName: name,
      value: result.value,
      benchmark,
      verdict: null,
      weight: 0,
      assignedScore: 0,
    };
  });

  return {
    cityTier,
    incomeBracket,
    yearsToRetirement: yearsToRetirement(profile.personal.age, profile.personal.expectedRetirementAge),
    totalAssets,
    totalLiabilities,
    totalMonthlyIncome,
    totalMonthlyExpense,
    totalMonthlyEmi,
    totalMonthlyInvestments,
    targetRetirementCorpus,
    assetClassDistribution: computeAssetClassDistribution(profile, totalAssets),
    metrics,
  };
}
