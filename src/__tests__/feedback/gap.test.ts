import { calculateMetrics } from '../../engine/metricsCalculator';
import { GapContext, buildGapContext, computeGap } from '../../feedback/gap';
import { DEFAULT_ANALYSIS_CONFIG } from '../../utils/config';
import { makeMetric } from '../fixtures/metrics';
import { indebtedProfile } from '../fixtures/userProfiles';

describe('buildGapContext', () => {
  it('should collect the amounts gaps are measured in', () => {
    const pfm = calculateMetrics(indebtedProfile);
    const context = buildGapContext(indebtedProfile, pfm, DEFAULT_ANALYSIS_CONFIG);

    expect(context).toEqual({
      totalMonthlyIncome: 60000,
      monthlyOutflow: 56000,
      targetRetirementCorpus: pfm.targetRetirementCorpus,
      totalAssets: 384000,
      totalLiabilities: 1740000,
      medicalCover: 300000,
      termCover: 0,
      familySize: 3,
      monthsToRetirement: 120,
      medicalCoverFactor: 500000,
      termCoverFactor: 10,
      minGapAmount: 1000,
    });
  });
});

describe('computeGap', () => {
  const pfm = calculateMetrics(indebtedProfile);
  const context: GapContext = buildGapContext(indebtedProfile, pfm, DEFAULT_ANALYSIS_CONFIG);

  it('should measure income ratios in monthly income', () => {
    // 0.37 against an upper limit of 0.30 on ₹60,000
    expect(computeGap(pfm.metrics.housing_income_ratio, context)).toBeCloseTo(4200, 6);
  });

  it('should measure reserves in monthly outflow', () => {
    // 1 month of ₹56,000 against a 6-9 month target
    expect(computeGap(pfm.metrics.emergency_fund_ratio, context)).toBeCloseTo(280000, 6);
  });

  it('should spread the retirement shortfall over the remaining months', () => {
    const expected = ((1 - 0.08) * pfm.targetRetirementCorpus) / 120;
    expect(computeGap(pfm.metrics.retirement_adequacy, context)).toBeCloseTo(expected, 6);
  });

  it('should compare loans with the loans the assets can carry', () => {
    // 3,84,000 / 2 = 1,92,000 of loans would give the lower bound
    expect(computeGap(pfm.metrics.asset_liability_ratio, context)).toBe(1548000);
  });

  it('should measure insurance in cover', () => {
    expect(computeGap(pfm.metrics.health_insurance_adequacy, context)).toBe(1200000);
    expect(computeGap(pfm.metrics.term_insurance_adequacy, context)).toBe(7200000);
  });

  it('should fall back to the minimum for metrics without a rupee basis', () => {
    expect(computeGap(pfm.metrics.net_worth_adequacy, context)).toBe(1000);
  });

  it('should never return less than the minimum', () => {
    const nearlyThere = makeMetric('savings_income_ratio', 0.199, { min: 0.2, max: 0.3 });
    expect(computeGap(nearlyThere, context)).toBe(1000);
  });

  it('should return the minimum for null values or missing benchmarks', () => {
    expect(computeGap(makeMetric('liquidity_ratio', null, { min: 3, max: 4 }), context)).toBe(1000);
    expect(computeGap(makeMetric('liquidity_ratio', 1, null), context)).toBe(1000);
  });
});
