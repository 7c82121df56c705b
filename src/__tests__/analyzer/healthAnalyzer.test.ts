import { DEFAULT_GLOSSARY, analyseFinancialHealth } from '../../analyzer/healthAnalyzer';
import { DEFAULT_ANALYSIS_CONFIG } from '../../utils/config';
import { InvalidConfigurationError, MissingProfileError } from '../../utils/errors';
import { createSeededRandom } from '../../utils/random';
import { parseAnalysisRequest } from '../../utils/validation';
import { debtFreeProfile } from '../fixtures/userProfiles';

describe('analyseFinancialHealth', () => {
  const random = () => createSeededRandom(42);

  it('should score the debt-free profile with default weights', () => {
    const report = analyseFinancialHealth(debtFreeProfile, { random: random() });

    expect(report.totalScore).toBe(84.42);
    expect(report.metrics.metrics.savings_income_ratio.weight).toBe(12);
    expect(report.metrics.metrics.savings_income_ratio.verdict).toBe('extremely_high');
    expect(report.glossary).toBe(DEFAULT_GLOSSARY);
  });

  it('should normalize caller weights to 100', () => {
    const report = analyseFinancialHealth(debtFreeProfile, {
      random: random(),
      weights: { 'emergency fund ratio': 1, 'retirement-adequacy': 1, 'Not A Metric': 5 },
    });

    expect(report.metrics.metrics.emergency_fund_ratio.weight).toBe(50);
    expect(report.metrics.metrics.retirement_adequacy.weight).toBe(50);
    expect(report.metrics.metrics.savings_income_ratio.weight).toBe(0);
    expect(report.totalScore).toBe(100);
  });

  it('should keep scores finite for very large request weights', () => {
    const request = parseAnalysisRequest({
      userProfile: debtFreeProfile,
      weights: { savings_income_ratio: 1e308, liquidity_ratio: 1e308 },
    });
    const report = analyseFinancialHealth(request.userProfile, { random: random(), weights: request.weights });

    expect(report.metrics.metrics.savings_income_ratio.weight).toBe(50);
    expect(report.metrics.metrics.liquidity_ratio.weight).toBe(50);
    expect(report.metrics.metrics.savings_income_ratio.assignedScore).toBe(42.5);
    expect(report.totalScore).toBe(92.5);
  });

  it('should use a caller glossary', () => {
    const glossary = { Term: 'Meaning' };
    const report = analyseFinancialHealth(debtFreeProfile, { random: random(), glossary });

    expect(report.glossary).toEqual({ Term: 'Meaning' });
  });

  it('should leave out the debt-free point when configured', () => {
    const report = analyseFinancialHealth(debtFreeProfile, {
      random: random(),
      config: { ...DEFAULT_ANALYSIS_CONFIG, includeDebtFreeCommendation: false },
    });

    expect(report.commendableAreas.map((point) => point.metricName)).not.toContain('debt_free');
  });

  it('should reject a missing profile', () => {
    expect(() => analyseFinancialHealth(null)).toThrow(MissingProfileError);
  });

  it('should reject an invalid configuration', () => {
    const config = {
      ...DEFAULT_ANALYSIS_CONFIG,
      scoring: { baseValue: 1.5, overPerformanceFactor: 0.85 },
    };
    expect(() => analyseFinancialHealth(debtFreeProfile, { config })).toThrow(InvalidConfigurationError);
  });
});
