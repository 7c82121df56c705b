import { analyseFinancialHealth } from '../../analyzer/healthAnalyzer';
import { listMetrics } from '../../models/Metric';
import { createSeededRandom } from '../../utils/random';
import { parseAnalysisRequest } from '../../utils/validation';
import { debtFreeProfile, indebtedProfile } from '../fixtures/userProfiles';

describe('Full analysis workflow', () => {
  it('should turn a raw request into a complete report', () => {
    const request = parseAnalysisRequest(JSON.parse(JSON.stringify({ userProfile: debtFreeProfile, seed: 3 })));
    const report = analyseFinancialHealth(request.userProfile, {
      weights: request.weights,
      random: createSeededRandom(request.seed ?? 0),
    });

    expect(report.totalScore).toBe(84.42);
    expect(report.scoringTable).toHaveLength(13);
    expect(report.scoringTable[12]).toEqual({
      metric: 'Total',
      weight: 100,
      benchmark: '',
      userValue: null,
      verdict: '',
      pointsAwarded: 84.42,
    });
    expect(Object.keys(report.glossary).length).toBeGreaterThan(0);
    expect(report.profileReview).toBeUndefined();
    expect(report.summary).toBeUndefined();
  });

  it('should give every metric a verdict and keep scores within weights', () => {
    const report = analyseFinancialHealth(indebtedProfile, { random: createSeededRandom(1) });

    for (const metric of listMetrics(report.metrics)) {
      expect(metric.verdict).not.toBeNull();
      expect(metric.assignedScore).toBeGreaterThanOrEqual(0);
      expect(metric.assignedScore).toBeLessThanOrEqual(metric.weight);
    }
    const weightSum = listMetrics(report.metrics).reduce((sum, metric) => sum + metric.weight, 0);
    expect(weightSum).toBe(100);
  });

  it('should rank the indebted profile below the debt-free one', () => {
    const strong = analyseFinancialHealth(debtFreeProfile, { random: createSeededRandom(1) });
    const weak = analyseFinancialHealth(indebtedProfile, { random: createSeededRandom(1) });

    expect(weak.totalScore).toBeLessThan(strong.totalScore);
    expect(weak.areasForImprovement.length).toBeGreaterThan(strong.areasForImprovement.length);
  });

  it('should produce identical reports for the same seed', () => {
    const first = analyseFinancialHealth(indebtedProfile, { random: createSeededRandom(99) });
    const second = analyseFinancialHealth(indebtedProfile, { random: createSeededRandom(99) });

    expect(second).toEqual(first);
  });

  it('should survive a JSON round trip', () => {
    const report = analyseFinancialHealth(debtFreeProfile, { random: createSeededRandom(5) });
    const copy = JSON.parse(JSON.stringify(report));

    expect(copy.metrics.metrics.asset_liability_ratio.value).toBeNull();
    expect(copy.totalScore).toBe(report.totalScore);
  });
});
