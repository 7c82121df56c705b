import { calculateMetrics } from '../../engine/metricsCalculator';
import { applyScores, scoreMetric } from '../../engine/scorer';
import { assignWeights, DEFAULT_METRIC_WEIGHTS } from '../../engine/weights';
import { DEFAULT_ANALYSIS_CONFIG, ScoringOptions } from '../../utils/config';
import { makeMetric } from '../fixtures/metrics';
import { debtFreeProfile } from '../fixtures/userProfiles';

const options: ScoringOptions = DEFAULT_ANALYSIS_CONFIG.scoring;
const decayOnly: ScoringOptions = { ...options, overPerformanceFactor: null };
const benchmark = { min: 1, max: 2 };

describe('scoreMetric', () => {
  it('should award the full weight inside the range, bounds included', () => {
    for (const value of [1, 1.5, 2]) {
      expect(scoreMetric(makeMetric('liquidity_ratio', value, benchmark), 10, options)).toBe(10);
    }
  });

  it('should award the over-performance share above the range', () => {
    expect(scoreMetric(makeMetric('liquidity_ratio', 3, benchmark), 10, options)).toBe(8.5);
  });

  it('should decay cubically with distance from the range', () => {
    // (0.1 + 0.9 × 0.5)³ × 10 = 1.66375
    expect(scoreMetric(makeMetric('liquidity_ratio', 0.5, benchmark), 10, options)).toBe(1.66);
    expect(scoreMetric(makeMetric('liquidity_ratio', 4, benchmark), 10, decayOnly)).toBe(1.66);
  });

  it('should floor at base³ × weight', () => {
    expect(scoreMetric(makeMetric('liquidity_ratio', 0, benchmark), 10, options)).toBe(0.01);
    expect(scoreMetric(makeMetric('net_worth_adequacy', -1, benchmark), 10, options)).toBe(0.01);
  });

  it('should score unscorable metrics as zero', () => {
    expect(scoreMetric(makeMetric('liquidity_ratio', null, benchmark), 10, options)).toBe(0);
    expect(scoreMetric(makeMetric('liquidity_ratio', 1.5, null), 10, options)).toBe(0);
    expect(scoreMetric(makeMetric('liquidity_ratio', 1.5, benchmark), 0, options)).toBe(0);
    expect(scoreMetric(makeMetric('liquidity_ratio', 1.5, benchmark), Number.NaN, options)).toBe(0);
    expect(scoreMetric(makeMetric('liquidity_ratio', 1.5, benchmark), Number.POSITIVE_INFINITY, options)).toBe(0);
  });

  it('should score a 40% savings rate below full weight', () => {
    const metric = makeMetric('savings_income_ratio', 0.4, { min: 0.2, max: 0.3 });
    const score = scoreMetric(metric, 12, options);
    expect(score).toBe(10.2);
    expect(score).toBeLessThan(12);
  });

  it('should stay within [0, weight]', () => {
    for (let value = -2; value <= 6; value += 0.25) {
      for (const opts of [options, decayOnly]) {
        const score = scoreMetric(makeMetric('liquidity_ratio', value, benchmark), 7, opts);
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(7);
      }
    }
  });
});

describe('applyScores', () => {
  it('should score each metric against its own weight', () => {
    const weighted = assignWeights(calculateMetrics(debtFreeProfile), DEFAULT_METRIC_WEIGHTS);
    const scored = applyScores(weighted, options);

    expect(scored.metrics.savings_income_ratio.assignedScore).toBe(10.2);
    expect(scored.metrics.investment_income_ratio.assignedScore).toBe(10);
    expect(scored.metrics.expense_income_ratio.assignedScore).toBe(5.29);
    expect(scored.metrics.asset_liability_ratio.assignedScore).toBe(0);
    expect(scored.metrics.net_worth_adequacy.assignedScore).toBe(1.93);
    expect(scored.metrics.retirement_adequacy.assignedScore).toBe(10);
  });
});
