import { resolveBenchmark } from '../../engine/benchmarkResolver';
import { INCOME_BRACKETS } from '../../models/Benchmark';
import { METRIC_NAMES } from '../../models/Metric';

describe('resolveBenchmark', () => {
  it('should return flat benchmarks for any segment', () => {
    expect(resolveBenchmark('emergency_fund_ratio', 1, 'IG1')).toEqual({ min: 6, max: 9 });
    expect(resolveBenchmark('emergency_fund_ratio', 3, 'IG7')).toEqual({ min: 6, max: 9 });
    expect(resolveBenchmark('debt_income_ratio', 2, 'IG4')).toEqual({ min: 0, max: 0.35 });
  });

  it('should look up tiered benchmarks by tier and bracket', () => {
    expect(resolveBenchmark('savings_income_ratio', 1, 'IG2')).toEqual({ min: 0.2, max: 0.3 });
    expect(resolveBenchmark('savings_income_ratio', 3, 'IG1')).toEqual({ min: 0.2, max: 0.3 });
    expect(resolveBenchmark('expense_income_ratio', 1, 'IG2')).toEqual({ min: 0.7, max: 0.8 });
    expect(resolveBenchmark('housing_income_ratio', 3, 'IG1')).toEqual({ min: 0, max: 0.3 });
  });

  it('should return null for unknown metrics', () => {
    expect(resolveBenchmark('unknown_ratio', 1, 'IG1')).toBeNull();
  });

  it('should have a benchmark for every metric in every segment', () => {
    for (const metric of METRIC_NAMES) {
      for (const tier of [1, 2, 3] as const) {
        for (const bracket of INCOME_BRACKETS) {
          const benchmark = resolveBenchmark(metric, tier, bracket);
          expect(benchmark).not.toBeNull();
          expect(benchmark?.min).toBeLessThanOrEqual(benchmark?.max ?? -1);
        }
      }
    }
  });
});
