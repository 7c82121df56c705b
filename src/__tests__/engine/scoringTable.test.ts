import { calculateMetrics } from '../../engine/metricsCalculator';
import { applyScores } from '../../engine/scorer';
import { buildScoringTable } from '../../engine/scoringTable';
import { applyVerdicts } from '../../engine/verdictClassifier';
import { DEFAULT_METRIC_WEIGHTS, assignWeights } from '../../engine/weights';
import { DEFAULT_ANALYSIS_CONFIG } from '../../utils/config';
import { debtFreeProfile } from '../fixtures/userProfiles';

describe('buildScoringTable', () => {
  const scored = applyScores(
    applyVerdicts(
      assignWeights(calculateMetrics(debtFreeProfile), DEFAULT_METRIC_WEIGHTS),
      DEFAULT_ANALYSIS_CONFIG.verdictThresholds
    ),
    DEFAULT_ANALYSIS_CONFIG.scoring
  );
  const table = buildScoringTable(scored);

  it('should have one row per metric plus a total', () => {
    expect(table).toHaveLength(13);
    expect(table[0]?.metric).toBe('Savings Income Ratio');
    expect(table[11]?.metric).toBe('Retirement Adequacy');
    expect(table[12]?.metric).toBe('Total');
  });

  it('should render a scored row', () => {
    expect(table[0]).toEqual({
      metric: 'Savings Income Ratio',
      weight: 12,
      benchmark: '0.2 - 0.3',
      userValue: 0.4,
      verdict: 'Extremely High',
      pointsAwarded: 10.2,
    });
  });

  it('should show ranges starting at zero as an upper limit', () => {
    const debtRow = table.find((row) => row.metric === 'Debt Income Ratio');
    expect(debtRow?.benchmark).toBe('< 0.35');
  });

  it('should show errored metrics with a null value and no points', () => {
    const row = table.find((r) => r.metric === 'Asset Liability Ratio');
    expect(row).toEqual({
      metric: 'Asset Liability Ratio',
      weight: 7,
      benchmark: '2 - 5',
      userValue: null,
      verdict: 'Error Computing Metric',
      pointsAwarded: 0,
    });
  });

  it('should total weights and points', () => {
    const total = table[12];
    expect(total?.weight).toBe(100);
    expect(total?.pointsAwarded).toBe(84.42);
  });
});
