import {
  annualToMonthlyReturn,
  clamp,
  futureValue,
  futureValueOfAnnuity,
  futureValueOfAnnuityDue,
  presentValueOfAnnuity,
  roundTo,
} from '../../utils/math';

describe('annualToMonthlyReturn', () => {
  it('should convert 12% annual to 1% monthly', () => {
    expect(annualToMonthlyReturn(0.12)).toBeCloseTo(0.01, 5);
  });

  it('should convert 0% annual to 0% monthly', () => {
    expect(annualToMonthlyReturn(0)).toBe(0);
  });

  it('should convert negative annual return', () => {
    expect(annualToMonthlyReturn(-0.05)).toBeCloseTo(-0.05 / 12, 5);
  });
});

describe('futureValue', () => {
  it('should compound a lump sum', () => {
    expect(futureValue(100000, 0.1, 2)).toBeCloseTo(121000, 6);
  });

  it('should return the principal for zero periods', () => {
    expect(futureValue(100000, 0.1, 0)).toBe(100000);
  });
});

describe('futureValueOfAnnuity', () => {
  it('should accumulate end-of-period payments', () => {
    // 1000 × ((1.01)^12 - 1) / 0.01
    expect(futureValueOfAnnuity(1000, 0.01, 12)).toBeCloseTo(12682.503, 3);
  });

  it('should sum payments at zero rate', () => {
    expect(futureValueOfAnnuity(1000, 0, 12)).toBe(12000);
  });
});

describe('futureValueOfAnnuityDue', () => {
  it('should earn one extra period on every payment', () => {
    expect(futureValueOfAnnuityDue(1000, 0.01, 12)).toBeCloseTo(12682.503 * 1.01, 2);
  });

  it('should sum payments at zero rate', () => {
    expect(futureValueOfAnnuityDue(500, 0, 10)).toBe(5000);
  });
});

describe('presentValueOfAnnuity', () => {
  it('should discount a stream of payouts', () => {
    // 1000 × (1 - 1.01^-12) / 0.01
    expect(presentValueOfAnnuity(1000, 0.01, 12)).toBeCloseTo(11255.077, 3);
  });

  it('should sum payouts at zero rate', () => {
    expect(presentValueOfAnnuity(1000, 0, 12)).toBe(12000);
  });
});

describe('roundTo', () => {
  it('should round to the requested decimals', () => {
    expect(roundTo(0.4567, 2)).toBe(0.46);
    expect(roundTo(3.3333, 1)).toBe(3.3);
    expect(roundTo(37926648.85, 0)).toBe(37926649);
  });

  it('should round negatives towards positive infinity at the midpoint', () => {
    expect(roundTo(-0.125, 2)).toBe(-0.12);
  });
});

describe('clamp', () => {
  it('should bound values', () => {
    expect(clamp(-1, 0, 1)).toBe(0);
    expect(clamp(0.5, 0, 1)).toBe(0.5);
    expect(clamp(2, 0, 1)).toBe(1);
  });
});
