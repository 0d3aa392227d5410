import {
  annualToMonthlyReturn,
  clamp,
  futureValueOfAnnuity,
  inflationAdjusted,
  roundTo,
  sum,
} from '../../utils/math';

describe('annualToMonthlyReturn', () => {
  it('should convert 12% annual to 1% monthly', () => {
    expect(annualToMonthlyReturn(0.12)).toBeCloseTo(0.01, 5);
  });

  it('should convert 0% annual to 0% monthly', () => {
    expect(annualToMonthlyReturn(0)).toBe(0);
  });
});

describe('futureValueOfAnnuity', () => {
  it('should compound monthly payments', () => {
    // 1000 * ((1.01^12 - 1) / 0.01)
    expect(futureValueOfAnnuity(1000, 0.01, 12)).toBeCloseTo(12682.5, 1);
  });

  it('should equal total contributions at 0% return', () => {
    expect(futureValueOfAnnuity(1000, 0, 24)).toBe(24000);
  });

  it('should be 0 without periods', () => {
    expect(futureValueOfAnnuity(1000, 0.01, 0)).toBe(0);
  });
});

describe('inflationAdjusted', () => {
  it('should discount by compounded inflation', () => {
    expect(inflationAdjusted(112360, 0.06, 2)).toBeCloseTo(100000, 6);
  });

  it('should leave the value unchanged over 0 years', () => {
    expect(inflationAdjusted(5000, 0.06, 0)).toBe(5000);
  });
});

describe('clamp', () => {
  it('should keep values inside the range', () => {
    expect(clamp(5, 0, 10)).toBe(5);
    expect(clamp(-3, 0, 10)).toBe(0);
    expect(clamp(12, 0, 10)).toBe(10);
  });
});

describe('roundTo', () => {
  it('should round to the given decimals', () => {
    expect(roundTo(33.3333, 1)).toBe(33.3);
    expect(roundTo(0.37512, 4)).toBe(0.3751);
    expect(roundTo(8.5, 0)).toBe(9);
  });
});

describe('sum', () => {
  it('should add values', () => {
    expect(sum([1, 2, 3.5])).toBe(6.5);
    expect(sum([])).toBe(0);
  });
});
