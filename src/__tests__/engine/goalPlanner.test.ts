import { classifyGoals } from '../../engine/goalClassifier';
import { calculateRetirementContribution, planGoals } from '../../engine/goalPlanner';
import { calculateFinancialMetrics } from '../../engine/metrics';
import { baseProfile } from '../fixtures/profiles';

const baseMetrics = calculateFinancialMetrics(baseProfile);

describe('calculateRetirementContribution', () => {
  it('should spread the corpus over monthly contributions', () => {
    // 80,000 x 0.7 x 12 x 25 = 16,800,000 over 360 months at 1% a month
    expect(calculateRetirementContribution(80000, 30, 12)).toBe(4807);
  });

  it('should divide evenly when there is no return', () => {
    expect(calculateRetirementContribution(10000, 10, 0)).toBe(17500);
  });
});

describe('planGoals', () => {
  it('should plan retirement, education and home goals in priority order', () => {
    const plans = planGoals({
      goals: classifyGoals(['Buy a house', 'Retirement savings', 'Pay for university']),
      metrics: baseMetrics,
      age: 30,
      expectedAnnualReturnPct: 12,
    });

    expect(plans).toEqual([
      {
        category: 'retirement',
        goal: 'Retirement Planning',
        rawText: 'Retirement savings',
        timelineYears: 30,
        monthlyInvestment: 4807,
        strategy: 'Balanced growth portfolio with a gradual shift to conservative assets',
      },
      {
        category: 'education',
        goal: 'Education Fund',
        rawText: 'Pay for university',
        timelineYears: 2,
        monthlyInvestment: 7500,
        strategy: 'Moderate growth with education-focused funds',
      },
      {
        category: 'home',
        goal: 'Home Purchase',
        rawText: 'Buy a house',
        timelineYears: 5,
        monthlyInvestment: 9000,
        strategy: 'Conservative growth with liquid funds',
      },
    ]);
  });

  it('should shorten timelines for older investors', () => {
    const plans = planGoals({
      goals: classifyGoals(['Retirement savings', 'Buy a house']),
      metrics: baseMetrics,
      age: 58,
      expectedAnnualReturnPct: 12,
    });

    expect(plans.map((plan) => [plan.category, plan.timelineYears])).toEqual([
      ['retirement', 5],
      ['home', 3],
    ]);
  });

  it("should give a child's education a longer timeline", () => {
    const plans = planGoals({
      goals: classifyGoals(["Fund my child's college education"]),
      metrics: baseMetrics,
      age: 30,
      expectedAnnualReturnPct: 12,
    });

    expect(plans).toHaveLength(1);
    expect(plans[0].timelineYears).toBe(10);
  });

  it('should plan each category once', () => {
    const plans = planGoals({
      goals: classifyGoals(['Retire early', 'Pension top-up']),
      metrics: baseMetrics,
      age: 30,
      expectedAnnualReturnPct: 12,
    });

    expect(plans).toHaveLength(1);
    expect(plans[0].rawText).toBe('Pension top-up');
  });

  it('should skip categories without a plan', () => {
    const plans = planGoals({
      goals: classifyGoals(['Buy a car', 'Plan a trip']),
      metrics: baseMetrics,
      age: 30,
      expectedAnnualReturnPct: 12,
    });

    expect(plans).toEqual([]);
  });
});
