import { classifyGoals } from '../../engine/goalClassifier';
import { calculateFinancialMetrics } from '../../engine/metrics';
import {
  buildPortfolio,
  buildProjection,
  calculateExpectedReturn,
  deriveSubAllocations,
  describeAdjustment,
  synthesizeNextSteps,
  synthesizeRationale,
} from '../../engine/portfolioBuilder';
import { AllocationCandidate } from '../../models/AssetClass';
import { RISK_TOLERANCES } from '../../models/UserProfile';
import { baseProfile, highDebtProfile } from '../fixtures/profiles';

const balanced: AllocationCandidate = {
  equities: 50,
  bonds: 30,
  realEstate: 10,
  cashEquivalents: 5,
  alternatives: 5,
};

const baseMetrics = calculateFinancialMetrics(baseProfile);
const baseGoals = classifyGoals(baseProfile.goals);

describe('calculateExpectedReturn', () => {
  it('should weight historical returns by allocation', () => {
    expect(calculateExpectedReturn(balanced)).toBeCloseTo(8.825, 1);
  });

  it('should equal the class return for a single-class portfolio', () => {
    expect(calculateExpectedReturn({ ...balanced, equities: 0, bonds: 100, realEstate: 0, cashEquivalents: 0, alternatives: 0 })).toBe(6.5);
    expect(calculateExpectedReturn({ equities: 100, bonds: 0, realEstate: 0, cashEquivalents: 0, alternatives: 0 })).toBe(11);
  });
});

describe('deriveSubAllocations', () => {
  it('should split equities and bonds for a moderate tier', () => {
    expect(deriveSubAllocations(balanced, 'moderate')).toEqual({
      equityStyle: { largeCap: 30, midCap: 12.5, smallCap: 7.5 },
      equityGeography: { domestic: 37.5, international: 12.5 },
      bonds: { government: 18, corporate: 12 },
    });
  });

  it('should add each group back up to its parent weight', () => {
    const allocation: AllocationCandidate = { equities: 33.4, bonds: 41.7, realEstate: 10, cashEquivalents: 9.9, alternatives: 5 };

    for (const tolerance of RISK_TOLERANCES) {
      const sub = deriveSubAllocations(allocation, tolerance);
      expect(sub.equityStyle.largeCap + sub.equityStyle.midCap + sub.equityStyle.smallCap).toBeCloseTo(33.4, 6);
      expect(sub.equityGeography.domestic + sub.equityGeography.international).toBeCloseTo(33.4, 6);
      expect(sub.bonds.government + sub.bonds.corporate).toBeCloseTo(41.7, 6);
    }
  });

  it('should tilt aggressive portfolios toward small caps', () => {
    const conservative = deriveSubAllocations(balanced, 'conservative');
    const aggressive = deriveSubAllocations(balanced, 'aggressive');

    expect(aggressive.equityStyle.smallCap).toBeGreaterThan(conservative.equityStyle.smallCap);
  });
});

describe('buildProjection', () => {
  it('should compound monthly contributions and discount for inflation', () => {
    expect(buildProjection(10000, 12, 1)).toEqual({
      horizonYears: 1,
      monthlyContribution: 10000,
      totalContributed: 120000,
      nominalValue: 126825,
      inflationAdjustedValue: 119646,
    });
  });

  it('should project nothing without capacity', () => {
    expect(buildProjection(0, 8, 10)).toEqual({
      horizonYears: 10,
      monthlyContribution: 0,
      totalContributed: 0,
      nominalValue: 0,
      inflationAdjustedValue: 0,
    });
  });
});

describe('synthesizeNextSteps', () => {
  it('should focus on investing and the top goal for a healthy profile', () => {
    expect(synthesizeNextSteps(baseMetrics, baseGoals)).toEqual([
      'Invest ₹30,000 each month according to this allocation.',
      'Direct new savings to your highest-priority goal first: "Retirement savings".',
      'Review and rebalance the portfolio once a year.',
    ]);
  });

  it('should address the emergency fund and debt first when they are short', () => {
    const metrics = calculateFinancialMetrics(highDebtProfile);

    expect(synthesizeNextSteps(metrics, classifyGoals(highDebtProfile.goals))).toEqual([
      'Build an emergency fund of ₹1,50,000 (6 months of expenses) before adding to riskier assets.',
      'Bring debt payments below 43% of income, paying off high-interest loans first.',
      'Free up monthly cash flow before starting regular investments; expenses and debt payments use all income.',
      'Direct new savings to your highest-priority goal first: "Pay off home loan".',
      'Review and rebalance the portfolio once a year.',
    ]);
  });

  it('should skip the goal step when no goal was recognised', () => {
    const steps = synthesizeNextSteps(baseMetrics, classifyGoals(['Learn the guitar']));

    expect(steps).toEqual([
      'Invest ₹30,000 each month according to this allocation.',
      'Review and rebalance the portfolio once a year.',
    ]);
  });
});

describe('synthesizeRationale', () => {
  it('should describe the risk profile and the weights', () => {
    const rationale = synthesizeRationale(balanced, baseMetrics, 15);

    expect(rationale).toContain(
      'Moderate allocation for a risk score of 57.5 (medium risk band) over 15 years (long horizon).'
    );
    expect(rationale).toContain(
      'Portfolio: equities 50.0%, bonds 30.0%, real estate 10.0%, cash equivalents 5.0%, alternatives 5.0%.'
    );
    expect(rationale).not.toContain('fixed rules');
  });

  it('should explain why fixed rules were used', () => {
    const rationale = synthesizeRationale(balanced, baseMetrics, 15, 'timeout');

    expect(rationale).toMatch(/because the AI recommendation was not usable \(timeout\)\.$/);
  });
});

describe('describeAdjustment', () => {
  it('should list the proposed weights and the tier that bounded them', () => {
    expect(describeAdjustment({ ...balanced, equities: 85, bonds: 0 }, 'moderate')).toBe(
      'The proposed weights (equities 85.0%, bonds 0.0%, real estate 10.0%, cash equivalents 5.0%, ' +
        'alternatives 5.0%) were adjusted to fit the moderate risk-tier limits.'
    );
  });
});

describe('buildPortfolio', () => {
  const portfolio = buildPortfolio({
    allocation: balanced,
    provenance: 'fallback-rule-based',
    riskTolerance: 'moderate',
    horizonYears: 15,
    age: 30,
    metrics: baseMetrics,
    goals: baseGoals,
    rationale: 'Rule-based allocation.',
    nextSteps: ['Review once a year.'],
    generatedAt: new Date('2026-01-15T10:00:00.000Z'),
  });

  it('should assemble the portfolio fields', () => {
    expect(portfolio.allocation).toEqual(balanced);
    expect(portfolio.provenance).toBe('fallback-rule-based');
    expect(portfolio.riskLevel).toBe('Moderate');
    expect(portfolio.rationale).toBe('Rule-based allocation.');
    expect(portfolio.nextSteps).toEqual(['Review once a year.']);
    expect(portfolio.goals).toEqual(baseGoals);
    expect(portfolio.generatedAt).toBe('2026-01-15T10:00:00.000Z');
    expect(portfolio.expectedAnnualReturnPct).toBeCloseTo(8.825, 1);
    expect(portfolio.projection.monthlyContribution).toBe(30000);
    expect(portfolio.projection.totalContributed).toBe(5400000);
  });

  it('should plan the retirement goal at the expected return', () => {
    expect(portfolio.goalPlans).toHaveLength(1);
    expect(portfolio.goalPlans[0]).toMatchObject({
      category: 'retirement',
      rawText: 'Retirement savings',
      timelineYears: 30,
    });
    expect(portfolio.goalPlans[0].monthlyInvestment).toBeGreaterThan(0);
  });

  it('should be deeply immutable', () => {
    expect(Object.isFrozen(portfolio)).toBe(true);
    expect(Object.isFrozen(portfolio.allocation)).toBe(true);
    expect(Object.isFrozen(portfolio.subAllocations.equityStyle)).toBe(true);
    expect(Object.isFrozen(portfolio.nextSteps)).toBe(true);
    expect(Object.isFrozen(portfolio.goals[0])).toBe(true);
    expect(Object.isFrozen(portfolio.goalPlans[0])).toBe(true);
  });

  it('should not share state with its inputs', () => {
    const input = { ...balanced };
    const built = buildPortfolio({
      allocation: input,
      provenance: 'ai-generated',
      riskTolerance: 'moderate',
      horizonYears: 15,
      age: 30,
      metrics: baseMetrics,
      goals: baseGoals,
      rationale: 'AI allocation.',
      nextSteps: [],
    });
    input.equities = 0;

    expect(built.allocation.equities).toBe(50);
    expect(Object.isFrozen(baseGoals[0])).toBe(false);
  });
});
