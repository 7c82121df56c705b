import { UserProfile, getTotalMonthlyEmi, getTotalMonthlyExpense } from "../models/UserProfile";
import { RetirementAssumptions } from "../utils/config";
import { REAL_RETURN_EPSILON } from "../utils/constants";
import { InvalidConfigurationError } from "../utils/errors";
import {
  annualToMonthlyReturn,
  futureValue,
  futureValueOfAnnuityDue,
  presentValueOfAnnuity,
} from "../utils/math";
import { yearsToMonths, yearsToRetirement } from "../utils/time";

function validateHorizon(age: number, retirementAge: number, assumptions: RetirementAssumptions): void {
  const problems: string[] = [];
  if (!(age < retirementAge)) {
    problems.push(`Retirement age (${retirementAge}) must be greater than present age (${age})`);
  }
  if (!(retirementAge < assumptions.lifeExpectancy)) {
    problems.push(
      `Life expectancy (${assumptions.lifeExpectancy}) must be greater than retirement age (${retirementAge})`
    );
  }
  if (assumptions.expenseReductionPct < 0 || assumptions.expenseReductionPct > 50) {
    problems.push(`Expense reduction (${assumptions.expenseReductionPct}%) must be between 0% and 50%`);
  }
  if (problems.length > 0) {
    throw new InvalidConfigurationError(problems);
  }
}

/**
 * Corpus needed at retirement to fund monthly outflows until life expectancy.
 *
 * Today's outflow (expenses + EMIs) is inflated to the retirement year, reduced by
 * the expected expense reduction, and discounted as a monthly annuity at the real
 * (inflation-adjusted) return of the corpus.
 *
 * @returns Corpus in rupees, rounded to the nearest rupee
 * @throws InvalidConfigurationError when the age horizon or expense reduction is invalid
 */
export function computeTargetRetirementCorpus(
  profile: UserProfile,
  assumptions: RetirementAssumptions
): number {
  const { age, expectedRetirementAge } = profile.personal;
  validateHorizon(age, expectedRetirementAge, assumptions);

  const { annualInflationRate, corpusGrowthRate, lifeExpectancy, expenseReductionPct } = assumptions;
  const monthlyOutflow = getTotalMonthlyExpense(profile) + getTotalMonthlyEmi(profile);
  const years = yearsToRetirement(age, expectedRetirementAge);

  const payoutAtRetirement =
    futureValue(monthlyOutflow, annualInflationRate, years) * (1 - expenseReductionPct / 100);
  const payoutMonths = yearsToMonths(lifeExpectancy - expectedRetirementAge);

  const realReturn = (1 + corpusGrowthRate) / (1 + annualInflationRate) - 1;
  const corpus =
    Math.abs(realReturn) < REAL_RETURN_EPSILON
      ? payoutAtRetirement * payoutMonths
      : presentValueOfAnnuity(payoutAtRetirement, annualToMonthlyReturn(realReturn), payoutMonths);

  return Math.round(corpus);
}

/**
 * Retirement corpus the profile is on course to build: the current retirement
 * holdings compounded to retirement plus the retirement SIP as a monthly annuity due,
 * scaled by cumulative inflation over the same horizon.
 */
export function computeRetirementCorpusFutureValue(
  profile: UserProfile,
  assumptions: RetirementAssumptions
): number {
  const { age, expectedRetirementAge } = profile.personal;
  const years = Math.max(0, yearsToRetirement(age, expectedRetirementAge));
  const { corpusGrowthRate, annualInflationRate } = assumptions;

  const lumpsum = futureValue(profile.asset.totalRetirementInvestments, corpusGrowthRate, years);
  const sip = futureValueOfAnnuityDue(
    profile.asset.retirementSip,
    annualToMonthlyReturn(corpusGrowthRate),
    yearsToMonths(years)
  );

  return futureValue(lumpsum + sip, annualInflationRate, years);
}
