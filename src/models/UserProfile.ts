/**
 * User profile data structures.
 * All currency amounts are in INR; flows are monthly, balances and covers are totals.
 */

export type Gender = "Male" | "Female";
export type RiskProfile = "Conservative" | "Moderate" | "Aggressive";
export type MaritalStatus = "Married" | "Unmarried";

export interface PersonalData {
  age: number;
  gender: Gender;
  city: string;
  riskProfile: RiskProfile;
  expectedRetirementAge: number;
  maritalStatus: MaritalStatus;
  noOfDependents: number;
}

export interface IncomeData {
  salariedIncome: number;
  businessIncome: number;
  freelanceIncome: number;
  rentalIncome: number;
  otherSources: number;
}

export interface ExpenseData {
  housingCost: number;
  utilitiesAndBills: number;
  groceriesAndEssentials: number;
  discretionaryExpense: number;
  medicalInsurancePremium: number;
  termInsurancePremium: number;
}

export interface AssetData {
  equitySip: number;
  debtSip: number;
  retirementSip: number;
  totalSavingsBalance: number;
  totalEmergencyFund: number;
  totalEquityInvestments: number;
  totalDebtInvestments: number;
  totalRetirementInvestments: number;
  totalRealEstateInvestments: number;
}

export interface LiabilityData {
  creditCardEmi: number;
  personalLoanEmi: number;
  carLoanEmi: number;
  studentLoanEmi: number;
  homeLoanEmi: number;
  outstandingCreditCardBalance: number;
  outstandingPersonalLoanBalance: number;
  outstandingCarLoanBalance: number;
  outstandingStudentLoanBalance: number;
  outstandingHomeLoanBalance: number;
}

export interface InsuranceData {
  totalMedicalCover: number;
  totalTermCover: number;
}

export interface UserProfile {
  personal: PersonalData;
  income: IncomeData;
  expense: ExpenseData;
  asset: AssetData;
  liability: LiabilityData;
  insurance: InsuranceData;
}

/**
 * Sum of all monthly income streams
 */
export function getTotalMonthlyIncome(profile: UserProfile): number {
  const { income } = profile;
  return (
    income.salariedIncome +
    income.businessIncome +
    income.freelanceIncome +
    income.rentalIncome +
    income.otherSources
  );
}

/**
 * Sum of monthly living expenses, including insurance premiums but excluding EMIs
 */
export function getTotalMonthlyExpense(profile: UserProfile): number {
  const { expense } = profile;
  return (
    expense.housingCost +
    expense.utilitiesAndBills +
    expense.groceriesAndEssentials +
    expense.discretionaryExpense +
    expense.medicalInsurancePremium +
    expense.termInsurancePremium
  );
}

export function getTotalMonthlyEmi(profile: UserProfile): number {
  const { liability } = profile;
  return (
    liability.creditCardEmi +
    liability.personalLoanEmi +
    liability.carLoanEmi +
    liability.studentLoanEmi +
    liability.homeLoanEmi
  );
}

export function getTotalMonthlyInvestments(profile: UserProfile): number {
  const { asset } = profile;
  return asset.equitySip + asset.debtSip + asset.retirementSip;
}

/**
 * Sum of all asset holdings (savings, emergency fund and invested corpus)
 */
export function getTotalAssets(profile: UserProfile): number {
  const { asset } = profile;
  return (
    asset.totalSavingsBalance +
    asset.totalEmergencyFund +
    asset.totalEquityInvestments +
    asset.totalDebtInvestments +
    asset.totalRetirementInvestments +
    asset.totalRealEstateInvestments
  );
}

export function getTotalLiabilities(profile: UserProfile): number {
  const { liability } = profile;
  return (
    liability.outstandingCreditCardBalance +
    liability.outstandingPersonalLoanBalance +
    liability.outstandingCarLoanBalance +
    liability.outstandingStudentLoanBalance +
    liability.outstandingHomeLoanBalance
  );
}

/**
 * True when every outstanding loan balance is zero
 */
export function isDebtFree(profile: UserProfile): boolean {
  const { liability } = profile;
  return [
    liability.outstandingCreditCardBalance,
    liability.outstandingPersonalLoanBalance,
    liability.outstandingCarLoanBalance,
    liability.outstandingStudentLoanBalance,
    liability.outstandingHomeLoanBalance,
  ].every((balance) => balance === 0);
}

export function getFamilySize(profile: UserProfile): number {
  return profile.personal.noOfDependents + 1;
}
