import { z } from "zod";
import { UserProfile } from "../models/UserProfile";
import { RequestValidationError } from "./errors";

/**
 * Zod validation schemas for input data validation.
 * These schemas ensure data integrity for financial health calculations.
 * All amounts are whole rupees and must be non-negative.
 */

const amount = z.number().int().min(0);

/**
 * Schema for personal details. Retirement age is cross-checked against age.
 */
export const PersonalDataSchema = z
  .object({
    age: z.number().int().min(18).max(100),
    gender: z.enum(["Male", "Female"]),
    city: z.string().min(1),
    riskProfile: z.enum(["Conservative", "Moderate", "Aggressive"]),
    expectedRetirementAge: z.number().int().min(19).max(100),
    maritalStatus: z.enum(["Married", "Unmarried"]),
    noOfDependents: z.number().int().min(0),
  })
  .refine((data) => data.expectedRetirementAge > data.age, {
    message: "expectedRetirementAge must be greater than age",
    path: ["expectedRetirementAge"],
  });

/**
 * Schema for monthly income streams.
 */
export const IncomeDataSchema = z.object({
  salariedIncome: amount,
  businessIncome: amount,
  freelanceIncome: amount,
  rentalIncome: amount,
  otherSources: amount,
});

/**
 * Schema for monthly expenses, including insurance premiums.
 */
export const ExpenseDataSchema = z.object({
  housingCost: amount,
  utilitiesAndBills: amount,
  groceriesAndEssentials: amount,
  discretionaryExpense: amount,
  medicalInsurancePremium: amount,
  termInsurancePremium: amount,
});

/**
 * Schema for SIPs (monthly) and asset holdings (totals).
 */
export const AssetDataSchema = z.object({
  equitySip: amount,
  debtSip: amount,
  retirementSip: amount,
  totalSavingsBalance: amount,
  totalEmergencyFund: amount,
  totalEquityInvestments: amount,
  totalDebtInvestments: amount,
  totalRetirementInvestments: amount,
  totalRealEstateInvestments: amount,
});

/**
 * Schema for loan EMIs (monthly) and outstanding balances.
 */
export const LiabilityDataSchema = z.object({
  creditCardEmi: amount,
  personalLoanEmi: amount,
  carLoanEmi: amount,
  studentLoanEmi: amount,
  homeLoanEmi: amount,
  outstandingCreditCardBalance: amount,
  outstandingPersonalLoanBalance: amount,
  outstandingCarLoanBalance: amount,
  outstandingStudentLoanBalance: amount,
  outstandingHomeLoanBalance: amount,
});

export const InsuranceDataSchema = z.object({
  totalMedicalCover: amount,
  totalTermCover: amount,
});

/**
 * Schema for the complete user profile.
 */
export const UserProfileSchema = z.object({
  personal: PersonalDataSchema,
  income: IncomeDataSchema,
  expense: ExpenseDataSchema,
  asset: AssetDataSchema,
  liability: LiabilityDataSchema,
  insurance: InsuranceDataSchema,
});

/**
 * Schema for caller-supplied metric weights. Keys are loose metric labels
 * ("Savings-Income Ratio" or "savings_income_ratio"); values are normalized later.
 */
export const WeightsSchema = z.record(z.string(), z.number().finite());

/**
 * Schema for the analysis request body.
 */
export const AnalysisRequestSchema = z.object({
  userProfile: UserProfileSchema,
  weights: WeightsSchema.optional(),
  seed: z.number().int().optional(),
});

export type AnalysisRequest = z.infer<typeof AnalysisRequestSchema>;

/**
 * Flattens zod issues into "path: message" strings
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validates an unknown value as a UserProfile
 * @throws RequestValidationError listing every issue
 */
export function parseUserProfile(input: unknown): UserProfile {
  const result = UserProfileSchema.safeParse(input);
  if (!result.success) {
    throw new RequestValidationError(describeIssues(result.error));
  }
  return result.data;
}

export function parseAnalysisRequest(input: unknown): AnalysisRequest {
  const result = AnalysisRequestSchema.safeParse(input);
  if (!result.success) {
    throw new RequestValidationError(describeIssues(result.error));
  }
  return result.data;
}
