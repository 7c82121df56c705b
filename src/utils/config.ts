import dotenv from "dotenv";
import {
  ANNUAL_INFLATION_RATE,
  AVG_LIFE_EXPECTANCY,
  MEDICAL_COVER_FACTOR,
  MIN_GAP_AMOUNT,
  OVER_PERFORMANCE_FACTOR,
  RETIREMENT_CORPUS_GROWTH_RATE,
  RETIREMENT_EXPENSE_REDUCTION_PCT,
  SCORING_BASE_VALUE,
  TERM_COVER_FACTOR,
  VERDICT_EXTREME_HIGH_FACTOR,
  VERDICT_EXTREME_LOW_FACTOR,
  VERDICT_HIGH_FACTOR,
  VERDICT_LOW_FACTOR,
} from "./constants";
import { InvalidConfigurationError } from "./errors";

dotenv.config();

export interface RetirementAssumptions {
  annualInflationRate: number;
  corpusGrowthRate: number;
  lifeExpectancy: number;
  /** Percent, 0–50 */
  expenseReductionPct: number;
}

/**
 * Multipliers on the benchmark bounds that separate the verdict bands.
 * low/high bound the "good" bands, extremeLow/extremeHigh the "low"/"high" ones.
 */
export interface VerdictThresholds {
  low: number;
  high: number;
  extremeLow: number;
  extremeHigh: number;
}

export interface ScoringOptions {
  baseValue: number;
  /** Null continues the decay curve above the ideal range instead of a flat award */
  overPerformanceFactor: number | null;
}

export interface AnalysisConfig {
  retirement: RetirementAssumptions;
  medicalCoverFactor: number;
  termCoverFactor: number;
  scoring: ScoringOptions;
  verdictThresholds: VerdictThresholds;
  minGapAmount: number;
  includeDebtFreeCommendation: boolean;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  retirement: {
    annualInflationRate: ANNUAL_INFLATION_RATE,
    corpusGrowthRate: RETIREMENT_CORPUS_GROWTH_RATE,
    lifeExpectancy: AVG_LIFE_EXPECTANCY,
    expenseReductionPct: RETIREMENT_EXPENSE_REDUCTION_PCT,
  },
  medicalCoverFactor: MEDICAL_COVER_FACTOR,
  termCoverFactor: TERM_COVER_FACTOR,
  scoring: {
    baseValue: SCORING_BASE_VALUE,
    overPerformanceFactor: OVER_PERFORMANCE_FACTOR,
  },
  verdictThresholds: {
    low: VERDICT_LOW_FACTOR,
    high: VERDICT_HIGH_FACTOR,
    extremeLow: VERDICT_EXTREME_LOW_FACTOR,
    extremeHigh: VERDICT_EXTREME_HIGH_FACTOR,
  },
  minGapAmount: MIN_GAP_AMOUNT,
  includeDebtFreeCommendation: true,
};

type Env = Record<string, string | undefined>;

function envNum(
  env: Env,
  key: string,
  fallback: number,
  validate: (n: number) => boolean
): number {
  const val = env[key];
  if (val === undefined || val.trim() === "") return fallback;
  const parsed = Number(val);
  return validate(parsed) ? parsed : fallback;
}

function envFloat(env: Env, key: string, fallback: number): number {
  return envNum(env, key, fallback, Number.isFinite);
}

function envInt(env: Env, key: string, fallback: number): number {
  return envNum(env, key, fallback, Number.isInteger);
}

function envBool(env: Env, key: string, fallback: boolean): boolean {
  const val = env[key]?.trim().toLowerCase();
  if (val === "true" || val === "1") return true;
  if (val === "false" || val === "0") return false;
  return fallback;
}

/**
 * Loads analysis assumptions from environment variables.
 * Every value falls back to the default in constants.ts when unset or unparsable.
 * FINHEALTH_OVER_PERFORMANCE_FACTOR=none disables the flat over-performance award.
 */
export function loadAnalysisConfig(env: Env = process.env): AnalysisConfig {
  const defaults = DEFAULT_ANALYSIS_CONFIG;
  const overPerformanceRaw = env.FINHEALTH_OVER_PERFORMANCE_FACTOR?.trim().toLowerCase();

  return {
    retirement: {
      annualInflationRate: envFloat(env, "FINHEALTH_ANNUAL_INFLATION_RATE", defaults.retirement.annualInflationRate),
      corpusGrowthRate: envFloat(env, "FINHEALTH_RETIREMENT_CORPUS_GROWTH_RATE", defaults.retirement.corpusGrowthRate),
      lifeExpectancy: envInt(env, "FINHEALTH_AVG_LIFE_EXPECTANCY", defaults.retirement.lifeExpectancy),
      expenseReductionPct: envFloat(env, "FINHEALTH_RETIREMENT_EXPENSE_REDUCTION_PCT", defaults.retirement.expenseReductionPct),
    },
    medicalCoverFactor: envFloat(env, "FINHEALTH_MEDICAL_COVER_FACTOR", defaults.medicalCoverFactor),
    termCoverFactor: envFloat(env, "FINHEALTH_TERM_COVER_FACTOR", defaults.termCoverFactor),
    scoring: {
      baseValue: envFloat(env, "FINHEALTH_SCORING_BASE_VALUE", defaults.scoring.baseValue),
      overPerformanceFactor:
        overPerformanceRaw === "none"
          ? null
          : envFloat(env, "FINHEALTH_OVER_PERFORMANCE_FACTOR", OVER_PERFORMANCE_FACTOR),
    },
    verdictThresholds: {
      low: envFloat(env, "FINHEALTH_VERDICT_LOW", defaults.verdictThresholds.low),
      high: envFloat(env, "FINHEALTH_VERDICT_HIGH", defaults.verdictThresholds.high),
      extremeLow: envFloat(env, "FINHEALTH_VERDICT_EXTREME_LOW", defaults.verdictThresholds.extremeLow),
      extremeHigh: envFloat(env, "FINHEALTH_VERDICT_EXTREME_HIGH", defaults.verdictThresholds.extremeHigh),
    },
    minGapAmount: envFloat(env, "FINHEALTH_MIN_GAP_AMOUNT", defaults.minGapAmount),
    includeDebtFreeCommendation: envBool(env, "FINHEALTH_DEBT_FREE_COMMENDATION", defaults.includeDebtFreeCommendation),
  };
}

/**
 * Validate configuration invariants.
 * Throws on misconfiguration rather than silently running with broken logic.
 */
export function validateAnalysisConfig(config: AnalysisConfig): void {
  const errors: string[] = [];
  const { retirement, scoring, verdictThresholds: t } = config;

  if (retirement.expenseReductionPct < 0 || retirement.expenseReductionPct > 50) {
    errors.push("Expense reduction must be between 0% and 50%");
  }
  if (retirement.lifeExpectancy <= 0) {
    errors.push("Life expectancy must be positive");
  }
  if (retirement.annualInflationRate <= -1 || retirement.corpusGrowthRate <= -1) {
    errors.push("Inflation and growth rates must be greater than -100%");
  }
  if (config.medicalCoverFactor <= 0) {
    errors.push("Medical cover factor must be positive");
  }
  if (config.termCoverFactor <= 0) {
    errors.push("Term cover factor must be positive");
  }
  if (scoring.baseValue < 0 || scoring.baseValue >= 1) {
    errors.push("Scoring base value must be in [0, 1)");
  }
  if (
    scoring.overPerformanceFactor !== null &&
    (scoring.overPerformanceFactor < 0 || scoring.overPerformanceFactor > 1)
  ) {
    errors.push("Over-performance factor must be in [0, 1]");
  }
  if (!(t.extremeLow <= t.low && t.low <= 1)) {
    errors.push("Verdict thresholds must satisfy extremeLow <= low <= 1");
  }
  if (!(1 <= t.high && t.high <= t.extremeHigh)) {
    errors.push("Verdict thresholds must satisfy 1 <= high <= extremeHigh");
  }
  if (config.minGapAmount < 0) {
    errors.push("Minimum gap amount must be non-negative");
  }

  if (errors.length > 0) {
    throw new InvalidConfigurationError(errors);
  }
}
