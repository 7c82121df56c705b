/**
 * Shared constants for financial health analysis.
 * Centralizing these makes behavior consistent and easier to tune.
 */

/** Expected long-run annual inflation. */
export const ANNUAL_INFLATION_RATE = 0.05;

/** Expected annual growth of retirement investments, before and after retirement. */
export const RETIREMENT_CORPUS_GROWTH_RATE = 0.08;

/** Age up to which the retirement corpus must fund expenses. */
export const AVG_LIFE_EXPECTANCY = 75;

/** Percent by which monthly outflow is expected to drop after retirement (0–50). */
export const RETIREMENT_EXPENSE_REDUCTION_PCT = 0;

/** Recommended health cover per family member (₹). */
export const MEDICAL_COVER_FACTOR = 500000;

/** Recommended term cover as a multiple of annual income. */
export const TERM_COVER_FACTOR = 10;

/** Floor of the cubic scoring curve; keeps scores above zero for any finite deviation. */
export const SCORING_BASE_VALUE = 0.1;

/** Share of the weight awarded to values above the ideal range. */
export const OVER_PERFORMANCE_FACTOR = 0.85;

/** Verdict band multipliers applied to the benchmark bounds. */
export const VERDICT_LOW_FACTOR = 0.85;
export const VERDICT_HIGH_FACTOR = 1.15;
export const VERDICT_EXTREME_LOW_FACTOR = 0.75;
export const VERDICT_EXTREME_HIGH_FACTOR = 1.25;

/** Gap amounts below this (₹) are raised to it so recommendations stay meaningful. */
export const MIN_GAP_AMOUNT = 1000;

/** Real returns closer to zero than this are treated as zero. */
export const REAL_RETURN_EPSILON = 1e-6;

/** Monthly income (₹) upper bounds of income brackets IG1..IG6; IG7 is everything above. */
export const INCOME_BRACKET_THRESHOLDS = [80000, 150000, 250000, 350000, 500000, 800000] as const;
