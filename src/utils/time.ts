/**
 * Age and horizon utilities for retirement calculations.
 */

/**
 * Converts years to months, rounding to the nearest month.
 * 
 * @param years - Number of years
 * @returns Number of months (rounded)
 */
export function yearsToMonths(years: number): number {
  return Math.round(years * 12);
}

/**
 * Years left until the expected retirement age. Can be zero or negative for profiles
 * that are already past it.
 */
export function yearsToRetirement(age: number, expectedRetirementAge: number): number {
  return expectedRetirementAge - age;
}

/**
 * Months left until retirement, never below 1 so that it can be used as a divisor.
 */
export function monthsToRetirement(age: number, expectedRetirementAge: number): number {
  return Math.max(1, yearsToMonths(yearsToRetirement(age, expectedRetirementAge)));
}

export type AgeBand = "under30" | "under45" | "under60" | "senior";

/**
 * Life-stage band used to order feedback.
 * 
 * @returns "under30" below 30, "under45" below 45, "under60" below 60, else "senior"
 */
export function getAgeBand(age: number): AgeBand {
  if (age < 30) {
    return "under30";
  } else if (age < 45) {
    return "under45";
  } else if (age < 60) {
    return "under60";
  } else {
    return "senior";
  }
}

/**
 * Multiple of annual income a person's net worth is expected to reach at a given age.
 */
export function getNetWorthMultiplier(age: number): number {
  if (age < 30) {
    return 1;
  } else if (age < 40) {
    return 2;
  } else if (age < 50) {
    return 4;
  } else if (age < 60) {
    return 6;
  } else {
    return 8;
  }
}
