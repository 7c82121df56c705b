/**
 * Financial calculation utilities for corpus projections and rounding.
 * Periodic rates are monthly unless stated otherwise.
 */

/**
 * Converts an annual return percentage to an equivalent monthly return.
 * 
 * @param annualReturn - Annual return as a decimal (e.g., 0.12 for 12%)
 * @returns Monthly return as a decimal
 * 
 * @example
 * ```ts
 * annualToMonthlyReturn(0.12) // returns 0.01 (1% per month)
 * ```
 */
export function annualToMonthlyReturn(annualReturn: number): number {
  return annualReturn / 12;
}

/**
 * Calculates the future value of a single sum with compound interest.
 * Formula: FV = PV × (1 + r)^n
 * 
 * @param presentValue - Initial amount
 * @param rate - Return rate per period as a decimal
 * @param periods - Number of periods
 * @returns Future value of the amount
 */
export function futureValue(
  presentValue: number,
  rate: number,
  periods: number
): number {
  return presentValue * Math.pow(1 + rate, periods);
}

/**
 * Calculates the future value of an ordinary annuity (contributions at period end).
 * Formula: FV = PMT × [(1 + r)^n - 1] / r
 * 
 * @param payment - Contribution per period
 * @param rate - Return rate per period as a decimal
 * @param periods - Number of periods
 * @returns Future value of all contributions
 */
export function futureValueOfAnnuity(
  payment: number,
  rate: number,
  periods: number
): number {
  if (rate === 0) {
    return payment * periods;
  }
  return payment * ((Math.pow(1 + rate, periods) - 1) / rate);
}

/**
 * Future value of an annuity due (contributions at period start, as with a SIP debited
 * on the first of the month).
 * Formula: FV = PMT × (1 + r) × [(1 + r)^n - 1] / r
 */
export function futureValueOfAnnuityDue(
  payment: number,
  rate: number,
  periods: number
): number {
  return futureValueOfAnnuity(payment, rate, periods) * (1 + rate);
}

/**
 * Present value of a stream of equal payouts.
 * Formula: PV = PMT × [1 - (1 + r)^-n] / r
 * 
 * @param payment - Payout per period
 * @param rate - Discount rate per period as a decimal
 * @param periods - Number of payouts
 * @returns Lump sum needed today to fund the payouts
 */
export function presentValueOfAnnuity(
  payment: number,
  rate: number,
  periods: number
): number {
  if (rate === 0) {
    return payment * periods;
  }
  return (payment * (1 - Math.pow(1 + rate, -periods))) / rate;
}

/**
 * Rounds a number to a fixed count of decimal places.
 * 
 * @example
 * ```ts
 * roundTo(0.4567, 2) // returns 0.46
 * ```
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
