/**
 * Financial calculation utilities for yearly projections.
 */

export const MONTHS_PER_YEAR = 12;

/**
 * Converts a percentage to a decimal fraction.
 *
 * @example
 * ```ts
 * percentToFraction(5) // returns 0.05
 * ```
 */
export function percentToFraction(percent: number): number {
  return percent / 100;
}

/**
 * Converts an annual rate to a simple monthly rate.
 *
 * @param annualRate - Annual rate as a decimal (e.g., 0.06 for 6%)
 */
export function annualToMonthlyRate(annualRate: number): number {
  return annualRate / MONTHS_PER_YEAR;
}

/**
 * Calculates the future value of a single sum with compound interest.
 * Formula: FV = PV × (1 + r)^n
 *
 * @param presentValue - Starting amount
 * @param rate - Rate per period as a decimal
 * @param periods - Number of compounding periods
 */
export function futureValue(presentValue: number, rate: number, periods: number): number {
  return presentValue * Math.pow(1 + rate, periods);
}

/**
 * Calculates the level payment that repays a loan over a number of periods.
 * Formula: PMT = P × r × (1 + r)^n / ((1 + r)^n - 1)
 *
 * @param principal - Amount borrowed
 * @param rate - Rate per period as a decimal
 * @param periods - Number of payments
 * @returns Payment per period (principal / periods when the rate is 0)
 */
export function amortizedPayment(principal: number, rate: number, periods: number): number {
  if (rate === 0) {
    return principal / periods;
  }
  const factor = Math.pow(1 + rate, periods);
  return (principal * rate * factor) / (factor - 1);
}

/**
 * Running total of a series, in order.
 *
 * @example
 * ```ts
 * cumulativeSum([2, 3, -1]) // returns [2, 5, 4]
 * ```
 */
export function cumulativeSum(values: readonly number[]): number[] {
  const totals: number[] = [];
  let running = 0;
  for (const value of values) {
    running += value;
    totals.push(running);
  }
  return totals;
}
