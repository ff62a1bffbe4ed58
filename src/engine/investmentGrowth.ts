import { Investment } from "../models/Investment";
import { futureValue, percentToFraction } from "../utils/math";

/**
 * Compute annual compound growth values including year 0.
 * Index t holds the value after t years of growth; the result has years + 1 entries.
 *
 * @param principal - Starting amount, may be negative
 * @param annualRatePercent - Annual rate in percent, may be zero or negative
 * @param years - Number of years to project
 */
export function compoundGrowthSeries(
  principal: number,
  annualRatePercent: number,
  years: number
): number[] {
  const annualRate = percentToFraction(annualRatePercent);
  const values: number[] = [];
  for (let year = 0; year <= years; year++) {
    values.push(futureValue(principal, annualRate, year));
  }
  return values;
}

/**
 * Year-by-year value of one investment account
 */
export function growthSeries(investment: Investment, years: number): number[] {
  return compoundGrowthSeries(investment.balance, investment.interestRatePercent, years);
}
