import { Income } from "../models/Income";
import { percentToFraction } from "../utils/math";
import { isActive } from "../utils/time";

/**
 * After-tax income for a year. Returns 0 when the income is not active in that year.
 * A missing tax rate means untaxed; rates outside 0-100 are applied as given,
 * so a rate above 100 yields a negative amount.
 */
export function netAmount(income: Income, year: number): number {
  if (!isActive(income, year)) {
    return 0;
  }
  const taxRate = percentToFraction(income.effectiveTaxRatePercent ?? 0);
  return income.income * (1 - taxRate);
}
