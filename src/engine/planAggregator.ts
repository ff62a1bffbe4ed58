import { Plan } from "../models/Plan";
import { TimeSeriesProjection } from "../models/Projection";
import { buildYearAxis } from "../utils/time";
import { cumulativeSum } from "../utils/math";
import { growthSeries } from "./investmentGrowth";
import { netAmount } from "./incomeNetter";
import { expenseForYear } from "./expenseAnnualizer";

/**
 * Project a plan over a shared calendar-year axis.
 *
 * The axis runs from currentYear through currentYear + horizonYears inclusive,
 * so a horizon of N yields N + 1 points. A horizon of 0 yields only the current
 * year and a negative horizon yields empty series.
 *
 * - investmentsSeries: summed compound value of every investment
 * - netIncomeSeries / expensesSeries: after-tax income and active expenses per year
 * - profitSeries: running total of (net income - expenses), starting with year 0's own net
 *
 * @param plan - Plan snapshot, read only
 * @param horizonYears - Number of years after the current year
 * @param currentYear - First year of the axis
 */
export function computeTimeSeries(
  plan: Plan,
  horizonYears: number,
  currentYear: number
): TimeSeriesProjection {
  const years = buildYearAxis(currentYear, horizonYears);

  const investmentsSeries = years.map(() => 0);
  for (const investment of plan.investments) {
    const values = growthSeries(investment, horizonYears);
    years.forEach((_, i) => {
      investmentsSeries[i] += values[i];
    });
  }

  const netIncomeSeries = years.map((year) =>
    plan.incomes.reduce((sum, income) => sum + netAmount(income, year), 0)
  );
  const expensesSeries = years.map((year) =>
    plan.expenses.reduce((sum, expense) => sum + expenseForYear(expense, year), 0)
  );

  const yearlyNet = years.map((_, i) => netIncomeSeries[i] - expensesSeries[i]);

  return {
    years,
    investmentsSeries,
    profitSeries: cumulativeSum(yearlyNet),
    netIncomeSeries,
    expensesSeries,
  };
}
