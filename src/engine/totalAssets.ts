import { Plan } from "../models/Plan";
import { TotalAssetsProjection } from "../models/Projection";
import { getTotalBalance } from "../models/Investment";
import { yearsToRetirement } from "../models/Person";
import { buildYearAxis } from "../utils/time";
import { percentToFraction } from "../utils/math";
import { computeAnnualExpenses } from "./expenseAnnualizer";

/**
 * Project total household assets over plan.projectionYearsMain years.
 *
 * Each year, in order:
 * 1. Each person's 401k contribution is added to cash until they retire
 * 2. Every child's 529 contribution is added to cash
 * 3. Annual expenses are taken from cash (date windows ignored)
 * 4. Every investment grows by its own rate
 *
 * Cash earns nothing and may go negative. Entry 0 is the starting balance.
 */
export function totalAssetsSeries(plan: Plan, currentYear: number): TotalAssetsProjection {
  const horizon = plan.projectionYearsMain;
  const years = buildYearAxis(currentYear, horizon);

  const balances = plan.investments.map((investment) => investment.balance);
  const rates = plan.investments.map((investment) =>
    percentToFraction(investment.interestRatePercent)
  );
  const retirementWindows = plan.people.map((person) => ({
    yearsLeft: yearsToRetirement(person, currentYear),
    contribution: person.retirement401kContribution,
  }));
  const annualChildContribution = plan.children.reduce(
    (sum, child) => sum + child.annual529Contribution,
    0
  );
  const annualExpenses = computeAnnualExpenses(plan.expenses);

  const contributionsForYear = (yearIdx: number): number =>
    retirementWindows
      .filter((window) => yearIdx <= window.yearsLeft)
      .reduce((sum, window) => sum + window.contribution, annualChildContribution);

  const initialBalance = getTotalBalance(plan.investments);
  const totalAssets: number[] = years.length > 0 ? [initialBalance] : [];
  let cash = 0;

  for (let yearIdx = 1; yearIdx <= horizon; yearIdx++) {
    cash += contributionsForYear(yearIdx);
    cash -= annualExpenses;
    for (let i = 0; i < balances.length; i++) {
      balances[i] *= 1 + rates[i];
    }
    totalAssets.push(balances.reduce((sum, balance) => sum + balance, 0) + cash);
  }

  return {
    years,
    totalAssets,
    metadata: {
      initialBalance,
      annualContributions: contributionsForYear(1),
      annualExpenses,
    },
  };
}
