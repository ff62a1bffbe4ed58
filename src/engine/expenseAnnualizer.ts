import { Expense } from "../models/Expense";
import { MONTHS_PER_YEAR } from "../utils/math";
import { isActive } from "../utils/time";

/**
 * Annualized amount of an expense, ignoring its date window.
 *
 * "monthly" is paid twelve times a year. "annually" and "total" are both
 * counted once per active year, so a one-off total recurs every year it is
 * active. Unknown types are counted like "total".
 */
export function annualAmount(expense: Expense): number {
  if (expense.type === "monthly") {
    return expense.expense * MONTHS_PER_YEAR;
  }
  // "annually", "total" and unknown types: once per active year
  return expense.expense;
}

/**
 * Amount an expense contributes in the given year: its annual amount while active, 0 otherwise
 */
export function expenseForYear(expense: Expense, year: number): number {
  return isActive(expense, year) ? annualAmount(expense) : 0;
}

/**
 * Total annualized expenses, ignoring date windows.
 * Used by the total assets projection, which applies every expense every year.
 */
export function computeAnnualExpenses(expenses: readonly Expense[]): number {
  return expenses.reduce((sum, expense) => sum + annualAmount(expense), 0);
}
