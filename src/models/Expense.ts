/**
 * Expense data structure
 */

export type ExpenseType = "monthly" | "annually" | "total";

export const EXPENSE_TYPES: readonly ExpenseType[] = ["monthly", "annually", "total"];

export interface Expense {
  readonly name: string;
  readonly expense: number;
  // Stored documents may carry values outside ExpenseType; those are annualized like "total"
  readonly type: ExpenseType | (string & {});
  readonly startDate?: string;
  readonly endDate?: string;
  readonly updatedAt?: string;
}

/**
 * Check whether a raw type string is one of the known expense types
 */
export function isKnownExpenseType(type: string): type is ExpenseType {
  return EXPENSE_TYPES.some((known) => known === type);
}
