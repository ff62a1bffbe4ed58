import { Investment } from "./Investment";
import { Income } from "./Income";
import { Expense } from "./Expense";
import { Person, Child } from "./Person";
import { Mortgage } from "./Mortgage";

/**
 * Plan snapshot: everything a projection run reads.
 * Projections never modify it.
 */
export interface Plan {
  readonly investments: readonly Investment[];
  readonly incomes: readonly Income[];
  readonly expenses: readonly Expense[];
  readonly years?: number; // Default horizon for the cashflow projection; unset means the configured default
  readonly people: readonly Person[];
  readonly children: readonly Child[];
  readonly mortgage?: Mortgage;
  readonly projectionYearsMain: number; // Horizon for the total assets projection
}

/**
 * Build a plan with no entries, filling in any parts given
 */
export function createPlan(parts: Partial<Plan> = {}): Plan {
  return {
    investments: [],
    incomes: [],
    expenses: [],
    people: [],
    children: [],
    projectionYearsMain: 0,
    ...parts,
  };
}
