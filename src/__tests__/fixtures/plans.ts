import { Plan, createPlan } from '../../models/Plan';
import { PlanDocument } from '../../utils/validation';
import { brokerageAccount, savingsAccount } from './investments';
import { untaxedIncome, monthlyExpense } from './cashflows';

export const emptyPlan: Plan = createPlan({ years: 5 });

/** One account, one untaxed income, one monthly expense. */
export const simplePlan: Plan = createPlan({
  investments: [brokerageAccount],
  incomes: [untaxedIncome],
  expenses: [monthlyExpense],
  years: 2,
});

export const householdPlan: Plan = createPlan({
  investments: [savingsAccount],
  expenses: [
    { name: 'Utilities', expense: 50, type: 'monthly', endDate: '2000-12-31' },
  ],
  people: [
    {
      name: 'Jordan',
      birthYear: 1990,
      retirementAge: 37,
      socialSecurityStartYear: 67,
      annualSalary: 60000,
      retirement401kContribution: 500,
    },
  ],
  children: [{ name: 'Riley', birthYear: 2020, annual529Contribution: 100 }],
  projectionYearsMain: 3,
});

/** Stored document shape of simplePlan. */
export const simplePlanDocument: PlanDocument = {
  investments: [
    { name: 'Brokerage', balance: 10000, interest_rate_percent: 5, show_on_chart: true },
  ],
  income: [{ name: 'Side business', income: 5000, type: 'annually' }],
  expenses: [{ name: 'Groceries', expense: 200, type: 'monthly' }],
  projection_horizon_years: 2,
};
