export { growthSeries, compoundGrowthSeries } from "./engine/investmentGrowth";
export { annualAmount, expenseForYear, computeAnnualExpenses } from "./engine/expenseAnnualizer";
export { netAmount } from "./engine/incomeNetter";
export { computeTimeSeries } from "./engine/planAggregator";
export { totalAssetsSeries } from "./engine/totalAssets";
export { mortgageMonthlyPayment, mortgageSummary } from "./engine/mortgage";
export { isActive, parseYear, buildYearAxis, currentYear } from "./utils/time";
export type { ActivityWindow } from "./utils/time";
export { parsePlanDocument, loadPlanDocument, planWarnings, PlanValidationError } from "./utils/planDocument";
export * from "./utils/validation";

export type { Investment } from "./models/Investment";
export type { Expense, ExpenseType } from "./models/Expense";
export type { Income } from "./models/Income";
export type { Person, Child } from "./models/Person";
export type { Mortgage, MortgageSummary } from "./models/Mortgage";
export type { Plan } from "./models/Plan";
export type { TimeSeriesProjection, TotalAssetsProjection } from "./models/Projection";
export { createPlan } from "./models/Plan";
