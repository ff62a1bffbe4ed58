/**
 * Projection output data structures.
 * Every series is aligned to `years`: same length, same index.
 */

export interface TimeSeriesProjection {
  years: number[];
  investmentsSeries: number[]; // Total investment value per year
  profitSeries: number[]; // Cumulative (net income - expenses)
  netIncomeSeries: number[]; // After-tax income per year
  expensesSeries: number[]; // Annualized active expenses per year
}

export interface TotalAssetsProjection {
  years: number[];
  totalAssets: number[];
  metadata: {
    initialBalance: number;
    annualContributions: number; // Contributions in the first projected year
    annualExpenses: number;
  };
}
