/**
 * Mortgage data structures
 */

export interface Mortgage {
  readonly homePrice: number;
  readonly downpayment: number;
  readonly interestRatePercent: number;
  readonly mortgageDurationYears: number;
  readonly annualPropertyTaxPercent: number;
  readonly startYear: number;
  readonly updatedAt?: string;
}

export interface MortgageSummary {
  principal: number;
  monthlyPrincipalAndInterest: number;
  monthlyPropertyTax: number;
  totalMonthly: number;
}
