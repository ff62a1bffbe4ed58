/**
 * Investment account data structure
 */

export interface Investment {
  readonly name: string;
  readonly balance: number;
  readonly interestRatePercent: number; // Annual rate in percent (5 means 5%), may be zero or negative
  readonly showOnChart: boolean; // Display-only, ignored by calculations
  readonly taxable?: boolean;
  readonly broker?: string;
  readonly updatedAt?: string;
}

/**
 * Get the combined starting balance of all investments
 */
export function getTotalBalance(investments: readonly Investment[]): number {
  return investments.reduce((sum, investment) => sum + investment.balance, 0);
}
