/**
 * Income source data structure
 */

export interface Income {
  readonly name: string;
  readonly income: number; // Gross amount per active year
  readonly type: string; // Informational only, e.g. "annually"
  readonly effectiveTaxRatePercent?: number; // Missing means untaxed
  readonly startDate?: string;
  readonly endDate?: string;
  readonly taxable?: boolean;
  readonly contributions?: Readonly<Record<string, number>>;
  readonly updatedAt?: string;
}
