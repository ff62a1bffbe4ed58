import { Mortgage, MortgageSummary } from "../models/Mortgage";
import { amortizedPayment, annualToMonthlyRate, percentToFraction, MONTHS_PER_YEAR } from "../utils/math";

/**
 * Fixed-rate mortgage monthly payment (principal and interest).
 * Returns 0 when there is nothing to borrow or no term.
 *
 * @param principal - Amount borrowed
 * @param annualInterestPercent - Annual interest rate in percent
 * @param years - Loan term in years
 */
export function mortgageMonthlyPayment(
  principal: number,
  annualInterestPercent: number,
  years: number
): number {
  if (principal <= 0 || years <= 0) {
    return 0;
  }
  const monthlyRate = annualToMonthlyRate(percentToFraction(annualInterestPercent));
  return amortizedPayment(principal, monthlyRate, years * MONTHS_PER_YEAR);
}

/**
 * Monthly cost breakdown of a mortgage: principal and interest plus property tax
 */
export function mortgageSummary(mortgage: Mortgage): MortgageSummary {
  const principal = Math.max(0, mortgage.homePrice - mortgage.downpayment);
  const monthlyPrincipalAndInterest = mortgageMonthlyPayment(
    principal,
    mortgage.interestRatePercent,
    mortgage.mortgageDurationYears
  );
  const monthlyPropertyTax =
    (mortgage.homePrice * percentToFraction(mortgage.annualPropertyTaxPercent)) / MONTHS_PER_YEAR;

  return {
    principal,
    monthlyPrincipalAndInterest,
    monthlyPropertyTax,
    totalMonthly: monthlyPrincipalAndInterest + monthlyPropertyTax,
  };
}
