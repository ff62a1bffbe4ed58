/**
 * Household member data structures
 */

export interface Person {
  readonly name: string;
  readonly birthYear: number;
  readonly retirementAge: number;
  readonly socialSecurityStartYear: number;
  readonly annualSalary: number;
  readonly retirement401kContribution: number; // Annual, stops at retirement
  readonly expirationAge?: number;
  readonly updatedAt?: string;
}

export interface Child {
  readonly name: string;
  readonly birthYear: number;
  readonly annual529Contribution: number;
  readonly updatedAt?: string;
}

/**
 * Get the number of whole years left before a person retires.
 * Returns 0 once the retirement age has been reached.
 */
export function yearsToRetirement(person: Person, currentYear: number): number {
  const age = currentYear - person.birthYear;
  return Math.max(0, person.retirementAge - age);
}
