import { z } from "zod";
import { Investment } from "../models/Investment";
import { Expense } from "../models/Expense";
import { Income } from "../models/Income";
import { Person, Child } from "../models/Person";
import { Mortgage } from "../models/Mortgage";
import { Plan } from "../models/Plan";
import {
  MAX_HORIZON_YEARS,
  DEFAULT_RETIREMENT_AGE,
  DEFAULT_SOCIAL_SECURITY_START,
} from "./constants";

/**
 * Zod validation schemas for plan documents.
 * Documents use the stored snake_case keys; each schema transforms into the
 * camelCase model the engine works on. Percentages are in percent (5 means 5%).
 */

/**
 * Optional date string. Null is accepted and read as missing.
 * Contents are not checked: unreadable dates leave the activity window open.
 */
const OptionalDateSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

/**
 * Schema for an investment account.
 */
export const InvestmentSchema = z
  .object({
    name: z.string(),
    balance: z.number(),
    interest_rate_percent: z.number(),
    show_on_chart: z.boolean().default(true),
    taxable: z.boolean().optional(),
    broker: z.string().optional(),
    updated_at: z.string().optional(),
  })
  .transform(
    (raw): Investment => ({
      name: raw.name,
      balance: raw.balance,
      interestRatePercent: raw.interest_rate_percent,
      showOnChart: raw.show_on_chart,
      taxable: raw.taxable,
      broker: raw.broker,
      updatedAt: raw.updated_at,
    })
  );

/**
 * Schema for an expense. Any type string is accepted; the engine
 * annualizes unknown types like "total".
 */
export const ExpenseSchema = z
  .object({
    name: z.string(),
    expense: z.number(),
    type: z.string().default("monthly"),
    start_date: OptionalDateSchema,
    end_date: OptionalDateSchema,
    updated_at: z.string().optional(),
  })
  .transform(
    (raw): Expense => ({
      name: raw.name,
      expense: raw.expense,
      type: raw.type,
      startDate: raw.start_date,
      endDate: raw.end_date,
      updatedAt: raw.updated_at,
    })
  );

/**
 * Schema for an income source. The tax rate is not bounded.
 */
export const IncomeSchema = z
  .object({
    name: z.string(),
    income: z.number(),
    type: z.string().default("annually"),
    effective_tax_rate_percent: z.number().optional(),
    start_date: OptionalDateSchema,
    end_date: OptionalDateSchema,
    taxable: z.boolean().optional(),
    contributions: z.record(z.string(), z.number()).optional(),
    updated_at: z.string().optional(),
  })
  .transform(
    (raw): Income => ({
      name: raw.name,
      income: raw.income,
      type: raw.type,
      effectiveTaxRatePercent: raw.effective_tax_rate_percent,
      startDate: raw.start_date,
      endDate: raw.end_date,
      taxable: raw.taxable,
      contributions: raw.contributions,
      updatedAt: raw.updated_at,
    })
  );

/**
 * Schema for an adult household member.
 */
export const PersonSchema = z
  .object({
    name: z.string().default(""),
    birth_year: z.number().int(),
    retirement_age: z.number().int().min(0).default(DEFAULT_RETIREMENT_AGE),
    social_security_start_year: z.number().int().default(DEFAULT_SOCIAL_SECURITY_START),
    annual_salary: z.number().min(0).default(0),
    retirement_401k_contribution: z.number().min(0).default(0),
    expiration_age: z.number().int().optional(),
    updated_at: z.string().optional(),
  })
  .transform(
    (raw): Person => ({
      name: raw.name,
      birthYear: raw.birth_year,
      retirementAge: raw.retirement_age,
      socialSecurityStartYear: raw.social_security_start_year,
      annualSalary: raw.annual_salary,
      retirement401kContribution: raw.retirement_401k_contribution,
      expirationAge: raw.expiration_age,
      updatedAt: raw.updated_at,
    })
  );

/**
 * Schema for a child with a 529 education savings contribution.
 */
export const ChildSchema = z
  .object({
    name: z.string().default(""),
    birth_year: z.number().int(),
    annual_529_contribution: z.number().min(0).default(0),
    updated_at: z.string().optional(),
  })
  .transform(
    (raw): Child => ({
      name: raw.name,
      birthYear: raw.birth_year,
      annual529Contribution: raw.annual_529_contribution,
      updatedAt: raw.updated_at,
    })
  );

/**
 * Schema for a fixed-rate mortgage.
 */
export const MortgageSchema = z
  .object({
    home_price: z.number().min(0),
    downpayment: z.number().min(0),
    interest_rate_percent: z.number().min(0).max(100),
    mortgage_duration_years: z.number().int().min(1),
    annual_property_tax_percent: z.number().min(0).max(100),
    start_year: z.number().int(),
    updated_at: z.string().optional(),
  })
  .transform(
    (raw): Mortgage => ({
      homePrice: raw.home_price,
      downpayment: raw.downpayment,
      interestRatePercent: raw.interest_rate_percent,
      mortgageDurationYears: raw.mortgage_duration_years,
      annualPropertyTaxPercent: raw.annual_property_tax_percent,
      startYear: raw.start_year,
      updatedAt: raw.updated_at,
    })
  );

/**
 * Schema for the complete plan document as it is stored.
 * Household members are stored under fixed keys and collected into lists.
 */
export const PlanDocumentSchema = z
  .object({
    investments: z.array(InvestmentSchema).default([]),
    income: z.array(IncomeSchema).default([]),
    expenses: z.array(ExpenseSchema).default([]),
    projection_horizon_years: z.number().int().min(0).max(MAX_HORIZON_YEARS).optional(),
    projection_years_main: z.number().int().min(0).max(MAX_HORIZON_YEARS).default(0),
    person1: PersonSchema.optional(),
    person2: PersonSchema.optional(),
    child1: ChildSchema.optional(),
    child2: ChildSchema.optional(),
    mortgage: MortgageSchema.optional(),
  })
  .transform(
    (raw): Plan => ({
      investments: raw.investments,
      incomes: raw.income,
      expenses: raw.expenses,
      years: raw.projection_horizon_years,
      people: [raw.person1, raw.person2].filter((p): p is Person => p !== undefined),
      children: [raw.child1, raw.child2].filter((c): c is Child => c !== undefined),
      mortgage: raw.mortgage,
      projectionYearsMain: raw.projection_years_main,
    })
  );

export type PlanDocument = z.input<typeof PlanDocumentSchema>;

/**
 * Schema for a projection request: a plan document plus optional overrides.
 * Without horizonYears the plan's own horizon is used, then the configured default;
 * without currentYear the clock is read.
 */
export const ProjectionRequestSchema = z.object({
  plan: PlanDocumentSchema,
  horizonYears: z.number().int().max(MAX_HORIZON_YEARS).optional(),
  currentYear: z.number().int().optional(),
});

/**
 * Schema for a mortgage summary request.
 */
export const MortgageRequestSchema = z.object({
  mortgage: MortgageSchema,
});

/**
 * Flatten zod issues into "path: message" lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
