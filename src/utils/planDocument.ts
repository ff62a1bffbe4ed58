import * as fs from "fs";
import * as path from "path";
import { Plan } from "../models/Plan";
import { isKnownExpenseType } from "../models/Expense";
import { PlanDocumentSchema, formatIssues } from "./validation";

/**
 * Raised when a plan document does not match the expected shape.
 */
export class PlanValidationError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid plan document "${source}": ${issues.join("; ")}`);
    this.name = "PlanValidationError";
    this.issues = issues;
  }
}

/**
 * Validate a parsed plan document and convert it to a Plan.
 *
 * @param data - Parsed JSON
 * @param source - Label used in error messages
 */
export function parsePlanDocument(data: unknown, source = "<input>"): Plan {
  const result = PlanDocumentSchema.safeParse(data);
  if (!result.success) {
    throw new PlanValidationError(source, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Read a plan document from a JSON file.
 * Throws if the file is missing, is not JSON, or fails validation.
 */
export function loadPlanDocument(filePath: string): Plan {
  const resolved = path.resolve(filePath);
  const raw = fs.readFileSync(resolved, "utf-8");
  return parsePlanDocument(JSON.parse(raw), resolved);
}

/**
 * Entries the engine accepts but handles with a fallback
 */
export function planWarnings(plan: Plan): string[] {
  return plan.expenses
    .filter((expense) => !isKnownExpenseType(expense.type))
    .map(
      (expense) =>
        `expense "${expense.name}" has unknown type "${expense.type}", counted once per active year`
    );
}
