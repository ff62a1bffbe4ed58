import { Router, Request, Response } from "express";
import { computeTimeSeries } from "../engine/planAggregator";
import { totalAssetsSeries } from "../engine/totalAssets";
import { mortgageSummary } from "../engine/mortgage";
import {
  PlanDocumentSchema,
  ProjectionRequestSchema,
  MortgageRequestSchema,
  formatIssues,
} from "../utils/validation";
import { currentYear } from "../utils/time";
import { planWarnings } from "../utils/planDocument";
import { loadConfig } from "../utils/config";
import { API_INFO } from "./info";

const router = Router();

/**
 * Log an unexpected error and answer with a 500
 */
function sendInternalError(res: Response, context: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error in ${context}:`, error);
  res.status(500).json({
    error: "Internal server error",
    message,
  });
}

/**
 * GET /api
 * API information
 */
router.get("/", (req: Request, res: Response) => {
  res.json(API_INFO);
});

/**
 * GET /api/health
 */
router.get("/health", (req: Request, res: Response) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

/**
 * GET /api/projection
 * Get information about the projection endpoint
 */
router.get("/projection", (req: Request, res: Response) => {
  res.json({
    method: "POST",
    description: "Project investments and cumulative net profit over a calendar-year axis",
    endpoint: "/api/projection",
    requiredFields: ["plan", "horizonYears (optional)", "currentYear (optional)"],
    note: "The plan uses the stored document keys (investments, income, expenses, projection_horizon_years, ...). The year axis has horizonYears + 1 entries.",
  });
});

/**
 * POST /api/projection
 * Cashflow projection: investment totals and cumulative profit per year
 */
router.post("/projection", (req: Request, res: Response) => {
  const parsed = ProjectionRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({
      error: "Invalid projection request",
      details: formatIssues(parsed.error),
    });
  }

  try {
    const { plan, horizonYears, currentYear: requestedYear } = parsed.data;
    const result = computeTimeSeries(
      plan,
      horizonYears ?? plan.years ?? loadConfig().defaultHorizonYears,
      requestedYear ?? currentYear()
    );
    return res.json(result);
  } catch (error: unknown) {
    sendInternalError(res, "projection", error);
  }
});

/**
 * POST /api/assets
 * Total assets projection with retirement and 529 contributions
 */
router.post("/assets", (req: Request, res: Response) => {
  const parsed = ProjectionRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({
      error: "Invalid assets request",
      details: formatIssues(parsed.error),
    });
  }

  try {
    const { plan, currentYear: requestedYear } = parsed.data;
    return res.json(totalAssetsSeries(plan, requestedYear ?? currentYear()));
  } catch (error: unknown) {
    sendInternalError(res, "assets projection", error);
  }
});

/**
 * POST /api/mortgage
 * Monthly mortgage cost breakdown
 */
router.post("/mortgage", (req: Request, res: Response) => {
  const parsed = MortgageRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({
      error: "Invalid mortgage request",
      details: formatIssues(parsed.error),
    });
  }

  try {
    return res.json(mortgageSummary(parsed.data.mortgage));
  } catch (error: unknown) {
    sendInternalError(res, "mortgage summary", error);
  }
});

/**
 * POST /api/validate
 * Validate a plan document without projecting it
 */
router.post("/validate", (req: Request, res: Response) => {
  const parsed = PlanDocumentSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.json({ valid: false, errors: formatIssues(parsed.error) });
  }
  const plan = parsed.data;
  res.json({
    valid: true,
    warnings: planWarnings(plan),
    counts: {
      investments: plan.investments.length,
      incomes: plan.incomes.length,
      expenses: plan.expenses.length,
      people: plan.people.length,
      children: plan.children.length,
    },
  });
});

export default router;
