import * as fs from "fs";
import { loadPlanDocument, planWarnings, PlanValidationError } from "./src/utils/planDocument";
import { computeTimeSeries } from "./src/engine/planAggregator";
import { totalAssetsSeries } from "./src/engine/totalAssets";
import { mortgageSummary } from "./src/engine/mortgage";
import { currentYear } from "./src/utils/time";
import { loadConfig } from "./src/utils/config";
import { Plan } from "./src/models/Plan";

/**
 * Run the cashflow projection for a plan document and write the result to
 * projection-output.json (generated in the working directory).
 * Usage: npx ts-node run-projection.ts [plan-file] [horizon-years]
 * Default plan file: data.json. Default horizon: the plan's projection_horizon_years,
 * then DEFAULT_HORIZON_YEARS from the environment.
 */
const inputPath = process.argv[2] ?? "data.json";
const horizonArg = process.argv[3];

let plan: Plan;
try {
  plan = loadPlanDocument(inputPath);
} catch (err) {
  if (err instanceof PlanValidationError) {
    console.error(`Plan document "${inputPath}" is invalid:`);
    for (const issue of err.issues) {
      console.error(`  - ${issue}`);
    }
  } else {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Failed to read or parse plan file "${inputPath}": ${message}`);
  }
  process.exit(1);
}

const horizonYears =
  horizonArg === undefined ? plan.years ?? loadConfig().defaultHorizonYears : Number(horizonArg);
if (!Number.isInteger(horizonYears)) {
  console.error(`Horizon must be an integer, got "${horizonArg}"`);
  process.exit(1);
}

for (const warning of planWarnings(plan)) {
  console.warn(`Warning: ${warning}`);
}

const year = currentYear();
console.log(`Projecting ${horizonYears} years from ${year}...`);

const output = {
  projection: computeTimeSeries(plan, horizonYears, year),
  totalAssets: totalAssetsSeries(plan, year),
  mortgage: plan.mortgage ? mortgageSummary(plan.mortgage) : undefined,
};
fs.writeFileSync("projection-output.json", JSON.stringify(output, null, 2));
console.log("Projection saved to projection-output.json");
