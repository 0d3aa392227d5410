import * as fs from "fs";
import * as path from "path";
import { createRecommendationPipeline } from "./src/planner/recommendationPipeline";
import { InputValidationError } from "./src/utils/errors";
import { parseUserProfile } from "./src/utils/validation";

/**
 * Run one recommendation and write the result to recommendation-output.json
 * (generated in project root).
 * Usage: npm run recommend -- [input-file]
 * Default input: example-profile.json
 */
const inputPath = process.argv[2] ?? "example-profile.json";
const outputPath = "recommendation-output.json";

async function main(): Promise<void> {
  let inputData: unknown;
  try {
    const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
    inputData = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Failed to read or parse input file "${inputPath}": ${message}`);
    process.exit(1);
  }

  const profile = parseUserProfile(inputData);
  const pipeline = createRecommendationPipeline();

  console.log("Running recommendation...");
  const run = await pipeline.run(profile);
  fs.writeFileSync(outputPath, JSON.stringify(run.portfolio, null, 2));
  console.log(`Provenance: ${run.portfolio.provenance}`);
  console.log(`Financial health score: ${run.portfolio.metrics.financialHealthScore}/100`);
  console.log(`Risk capacity: ${run.portfolio.metrics.riskCapacity}`);
  console.log(`Recommendation saved to ${outputPath}`);
}

main().catch((err: unknown) => {
  if (err instanceof InputValidationError) {
    console.error("Input file is not a valid user profile:");
    err.issues.forEach((issue) => console.error(`  - ${issue}`));
  } else {
    console.error(err);
  }
  process.exit(1);
});
