import * as fs from "fs";
import * as path from "path";
import { analyseFinancialHealth } from "./src/analyzer/healthAnalyzer";
import { loadAnalysisConfig } from "./src/utils/config";
import { errorMessage } from "./src/utils/errors";
import { logError, logInfo } from "./src/utils/logger";
import { createSeededRandom } from "./src/utils/random";
import { parseAnalysisRequest } from "./src/utils/validation";

/**
 * Analyse a profile and write the health report (generated in project root).
 * Usage: npx ts-node run-analysis.ts [input-file] [output-file]
 * Default input: example-profile.json, default output: health-report.json
 */
const inputPath = process.argv[2] ?? "example-profile.json";
const outputPath = process.argv[3] ?? "health-report.json";

let inputData: unknown;
try {
  const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
  inputData = JSON.parse(raw);
} catch (err) {
  logError(`Failed to read or parse input file "${inputPath}": ${errorMessage(err)}`);
  process.exit(1);
}

try {
  const { userProfile, weights, seed } = parseAnalysisRequest(inputData);

  logInfo(`Analysing profile from ${inputPath}...`);
  const report = analyseFinancialHealth(userProfile, {
    weights,
    config: loadAnalysisConfig(),
    random: seed === undefined ? undefined : createSeededRandom(seed),
  });

  fs.writeFileSync(outputPath, JSON.stringify(report, null, 2));
  logInfo(`Total score: ${report.totalScore} / 100`);
  logInfo(`Report saved to ${outputPath}`);
} catch (err) {
  logError(`Analysis failed: ${errorMessage(err)}`);
  process.exit(1);
}
