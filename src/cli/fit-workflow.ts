#!/usr/bin/env node
/**
 * CLI tool to fit a workflow described in JSON against a JSON dataset.
 *
 * Usage:
 *   npm run fit-workflow -- --data cars.json --workflow workflow.json
 *
 * Options:
 *   --data <path>       Dataset: an array of flat records (required)
 *   --workflow <path>   Workflow definition (required)
 *   --json              Output the report as JSON
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - Workflow fitted
 *   1 - Invalid input or fitting failed
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parseArgs } from "node:util";

import { loadDataset, DatasetValidationError } from "../data/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import { config, validateConfig } from "../config/index.js";
import {
  buildWorkflowFromDefinition,
  fit,
  parseWorkflowDefinition,
  pullFit,
  pullMold,
  WorkflowDefinitionError,
} from "../workflow/index.js";

// ============================================================
// Types
// ============================================================

export interface FitWorkflowInput {
  dataPath: string;
  workflowPath: string;
}

export interface FitReport {
  runId: string;
  rows: number;
  preprocessor: "formula" | "recipe";
  predictors: string[];
  outcomes: string[];
  /** null for a predictor aliased by earlier columns */
  coefficients: Record<string, number | null>;
  residualDf: number;
}

// ============================================================
// Core
// ============================================================

function readJson(path: string, what: string): unknown {
  const fullPath = resolve(path);
  let text: string;
  try {
    text = readFileSync(fullPath, "utf-8");
  } catch (err) {
    throw new Error(`Cannot read ${what} file ${fullPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new Error(`${what} file ${fullPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Load both files, fit, and collect what the CLI prints.
 */
export function runFitWorkflow(
  input: FitWorkflowInput,
  options: { logger?: Logger; runId?: string } = {}
): FitReport {
  const runId = initRunId(options.runId);
  const logger = options.logger ?? createLogger({ level: config.logLevel });

  const data = loadDataset(readJson(input.dataPath, "Dataset"));
  const definition = parseWorkflowDefinition(readJson(input.workflowPath, "Workflow"));
  logger.info("Inputs loaded", {
    rows: data.rows.length,
    columns: data.columns.length,
    preprocessor: definition.preprocessor.type,
  });

  const fitted = fit(buildWorkflowFromDefinition(definition, data), data, { logger });
  const mold = pullMold(fitted);
  const model = pullFit(fitted);

  return {
    runId,
    rows: data.rows.length,
    preprocessor: definition.preprocessor.type,
    predictors: [...mold.predictors.columns],
    outcomes: [...mold.outcomes.columns],
    coefficients: { ...model.fit.coefficients },
    residualDf: model.fit.dfResidual,
  };
}

/**
 * Plain-text rendering of a report.
 */
export function formatReport(report: FitReport): string {
  const width = Math.max(...Object.keys(report.coefficients).map((name) => name.length));
  const lines = [
    `Run:          ${report.runId}`,
    `Rows:         ${report.rows}`,
    `Preprocessor: ${report.preprocessor}`,
    `Outcomes:     ${report.outcomes.join(", ")}`,
    `Predictors:   ${report.predictors.join(", ")}`,
    "",
    "Coefficients:",
    ...Object.entries(report.coefficients).map(
      ([name, value]) => `  ${name.padEnd(width)}  ${value === null ? "NA" : value.toFixed(6)}`
    ),
    "",
    `Residual degrees of freedom: ${report.residualDf}`,
  ];
  return lines.join("\n");
}

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      data: { type: "string" },
      workflow: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: fit-workflow --data <path> --workflow <path> [--json]

Options:
  --data <path>       Dataset JSON: an array of flat records (required)
  --workflow <path>   Workflow definition JSON (required)
  --json              Output the report as JSON
  -h, --help          Show this help message

Exit codes:
  0 - Workflow fitted
  1 - Invalid input or fitting failed
`);
    process.exit(0);
  }

  return values;
}

function main(): void {
  validateConfig();
  const args = parseCliArgs();

  if (!args.data || !args.workflow) {
    console.error("Error: --data and --workflow are required");
    console.error("  Usage: npm run fit-workflow -- --data <path> --workflow <path>");
    process.exit(1);
  }

  const report = runFitWorkflow({ dataPath: args.data, workflowPath: args.workflow });
  console.log(args.json ? JSON.stringify(report, null, 2) : formatReport(report));
}

// Only run when executed directly (not imported by tests)
const isDirectExecution =
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith("fit-workflow.ts") || process.argv[1].endsWith("fit-workflow.js"));

if (isDirectExecution) {
  try {
    main();
  } catch (err) {
    if (err instanceof DatasetValidationError || err instanceof WorkflowDefinitionError) {
      console.error(err.format());
    } else {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}
