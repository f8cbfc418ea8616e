/**
 * Tests for the fit-workflow CLI core.
 *
 * Run: node --import tsx --test src/cli/fit-workflow.test.ts
 *
 * The CLI's main() only parses arguments and prints; everything it prints
 * comes from runFitWorkflow() and formatReport(), tested here against
 * temporary input files.
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, describe, it } from "node:test";

import { getRunId } from "../logging/index.js";
import { silentLogger } from "../testing/fixtures.js";
import { WorkflowDefinitionError } from "../workflow/index.js";
import { formatReport, runFitWorkflow, type FitReport } from "./fit-workflow.js";

const dir = mkdtempSync(join(tmpdir(), "fit-workflow-"));

function writeJson(name: string, value: unknown): string {
  const path = join(dir, name);
  writeFileSync(path, JSON.stringify(value));
  return path;
}

const dataPath = writeJson("cars.json", [
  { mpg: 30, cyl: 4 },
  { mpg: 26, cyl: 4 },
  { mpg: 22, cyl: 6 },
  { mpg: 20, cyl: 6 },
  { mpg: 16, cyl: 8 },
  { mpg: 12, cyl: 8 },
]);

const logger = silentLogger();

describe("runFitWorkflow", () => {
  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("fits the described workflow and reports the mold and coefficients", () => {
    const workflowPath = writeJson("formula.json", {
      preprocessor: { type: "formula", formula: "mpg ~ cyl" },
      model: { type: "linear_reg", engine: "lm" },
    });

    const report = runFitWorkflow({ dataPath, workflowPath }, { logger, runId: "test-run" });

    assert.equal(report.runId, "test-run");
    assert.equal(getRunId(), "test-run");
    assert.equal(report.rows, 6);
    assert.equal(report.preprocessor, "formula");
    assert.deepEqual(report.predictors, ["cyl"]);
    assert.deepEqual(report.outcomes, ["mpg"]);
    assert.equal(report.residualDf, 4);
    assert.ok(Math.abs((report.coefficients["(Intercept)"] ?? 0) - 42) < 1e-9);
    assert.ok(Math.abs((report.coefficients["cyl"] ?? 0) + 3.5) < 1e-9);
  });

  it("rejects an invalid definition", () => {
    const workflowPath = writeJson("bad.json", { preprocessor: { type: "formula" } });
    assert.throws(() => runFitWorkflow({ dataPath, workflowPath }, { logger }), WorkflowDefinitionError);
  });

  it("names a file it cannot read", () => {
    const workflowPath = join(dir, "missing.json");
    assert.throws(() => runFitWorkflow({ dataPath, workflowPath }, { logger }), {
      message: new RegExp(`^Cannot read Workflow file ${workflowPath.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}: `),
    });
  });

  it("names a file that is not JSON", () => {
    const workflowPath = join(dir, "broken.json");
    writeFileSync(workflowPath, "{ not json");
    assert.throws(() => runFitWorkflow({ dataPath, workflowPath }, { logger }), {
      message: /^Workflow file .* is not valid JSON: /,
    });
  });
});

describe("formatReport", () => {
  it("aligns coefficient names", () => {
    const report: FitReport = {
      runId: "test-run",
      rows: 6,
      preprocessor: "recipe",
      predictors: ["cyl"],
      outcomes: ["mpg"],
      coefficients: { "(Intercept)": 42, cyl: -3.5 },
      residualDf: 4,
    };
    assert.equal(
      formatReport(report),
      [
        "Run:          test-run",
        "Rows:         6",
        "Preprocessor: recipe",
        "Outcomes:     mpg",
        "Predictors:   cyl",
        "",
        "Coefficients:",
        "  (Intercept)  42.000000",
        "  cyl          -3.500000",
        "",
        "Residual degrees of freedom: 4",
      ].join("\n")
    );
  });

  it("prints NA for an aliased coefficient", () => {
    const report: FitReport = {
      runId: "test-run",
      rows: 6,
      preprocessor: "formula",
      predictors: ["Speciesvirginica"],
      outcomes: ["Sepal.Length"],
      coefficients: { "(Intercept)": 4, Speciesvirginica: null },
      residualDf: 5,
    };
    assert.deepEqual(formatReport(report).split("\n").slice(6, 9), [
      "Coefficients:",
      "  (Intercept)       4.000000",
      "  Speciesvirginica  NA",
    ]);
  });
});
