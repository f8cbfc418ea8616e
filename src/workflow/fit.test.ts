/**
 * Fit Orchestration Tests
 *
 * Run: node --import tsx --test src/workflow/fit.test.ts
 *
 * Tests cover:
 *   1. fit() end to end for formula and recipe workflows
 *   2. fitPre() blueprint resolution and validation order
 *   3. fitModel() on an existing mold
 *   4. Stage invariants across every mutation
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { defaultFormulaBlueprint, defaultRecipeBlueprint } from "../blueprint/index.js";
import { tableFromColumns } from "../data/index.js";
import type { Logger } from "../logging/index.js";
import { EngineError, linearReg } from "../models/index.js";
import { addStep, recipe, stepLog } from "../preprocessing/index.js";
import { cars, flowers, meanForest, silentLogger } from "../testing/fixtures.js";
import {
  addFormula,
  addModel,
  addRecipe,
  fit,
  fitModel,
  fitPre,
  hasFit,
  hasMold,
  hasPreprocessor,
  isTrainedWorkflow,
  MissingDataError,
  MissingModelError,
  MissingPreprocessorError,
  pullFit,
  pullMold,
  workflow,
  type Workflow,
} from "./index.js";

const lm = linearReg({ engine: "lm" });
const logger = silentLogger();

function assertClose(actual: number | null | undefined, expected: number): void {
  assert.ok(
    typeof actual === "number" && Math.abs(actual - expected) < 1e-9,
    `expected ${expected}, got ${actual}`
  );
}

interface LogRecord {
  level: string;
  message: string;
  context: Record<string, unknown>;
}

function recordingLogger(records: LogRecord[], bindings: Record<string, unknown> = {}): Logger {
  const record =
    (level: string) =>
    (message: string, context?: Record<string, unknown>): void => {
      records.push({ level, message, context: { ...bindings, ...context } });
    };
  return {
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    child: (more) => recordingLogger(records, { ...bindings, ...more }),
  };
}

describe("fit", () => {
  it("fits a recipe workflow by least squares", () => {
    const wf = addModel(addRecipe(workflow(), recipe("mpg ~ cyl", cars)), lm);
    const result = fit(wf, cars, { logger });
    const coefficients = pullFit(result).fit.coefficients;
    assertClose(coefficients["(Intercept)"], 42);
    assertClose(coefficients["cyl"], -3.5);
    assert.equal(isTrainedWorkflow(result), true);
  });

  it("fits a formula workflow by least squares", () => {
    const wf = addModel(addFormula(workflow(), "mpg ~ cyl"), lm);
    const modelFit = pullFit(fit(wf, cars, { logger }));
    assertClose(modelFit.fit.coefficients["(Intercept)"], 42);
    assertClose(modelFit.fit.coefficients["cyl"], -3.5);
    assert.equal(modelFit.spec, lm);
    assert.ok(modelFit.elapsedMs >= 0);
  });

  it("fits a recipe with a log step", () => {
    const rec = addStep(recipe("mpg ~ disp", cars), stepLog(["disp"]));
    const result = fit(addModel(addRecipe(workflow(), rec), lm), cars, { logger });
    assert.deepEqual(pullFit(result).fit.predictors, ["disp"]);
    assert.equal(pullMold(result).predictors.rows[0]?.["disp"], Math.log(100));
  });

  it("requires data", () => {
    const wf = addModel(addFormula(workflow(), "mpg ~ cyl"), lm);
    assert.throws(() => fit(wf, undefined, { logger }), {
      name: "MissingDataError",
      message: "`data` must be provided to fit a workflow.",
    });
    assert.throws(
      () => fit(wf, tableFromColumns([["mpg", []], ["cyl", []]]), { logger }),
      MissingDataError
    );
  });

  it("requires a preprocessor", () => {
    const wf = addModel(workflow(), lm);
    assert.throws(() => fit(wf, cars, { logger }), /must have a formula or recipe/);
  });

  it("requires a model", () => {
    const wf = addFormula(workflow(), "mpg ~ cyl");
    assert.throws(() => fit(wf, cars, { logger }), /must have a model/);
  });

  it("checks the data before the stages", () => {
    assert.throws(() => fit(workflow(), undefined, { logger }), MissingDataError);
  });

  it("leaves the input workflow untouched", () => {
    const wf = addModel(addFormula(workflow(), "mpg ~ cyl"), lm);
    fit(wf, cars, { logger });
    assert.equal(hasMold(wf), false);
    assert.equal(hasFit(wf), false);
  });

  it("fits lm on a categorical predictor with the default blueprint", () => {
    const wf = addModel(addFormula(workflow(), "Sepal.Length ~ ."), lm);
    const modelFit = pullFit(fit(wf, flowers, { logger })).fit;
    assert.deepEqual(modelFit.aliased, ["Speciesvirginica"]);
    assertClose(modelFit.coefficients["Sepal.Width"], 1);
    assertClose(modelFit.coefficients["Speciessetosa"], -2);
  });

  it("propagates engine errors", () => {
    const tiny = tableFromColumns([
      ["y", [1, 2]],
      ["a", [1, 2]],
      ["b", [3, 5]],
    ]);
    const wf = addModel(addFormula(workflow(), "y ~ a + b"), lm);
    assert.throws(() => fit(wf, tiny, { logger }), EngineError);
  });

  it("logs each phase through the given logger", () => {
    const records: LogRecord[] = [];
    const wf = addModel(addFormula(workflow(), "mpg ~ cyl"), lm);
    fit(wf, cars, { logger: recordingLogger(records) });

    assert.deepEqual(
      records.map((entry) => [entry.level, entry.message, entry.context["phase"]]),
      [
        ["debug", "Molded training data", "preprocess"],
        ["debug", "Fitted model", "model"],
        ["info", "Workflow fitted", "fit"],
      ]
    );
    assert.deepEqual(records[0]?.context, {
      phase: "preprocess",
      preprocessor: "formula",
      rows: 6,
      predictors: 1,
      blueprintAdjusted: false,
    });
    assert.equal(records[1]?.context["model"], "linear_reg [engine: lm, mode: regression]");
  });
});

describe("fitPre", () => {
  it("adjusts a default formula blueprint to the model", () => {
    const wf = addModel(addFormula(workflow(), "Sepal.Length ~ ."), meanForest());
    const result = fitPre(wf, flowers, { logger });
    const mold = pullMold(result);
    assert.deepEqual(mold.predictors.columns, ["Sepal.Width", "Species"]);
    assert.equal(mold.blueprint.kind, "formula");
    assert.equal(mold.kind === "formula" && mold.blueprint.indicators, false);

    const action = result.pre.action;
    assert.equal(action?.kind === "formula" && action.blueprint.indicators, false);
    assert.equal(action?.blueprintSource, "default");
  });

  it("uses a caller's blueprint exactly as given", () => {
    const blueprint = defaultFormulaBlueprint({ indicators: true });
    const wf = addModel(addFormula(workflow(), "Sepal.Length ~ .", { blueprint }), meanForest());
    const result = fit(wf, flowers, { logger });
    const mold = pullMold(result);
    assert.deepEqual(mold.predictors.columns, [
      "Sepal.Width",
      "Speciessetosa",
      "Speciesversicolor",
      "Speciesvirginica",
    ]);
    assert.equal(mold.blueprint, blueprint);
    assert.equal(result.pre.action?.blueprint, blueprint);
    assert.deepEqual(blueprint, {
      kind: "formula",
      intercept: false,
      allowNovelLevels: false,
      indicators: true,
    });
  });

  it("never adjusts a recipe blueprint", () => {
    const blueprint = defaultRecipeBlueprint();
    const wf = addModel(
      addRecipe(workflow(), recipe("Sepal.Length ~ .", flowers), { blueprint }),
      meanForest()
    );
    const result = fitPre(wf, flowers, { logger });
    assert.equal(result.pre.action?.blueprint, blueprint);
    assert.equal(pullMold(result).blueprint, blueprint);
    assert.deepEqual(pullMold(result).predictors.columns, ["Sepal.Width", "Species"]);

    const withDefault = addModel(addRecipe(workflow(), recipe("Sepal.Length ~ .", flowers)), meanForest());
    const before = withDefault.pre.action?.blueprint;
    assert.equal(fitPre(withDefault, flowers, { logger }).pre.action?.blueprint, before);
  });

  it("works without a model", () => {
    const result = fitPre(addFormula(workflow(), "mpg ~ cyl"), cars, { logger });
    assert.deepEqual(pullMold(result).predictors.columns, ["cyl"]);
  });

  it("produces equal molds for equal inputs", () => {
    const wf = addModel(addFormula(workflow(), "Sepal.Length ~ Sepal.Width + Species"), lm);
    const first = pullMold(fitPre(wf, flowers, { logger }));
    const second = pullMold(fitPre(wf, flowers, { logger }));
    assert.deepEqual(first.predictors, second.predictors);
    assert.deepEqual(first.outcomes, second.outcomes);
  });

  it("does not touch the model fit", () => {
    const fitted = fit(addModel(addFormula(workflow(), "mpg ~ cyl"), lm), cars, { logger });
    const refitted = fitPre(fitted, cars, { logger });
    assert.equal(refitted.fit.fit, fitted.fit.fit);
  });

  it("checks the preprocessor before the data", () => {
    assert.throws(() => fitPre(workflow(), undefined, { logger }), MissingPreprocessorError);
    assert.throws(
      () => fitPre(addFormula(workflow(), "mpg ~ cyl"), tableFromColumns([["mpg", []]]), { logger }),
      { message: "`data` must be provided to fit a workflow; the supplied table has no rows." }
    );
  });
});

describe("fitModel", () => {
  it("requires a model, then a mold", () => {
    assert.throws(() => fitModel(addFormula(workflow(), "mpg ~ cyl"), { logger }), MissingModelError);
    assert.throws(() => fitModel(addModel(workflow(), lm), { logger }), {
      name: "MissingArtifactError",
      message: "The workflow does not have a mold yet. Call `fitPre()` before `fitModel()`.",
    });
  });

  it("trains on the existing mold", () => {
    const molded = fitPre(addModel(addFormula(workflow(), "mpg ~ cyl"), lm), cars, { logger });
    const trained = fitModel(molded, { logger });
    assert.equal(trained.pre.mold, molded.pre.mold);
    assertClose(pullFit(trained).fit.coefficients["cyl"], -3.5);
  });
});

describe("stage invariants", () => {
  it("a fit implies a mold, which implies a preprocessor", () => {
    const base = addModel(addFormula(workflow(), "mpg ~ cyl"), lm);
    const fitted = fit(base, cars, { logger });
    const states: Workflow<unknown>[] = [
      workflow(),
      base,
      fitPre(base, cars, { logger }),
      fitted,
      addFormula(fitted, "mpg ~ disp"),
      addModel(fitted, lm),
      addRecipe(fitted, recipe("mpg ~ cyl", cars), { overwrite: true }),
    ];
    for (const state of states) {
      assert.ok(!hasFit(state) || hasMold(state));
      assert.ok(!hasMold(state) || hasPreprocessor(state));
    }
  });
});
