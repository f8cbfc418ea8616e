/**
 * Fitting a workflow.
 *
 * `fitPre()` molds the training data with the preprocessor, `fitModel()`
 * trains the model on that mold, and `fit()` runs both. Each returns a new
 * workflow; the input workflow is left as it was.
 */

import { resolveBlueprint } from "../blueprint/index.js";
import type { Table } from "../data/index.js";
import { getDefaultLogger, type Logger } from "../logging/index.js";
import { describeSpec, type ModelFit } from "../models/index.js";
import { moldFormula, moldRecipe, type Mold } from "../preprocessing/index.js";
import { assertNever } from "../utils/immutable.js";
import {
  validateData,
  validateHasModel,
  validateHasMold,
  validateHasPreprocessor,
  validateIsWorkflow,
} from "./stage.js";
import type { PreprocessorAction, Workflow } from "./types.js";
import { makeWorkflow } from "./workflow.js";

export interface FitOptions {
  /** Logger for progress messages, the process-wide logger by default */
  logger?: Logger;
}

function fitLogger(options: FitOptions, phase: string): Logger {
  return (options.logger ?? getDefaultLogger()).child({ phase });
}

/**
 * Mold `data` with the workflow's preprocessor.
 *
 * A default formula blueprint is first adjusted to the model's encoding
 * needs, and the adjusted blueprint is stored back in the action. A
 * caller's blueprint and every recipe blueprint are used as given. The
 * model fit slot is not touched.
 *
 * Calling this again with the same data produces an equal mold.
 *
 * @throws MissingPreprocessorError, MissingDataError
 */
export function fitPre<TFit>(
  wf: Workflow<TFit>,
  data: Table | undefined,
  options: FitOptions = {}
): Workflow<TFit> {
  validateIsWorkflow(wf);
  const action = validateHasPreprocessor(wf);
  validateData(data);
  const log = fitLogger(options, "preprocess");

  const spec = wf.fit.action?.spec;
  let resolved: PreprocessorAction;
  let mold: Mold;
  switch (action.kind) {
    case "formula": {
      const blueprint = resolveBlueprint(action, spec);
      resolved = blueprint === action.blueprint ? action : Object.freeze({ ...action, blueprint });
      mold = moldFormula(resolved.formula, blueprint, data);
      break;
    }
    case "recipe": {
      resolved = action;
      mold = moldRecipe(action.recipe, resolveBlueprint(action, spec), data);
      break;
    }
    default:
      return assertNever(action, "preprocessor");
  }

  log.debug("Molded training data", {
    preprocessor: resolved.kind,
    rows: data.rows.length,
    predictors: mold.predictors.columns.length,
    blueprintAdjusted: resolved !== action,
  });

  return makeWorkflow({
    pre: { action: resolved, mold },
    fit: wf.fit,
    duplicatePolicy: wf.duplicatePolicy,
  });
}

/**
 * Train the workflow's model on its mold.
 *
 * @throws MissingModelError, MissingArtifactError; engine failures propagate
 */
export function fitModel<TFit>(wf: Workflow<TFit>, options: FitOptions = {}): Workflow<TFit> {
  validateIsWorkflow(wf);
  const action = validateHasModel(wf);
  const mold = validateHasMold(wf);
  const log = fitLogger(options, "model");

  const started = Date.now();
  const trained = action.spec.fit(mold.predictors, mold.outcomes);
  const modelFit: ModelFit<TFit> = Object.freeze({
    spec: action.spec,
    fit: trained,
    elapsedMs: Date.now() - started,
  });

  log.debug("Fitted model", {
    model: describeSpec(action.spec),
    elapsedMs: modelFit.elapsedMs,
  });

  return makeWorkflow({
    pre: wf.pre,
    fit: { action, fit: modelFit },
    duplicatePolicy: wf.duplicatePolicy,
  });
}

/**
 * Preprocess `data` and fit the model in one call.
 *
 * Checks run before any work: data, then preprocessor, then model.
 */
export function fit<TFit>(
  wf: Workflow<TFit>,
  data: Table | undefined,
  options: FitOptions = {}
): Workflow<TFit> {
  validateIsWorkflow(wf);
  validateData(data);
  validateHasPreprocessor(wf);
  validateHasModel(wf);

  const fitted = fitModel(fitPre(wf, data, options), options);
  fitLogger(options, "fit").info("Workflow fitted", { rows: data.rows.length });
  return fitted;
}
