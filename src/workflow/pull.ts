/**
 * Extractors. Each returns one element of a workflow, or throws a
 * NotPresentError naming the element when it does not exist yet.
 *
 * ```typescript
 * const fitted = fit(wf, cars);
 * pullPreprocessor(fitted);   // "mpg ~ cyl" or the Recipe
 * pullSpec(fitted);           // the untrained model spec
 * pullFit(fitted).fit;        // the engine's fit
 * pullMold(fitted);           // predictors, outcomes, blueprint used
 * pullPreppedRecipe(fitted);  // same as pullMold(fitted).recipe for recipes
 * ```
 */

import type { ModelFit, ModelSpec } from "../models/index.js";
import type { Mold, PreppedRecipe, Recipe } from "../preprocessing/index.js";
import { NotPresentError, WrongPreprocessorKindError } from "./errors.js";
import { validateHasFit, validateHasRecipe, validateIsWorkflow } from "./stage.js";
import type { Workflow } from "./types.js";

const FIT_HINT = "Have you called `fit()` yet?";

/**
 * The formula string or the Recipe the workflow preprocesses with.
 */
export function pullPreprocessor(wf: Workflow<unknown>): string | Recipe {
  validateIsWorkflow(wf);
  const action = wf.pre.action;
  if (action === undefined) {
    throw new NotPresentError("preprocessor");
  }
  return action.kind === "formula" ? action.formula : action.recipe;
}

export function pullSpec<TFit>(wf: Workflow<TFit>): ModelSpec<TFit> {
  validateIsWorkflow(wf);
  const action = wf.fit.action;
  if (action === undefined) {
    throw new NotPresentError("model spec");
  }
  return action.spec;
}

export function pullFit<TFit>(wf: Workflow<TFit>): ModelFit<TFit> {
  validateIsWorkflow(wf);
  return validateHasFit(wf);
}

export function pullMold(wf: Workflow<unknown>): Mold {
  validateIsWorkflow(wf);
  const mold = wf.pre.mold;
  if (mold === undefined) {
    throw new NotPresentError("mold", FIT_HINT);
  }
  return mold;
}

/**
 * @throws WrongPreprocessorKindError for formula workflows, even unfitted ones
 */
export function pullPreppedRecipe(wf: Workflow<unknown>): PreppedRecipe {
  validateIsWorkflow(wf);
  validateHasRecipe(wf);
  const mold = pullMold(wf);
  if (mold.kind !== "recipe") {
    throw new WrongPreprocessorKindError("recipe");
  }
  return mold.recipe;
}
