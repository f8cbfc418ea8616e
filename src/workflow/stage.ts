/**
 * Stage predicates and validators.
 *
 * Predicates answer "is this piece present?" and never throw. Validators
 * are what the operations call before doing any work: they throw the
 * typed error for the missing piece, or return the piece itself so the
 * caller gets it already narrowed.
 *
 * For every workflow these implications hold:
 *
 *   hasFit(wf) ⟹ hasMold(wf) ⟹ hasPreprocessor(wf)
 */

import { isEmptyTable, isTable, type Table } from "../data/index.js";
import type { ModelFit } from "../models/index.js";
import type { Mold } from "../preprocessing/index.js";
import {
  InvalidWorkflowError,
  MissingArtifactError,
  MissingDataError,
  MissingModelError,
  MissingPreprocessorError,
  NotPresentError,
  WrongPreprocessorKindError,
} from "./errors.js";
import type { ModelAction, PreprocessorAction, RecipeAction, Workflow } from "./types.js";
import { isWorkflow } from "./workflow.js";

export function hasPreprocessorFormula(wf: Workflow<unknown>): boolean {
  return wf.pre.action?.kind === "formula";
}

export function hasPreprocessorRecipe(wf: Workflow<unknown>): boolean {
  return wf.pre.action?.kind === "recipe";
}

export function hasPreprocessor(wf: Workflow<unknown>): boolean {
  return wf.pre.action !== undefined;
}

export function hasModel(wf: Workflow<unknown>): boolean {
  return wf.fit.action !== undefined;
}

export function hasMold(wf: Workflow<unknown>): boolean {
  return wf.pre.mold !== undefined;
}

export function hasFit(wf: Workflow<unknown>): boolean {
  return wf.fit.fit !== undefined;
}

/**
 * A workflow is trained once its model has been fit.
 */
export function isTrainedWorkflow(wf: Workflow<unknown>): boolean {
  return hasFit(wf);
}

export function validateIsWorkflow(value: unknown): asserts value is Workflow<unknown> {
  if (!isWorkflow(value)) {
    const what = value === null ? "null" : Array.isArray(value) ? "an array" : `a ${typeof value}`;
    throw new InvalidWorkflowError(what);
  }
}

export function validateHasPreprocessor(wf: Workflow<unknown>): PreprocessorAction {
  const action = wf.pre.action;
  if (action === undefined) {
    throw new MissingPreprocessorError();
  }
  return action;
}

export function validateHasModel<TFit>(wf: Workflow<TFit>): ModelAction<TFit> {
  const action = wf.fit.action;
  if (action === undefined) {
    throw new MissingModelError();
  }
  return action;
}

export function validateHasMold(wf: Workflow<unknown>): Mold {
  const mold = wf.pre.mold;
  if (mold === undefined) {
    throw new MissingArtifactError();
  }
  return mold;
}

/**
 * @throws NotPresentError until the model has been fit
 */
export function validateHasFit<TFit>(wf: Workflow<TFit>): ModelFit<TFit> {
  const modelFit = wf.fit.fit;
  if (modelFit === undefined) {
    throw new NotPresentError("model fit", "Have you called `fit()` yet?");
  }
  return modelFit;
}

export function validateHasRecipe(wf: Workflow<unknown>): RecipeAction {
  const action = wf.pre.action;
  if (action?.kind !== "recipe") {
    throw new WrongPreprocessorKindError("recipe");
  }
  return action;
}

/**
 * Check that training data was supplied and has rows.
 */
export function validateData(data: Table | undefined | null): asserts data is Table {
  if (data === undefined || data === null) {
    throw new MissingDataError();
  }
  if (!isTable(data)) {
    throw new MissingDataError(
      "`data` must be provided to fit a workflow, as a table with `columns` and `rows`."
    );
  }
  if (isEmptyTable(data)) {
    throw new MissingDataError(
      "`data` must be provided to fit a workflow; the supplied table has no rows."
    );
  }
}
