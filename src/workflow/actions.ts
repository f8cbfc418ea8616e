/**
 * Adding, removing and replacing workflow actions.
 *
 * All operations are copy-on-write: the workflow passed in is never
 * changed, and the returned workflow drops every artifact the change made
 * stale.
 *
 * | change             | mold    | model fit |
 * |--------------------|---------|-----------|
 * | preprocessor added | cleared | cleared   |
 * | model added        | kept    | cleared   |
 *
 * Duplicate handling depends on the workflow's duplicate policy:
 *
 * - adding a preprocessor of a different kind than the current one always
 *   needs `{ overwrite: true }`;
 * - adding one of the same kind, or a second model, replaces the existing
 *   action under "overwrite" and throws under "error" unless
 *   `{ overwrite: true }` is passed.
 */

import {
  BlueprintError,
  defaultFormulaBlueprint,
  defaultRecipeBlueprint,
  isFormulaBlueprint,
  isRecipeBlueprint,
  type FormulaBlueprint,
  type RecipeBlueprint,
} from "../blueprint/index.js";
import { isModelSpec, type ModelSpec } from "../models/index.js";
import { isRecipe, parseFormula, RecipeError, type Recipe } from "../preprocessing/index.js";
import {
  DuplicateModelError,
  DuplicatePreprocessorError,
  InvalidModelSpecError,
  NotPresentError,
} from "./errors.js";
import { hasPreprocessorFormula, hasPreprocessorRecipe, validateIsWorkflow } from "./stage.js";
import type { FormulaAction, PreprocessorAction, RecipeAction, Workflow } from "./types.js";
import { makeWorkflow } from "./workflow.js";

export interface AddActionOptions {
  /** Replace an existing action regardless of the duplicate policy */
  overwrite?: boolean;
}

export interface AddFormulaOptions extends AddActionOptions {
  /** Use this blueprint as is instead of the adjustable default */
  blueprint?: FormulaBlueprint;
}

export interface AddRecipeOptions extends AddActionOptions {
  blueprint?: RecipeBlueprint;
}

export interface AddModelOptions extends AddActionOptions {
  /** Name the model is stored under, "model" by default */
  role?: string;
}

/**
 * Set the preprocessor. Clears the mold and the model fit.
 *
 * @throws DuplicatePreprocessorError per the duplicate policy
 */
export function addPreprocessor<TFit>(
  wf: Workflow<TFit>,
  action: PreprocessorAction,
  options: AddActionOptions = {}
): Workflow<TFit> {
  validateIsWorkflow(wf);

  const existing = wf.pre.action;
  if (existing !== undefined && options.overwrite !== true) {
    if (existing.kind !== action.kind || wf.duplicatePolicy === "error") {
      throw new DuplicatePreprocessorError(existing.kind, action.kind);
    }
  }

  return makeWorkflow({
    pre: { action },
    fit: { action: wf.fit.action },
    duplicatePolicy: wf.duplicatePolicy,
  });
}

/**
 * Preprocess with a formula.
 *
 * @throws FormulaError when the formula cannot be parsed
 */
export function addFormula<TFit>(
  wf: Workflow<TFit>,
  formula: string,
  options: AddFormulaOptions = {}
): Workflow<TFit> {
  parseFormula(formula);

  const { blueprint } = options;
  if (blueprint !== undefined && !isFormulaBlueprint(blueprint)) {
    throw new BlueprintError("`blueprint` must be a formula blueprint from `defaultFormulaBlueprint()`.");
  }

  const action: FormulaAction = Object.freeze({
    kind: "formula" as const,
    formula: formula.trim(),
    blueprint: blueprint ?? defaultFormulaBlueprint(),
    blueprintSource: blueprint === undefined ? ("default" as const) : ("user" as const),
  });
  return addPreprocessor(wf, action, options);
}

/**
 * Preprocess with a recipe. Recipe blueprints are never adjusted to suit the model.
 */
export function addRecipe<TFit>(
  wf: Workflow<TFit>,
  rec: Recipe,
  options: AddRecipeOptions = {}
): Workflow<TFit> {
  if (!isRecipe(rec)) {
    throw new RecipeError("`recipe` must be a recipe created with `recipe()`.");
  }

  const { blueprint } = options;
  if (blueprint !== undefined && !isRecipeBlueprint(blueprint)) {
    throw new BlueprintError("`blueprint` must be a recipe blueprint from `defaultRecipeBlueprint()`.");
  }

  const action: RecipeAction = Object.freeze({
    kind: "recipe" as const,
    recipe: rec,
    blueprint: blueprint ?? defaultRecipeBlueprint(),
    blueprintSource: blueprint === undefined ? ("default" as const) : ("user" as const),
  });
  return addPreprocessor(wf, action, options);
}

/**
 * Set the model. Keeps the mold, clears the model fit.
 *
 * @throws DuplicateModelError per the duplicate policy
 */
export function addModel<TFit>(
  wf: Workflow<unknown>,
  spec: ModelSpec<TFit>,
  options: AddModelOptions = {}
): Workflow<TFit> {
  validateIsWorkflow(wf);
  if (!isModelSpec(spec)) {
    throw new InvalidModelSpecError();
  }

  if (wf.fit.action !== undefined && options.overwrite !== true && wf.duplicatePolicy === "error") {
    throw new DuplicateModelError();
  }

  return makeWorkflow<TFit>({
    pre: wf.pre,
    fit: { action: Object.freeze({ spec, role: options.role ?? "model" }) },
    duplicatePolicy: wf.duplicatePolicy,
  });
}

function clearPreprocessor<TFit>(wf: Workflow<TFit>): Workflow<TFit> {
  return makeWorkflow({
    pre: {},
    fit: { action: wf.fit.action },
    duplicatePolicy: wf.duplicatePolicy,
  });
}

/**
 * @throws NotPresentError when the workflow has no formula
 */
export function removeFormula<TFit>(wf: Workflow<TFit>): Workflow<TFit> {
  validateIsWorkflow(wf);
  if (!hasPreprocessorFormula(wf)) {
    throw new NotPresentError("formula preprocessor", "There is nothing to remove.");
  }
  return clearPreprocessor(wf);
}

/**
 * @throws NotPresentError when the workflow has no recipe
 */
export function removeRecipe<TFit>(wf: Workflow<TFit>): Workflow<TFit> {
  validateIsWorkflow(wf);
  if (!hasPreprocessorRecipe(wf)) {
    throw new NotPresentError("recipe preprocessor", "There is nothing to remove.");
  }
  return clearPreprocessor(wf);
}

/**
 * Drop the model and its fit. The mold is kept.
 *
 * @throws NotPresentError when the workflow has no model
 */
export function removeModel(wf: Workflow<unknown>): Workflow<unknown> {
  validateIsWorkflow(wf);
  if (wf.fit.action === undefined) {
    throw new NotPresentError("model", "There is nothing to remove.");
  }
  return makeWorkflow<unknown>({
    pre: wf.pre,
    fit: {},
    duplicatePolicy: wf.duplicatePolicy,
  });
}

export function updateFormula<TFit>(
  wf: Workflow<TFit>,
  formula: string,
  options: Omit<AddFormulaOptions, "overwrite"> = {}
): Workflow<TFit> {
  return addFormula(removeFormula(wf), formula, options);
}

export function updateRecipe<TFit>(
  wf: Workflow<TFit>,
  rec: Recipe,
  options: Omit<AddRecipeOptions, "overwrite"> = {}
): Workflow<TFit> {
  return addRecipe(removeRecipe(wf), rec, options);
}

export function updateModel<TFit>(
  wf: Workflow<unknown>,
  spec: ModelSpec<TFit>,
  options: Omit<AddModelOptions, "overwrite"> = {}
): Workflow<TFit> {
  return addModel(removeModel(wf), spec, options);
}
