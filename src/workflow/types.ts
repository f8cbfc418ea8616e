/**
 * Workflow value types.
 *
 * A workflow has two stages:
 *
 * ```
 *   pre: preprocessor action ──fitPre(data)──▶ mold
 *   fit: model action ─────────fitModel()────▶ model fit (trained on the mold)
 * ```
 *
 * Every field is readonly and every workflow handed out is frozen; the
 * operations in this module return new workflows instead of editing them.
 */

import type { FormulaBlueprint, RecipeBlueprint } from "../blueprint/index.js";
import type { DuplicatePolicy } from "../config/index.js";
import type { ModelFit, ModelSpec } from "../models/index.js";
import type { Mold, Recipe } from "../preprocessing/index.js";

export type { DuplicatePolicy } from "../config/index.js";

/**
 * Who chose the blueprint. Only system defaults may be adjusted to suit
 * the model; a caller's blueprint is used exactly as given.
 */
export type BlueprintSource = "default" | "user";

export interface FormulaAction {
  readonly kind: "formula";
  readonly formula: string;
  readonly blueprint: FormulaBlueprint;
  readonly blueprintSource: BlueprintSource;
}

export interface RecipeAction {
  readonly kind: "recipe";
  readonly recipe: Recipe;
  readonly blueprint: RecipeBlueprint;
  readonly blueprintSource: BlueprintSource;
}

export type PreprocessorAction = FormulaAction | RecipeAction;

export type PreprocessorKind = PreprocessorAction["kind"];

export interface ModelAction<TFit = unknown> {
  readonly spec: ModelSpec<TFit>;
  /** Name the model is registered under in the workflow */
  readonly role: string;
}

export interface PreStage {
  readonly action?: PreprocessorAction;
  readonly mold?: Mold;
}

export interface FitStage<TFit = unknown> {
  readonly action?: ModelAction<TFit>;
  readonly fit?: ModelFit<TFit>;
}

export interface Workflow<TFit = unknown> {
  readonly kind: "workflow";
  readonly pre: PreStage;
  readonly fit: FitStage<TFit>;
  readonly duplicatePolicy: DuplicatePolicy;
}
