/**
 * Blueprint resolution.
 *
 * Models can state how they want categorical predictors encoded (see
 * `ModelSpec.requiredEncoding`). Before molding, the default blueprint of a
 * formula preprocessor is adjusted to match. Nothing else is adjusted:
 *
 * | preprocessor | blueprint source | model encoding info | result            |
 * |--------------|------------------|---------------------|-------------------|
 * | recipe       | any              | any                 | unchanged         |
 * | formula      | user             | any                 | unchanged         |
 * | formula      | default          | unavailable         | unchanged         |
 * | formula      | default          | `{ indicators }`    | indicators copied |
 *
 * "Unchanged" means the very same blueprint object is returned.
 */

import type { ModelSpec } from "../models/index.js";
import type { FormulaAction, PreprocessorAction, RecipeAction } from "../workflow/types.js";
import { updateFormulaBlueprint } from "./factory.js";
import type { Blueprint, FormulaBlueprint, RecipeBlueprint } from "./schema.js";

export function resolveBlueprint(action: FormulaAction, spec?: ModelSpec<unknown>): FormulaBlueprint;
export function resolveBlueprint(action: RecipeAction, spec?: ModelSpec<unknown>): RecipeBlueprint;
export function resolveBlueprint(action: PreprocessorAction, spec?: ModelSpec<unknown>): Blueprint;
export function resolveBlueprint(action: PreprocessorAction, spec?: ModelSpec<unknown>): Blueprint {
  if (action.kind === "recipe") {
    return action.blueprint;
  }

  if (action.blueprintSource === "user" || spec === undefined) {
    return action.blueprint;
  }

  const encoding = spec.requiredEncoding?.();
  if (encoding === undefined || encoding.indicators === action.blueprint.indicators) {
    return action.blueprint;
  }

  return updateFormulaBlueprint(action.blueprint, { indicators: encoding.indicators });
}
