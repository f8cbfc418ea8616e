/**
 * Blueprints: how raw data is encoded into model-ready tables.
 */

export {
  FormulaBlueprintOptionsSchema,
  RecipeBlueprintOptionsSchema,
  type Blueprint,
  type FormulaBlueprint,
  type FormulaBlueprintOptions,
  type RecipeBlueprint,
  type RecipeBlueprintOptions,
} from "./schema.js";

export {
  defaultFormulaBlueprint,
  defaultRecipeBlueprint,
  updateFormulaBlueprint,
  isFormulaBlueprint,
  isRecipeBlueprint,
  BlueprintError,
} from "./factory.js";

export { resolveBlueprint } from "./resolver.js";
