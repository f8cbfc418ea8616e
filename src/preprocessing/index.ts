/**
 * Preprocessing: formulas, recipes, and the mold/forge layer that turns
 * either into model-ready tables.
 */

export {
  parseFormula,
  resolveFormula,
  applyTransform,
  FormulaError,
  type FormulaTerm,
  type ParsedFormula,
  type ResolvedFormula,
  type RhsItem,
  type TermTransform,
} from "./formula.js";

export {
  recipe,
  addStep,
  prep,
  bake,
  stepLog,
  isRecipe,
  RecipeError,
  type Recipe,
  type RecipeStep,
  type TrainedStep,
  type PreppedRecipe,
  type VariableInfo,
  type VariableRole,
  type StepLogOptions,
} from "./recipe.js";

export {
  moldFormula,
  moldRecipe,
  forge,
  ForgeError,
  INTERCEPT_COLUMN,
  type Mold,
  type FormulaMold,
  type RecipeMold,
  type ColumnPrototype,
} from "./mold.js";
