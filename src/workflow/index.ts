/**
 * Workflows: a preprocessor and a model, fitted together.
 */

export type {
  BlueprintSource,
  DuplicatePolicy,
  FitStage,
  FormulaAction,
  ModelAction,
  PreprocessorAction,
  PreprocessorKind,
  PreStage,
  RecipeAction,
  Workflow,
} from "./types.js";

export { workflow, isWorkflow, type WorkflowOptions } from "./workflow.js";

export {
  WorkflowError,
  InvalidWorkflowError,
  InvalidModelSpecError,
  DuplicateActionError,
  DuplicatePreprocessorError,
  DuplicateModelError,
  MissingPreprocessorError,
  MissingModelError,
  MissingDataError,
  MissingArtifactError,
  WrongPreprocessorKindError,
  NotPresentError,
  type WorkflowErrorCode,
} from "./errors.js";

export {
  hasPreprocessorFormula,
  hasPreprocessorRecipe,
  hasPreprocessor,
  hasModel,
  hasMold,
  hasFit,
  isTrainedWorkflow,
  validateIsWorkflow,
  validateHasPreprocessor,
  validateHasModel,
  validateHasMold,
  validateHasFit,
  validateHasRecipe,
  validateData,
} from "./stage.js";

export {
  addPreprocessor,
  addFormula,
  addRecipe,
  addModel,
  removeFormula,
  removeRecipe,
  removeModel,
  updateFormula,
  updateRecipe,
  updateModel,
  type AddActionOptions,
  type AddFormulaOptions,
  type AddRecipeOptions,
  type AddModelOptions,
} from "./actions.js";

export { fitPre, fitModel, fit, type FitOptions } from "./fit.js";

export {
  pullPreprocessor,
  pullSpec,
  pullFit,
  pullMold,
  pullPreppedRecipe,
} from "./pull.js";

export { predictWorkflow, PREDICTION_COLUMN } from "./predict.js";

export { summarizeWorkflow } from "./summary.js";

export {
  WorkflowDefinitionSchema,
  StepDefinitionSchema,
  WorkflowDefinitionError,
  parseWorkflowDefinition,
  buildWorkflowFromDefinition,
  type WorkflowDefinition,
  type StepDefinition,
} from "./definition.js";
