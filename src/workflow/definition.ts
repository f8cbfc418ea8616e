/**
 * Declarative workflow definitions.
 *
 * A definition is the JSON form of a workflow, as read by the
 * `fit-workflow` CLI:
 *
 * ```json
 * {
 *   "preprocessor": {
 *     "type": "recipe",
 *     "formula": "mpg ~ cyl + disp",
 *     "steps": [{ "type": "log", "columns": ["disp"] }]
 *   },
 *   "model": { "type": "linear_reg", "engine": "lm" }
 * }
 * ```
 *
 * A `blueprint` given in the definition is used as is, like one passed to
 * `addFormula()`; without one the workflow gets the adjustable default.
 */

import { z } from "zod";
import {
  defaultFormulaBlueprint,
  defaultRecipeBlueprint,
  FormulaBlueprintOptionsSchema,
  RecipeBlueprintOptionsSchema,
} from "../blueprint/index.js";
import { DUPLICATE_POLICIES } from "../config/index.js";
import type { Table } from "../data/index.js";
import { LINEAR_REG_ENGINES, linearReg, type LinearRegFit } from "../models/index.js";
import { addStep, recipe, stepLog, type Recipe } from "../preprocessing/index.js";
import { formatIssueList, formatZodIssues, type ValidationIssue } from "../utils/issues.js";
import { addFormula, addModel, addRecipe } from "./actions.js";
import type { Workflow } from "./types.js";
import { workflow } from "./workflow.js";

export const LogStepDefinitionSchema = z
  .object({
    type: z.literal("log"),
    columns: z.array(z.string().min(1)).min(1).describe("Columns to log-transform"),
    base: z.number().positive().optional().describe("Logarithm base, natural log if omitted"),
  })
  .strict();

export const StepDefinitionSchema = z.discriminatedUnion("type", [LogStepDefinitionSchema]);

export const FormulaPreprocessorDefinitionSchema = z
  .object({
    type: z.literal("formula"),
    formula: z.string().min(1),
    blueprint: FormulaBlueprintOptionsSchema.optional(),
  })
  .strict();

export const RecipePreprocessorDefinitionSchema = z
  .object({
    type: z.literal("recipe"),
    formula: z.string().min(1).describe("Role formula, e.g. `y ~ .`"),
    steps: z.array(StepDefinitionSchema).default([]),
    blueprint: RecipeBlueprintOptionsSchema.optional(),
  })
  .strict();

export const ModelDefinitionSchema = z
  .object({
    type: z.literal("linear_reg"),
    engine: z.enum(LINEAR_REG_ENGINES).default("lm"),
  })
  .strict();

export const WorkflowDefinitionSchema = z
  .object({
    preprocessor: z.discriminatedUnion("type", [
      FormulaPreprocessorDefinitionSchema,
      RecipePreprocessorDefinitionSchema,
    ]),
    model: ModelDefinitionSchema,
    duplicatePolicy: z.enum(DUPLICATE_POLICIES).optional(),
  })
  .strict();

export type WorkflowDefinition = z.infer<typeof WorkflowDefinitionSchema>;

export type StepDefinition = z.infer<typeof StepDefinitionSchema>;

export class WorkflowDefinitionError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.name = "WorkflowDefinitionError";
    this.issues = issues;
  }

  format(): string {
    return formatIssueList("Workflow definition validation failed:", this.issues);
  }
}

/**
 * @throws WorkflowDefinitionError listing every problem found
 */
export function parseWorkflowDefinition(input: unknown): WorkflowDefinition {
  const result = WorkflowDefinitionSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new WorkflowDefinitionError(
      `Invalid workflow definition: ${issues.length} validation error(s)`,
      issues
    );
  }
  return result.data;
}

function buildRecipe(formula: string, steps: readonly StepDefinition[], data: Table): Recipe {
  let rec = recipe(formula, data);
  for (const step of steps) {
    switch (step.type) {
      case "log":
        rec = addStep(rec, stepLog(step.columns, step.base === undefined ? {} : { base: step.base }));
        break;
    }
  }
  return rec;
}

/**
 * Build an unfitted workflow from a parsed definition. Recipes need the
 * training data to learn column roles and types.
 */
export function buildWorkflowFromDefinition(
  definition: WorkflowDefinition,
  data: Table
): Workflow<LinearRegFit> {
  const base = workflow(
    definition.duplicatePolicy === undefined ? {} : { duplicatePolicy: definition.duplicatePolicy }
  );

  const { preprocessor } = definition;
  const withPre =
    preprocessor.type === "formula"
      ? addFormula(
          base,
          preprocessor.formula,
          preprocessor.blueprint === undefined
            ? {}
            : { blueprint: defaultFormulaBlueprint(preprocessor.blueprint) }
        )
      : addRecipe(
          base,
          buildRecipe(preprocessor.formula, preprocessor.steps, data),
          preprocessor.blueprint === undefined
            ? {}
            : { blueprint: defaultRecipeBlueprint(preprocessor.blueprint) }
        );

  return addModel(withPre, linearReg({ engine: definition.model.engine }));
}
