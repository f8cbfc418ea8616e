/**
 * Recipes: multi-step preprocessing with explicit variable roles.
 *
 * A recipe is created from a plain formula and a template dataset. The
 * formula only assigns roles (outcome vs. predictor); transformations are
 * added as steps. `prep()` trains every step on a dataset in order and
 * returns a PreppedRecipe whose trained steps can `bake()` any dataset
 * with the same columns.
 *
 * ```typescript
 * let rec = recipe("mpg ~ cyl + disp", cars);
 * rec = addStep(rec, stepLog(["disp"]));
 * const prepped = prep(rec, cars);
 * const baked = bake(prepped, newCars);
 * ```
 *
 * Only `stepLog` ships here. Other transformations implement RecipeStep.
 */

import {
  columnLevels,
  columnType,
  hasColumn,
  numericColumn,
  type CellValue,
  type ColumnType,
  type Row,
  type Table,
} from "../data/index.js";
import { FormulaError, parseFormula, resolveFormula, type ResolvedFormula } from "./formula.js";

export type VariableRole = "outcome" | "predictor";

export interface VariableInfo {
  readonly name: string;
  readonly type: ColumnType;
  readonly role: VariableRole;
  /** Sorted levels, categorical columns only */
  readonly levels?: readonly string[];
}

/**
 * An untrained preprocessing step.
 */
export interface RecipeStep {
  /** Short step type, e.g. "log" */
  readonly kind: string;
  /** Columns the step reads */
  readonly columns: readonly string[];
  prep(data: Table, variables: readonly VariableInfo[]): TrainedStep;
}

/**
 * A step whose parameters have been estimated and which can transform data.
 */
export interface TrainedStep {
  readonly kind: string;
  readonly columns: readonly string[];
  bake(data: Table): Table;
}

export interface Recipe {
  readonly kind: "recipe";
  readonly formula: string;
  readonly variables: readonly VariableInfo[];
  readonly steps: readonly RecipeStep[];
}

export interface PreppedRecipe {
  readonly kind: "prepped_recipe";
  readonly formula: string;
  /** Roles and types of the raw input columns */
  readonly variables: readonly VariableInfo[];
  readonly steps: readonly TrainedStep[];
  /** Roles and types of the columns produced by baking the training data */
  readonly outputVariables: readonly VariableInfo[];
}

export class RecipeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecipeError";
  }
}

function describeVariables(
  data: Table,
  roles: ReadonlyMap<string, VariableRole>
): VariableInfo[] {
  const variables: VariableInfo[] = [];
  for (const name of data.columns) {
    const role = roles.get(name);
    if (role === undefined) {
      continue;
    }
    const type = columnType(data, name);
    variables.push(
      type === "categorical"
        ? { name, type, role, levels: columnLevels(data, name) }
        : { name, type, role }
    );
  }
  return variables;
}

function resolveRecipeFormula(formula: string, data: Table): ResolvedFormula {
  try {
    const parsed = parseFormula(formula);
    for (const item of parsed.items) {
      if (item.kind === "term" && item.term.transform !== "identity") {
        throw new RecipeError(
          `Recipe formulas cannot contain inline functions such as \`${item.term.label}\`; ` +
            "add a step instead"
        );
      }
    }
    return resolveFormula(parsed, data.columns);
  } catch (err) {
    if (err instanceof FormulaError) {
      throw new RecipeError(`Invalid recipe formula: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Create a recipe. The formula assigns roles only and may not contain
 * inline transformations.
 *
 * @throws RecipeError on formulas with functions, or columns missing from `data`
 */
export function recipe(formula: string, data: Table): Recipe {
  const resolved = resolveRecipeFormula(formula, data);

  const roles = new Map<string, VariableRole>();
  for (const term of resolved.terms) {
    roles.set(term.column, "predictor");
  }
  for (const outcome of resolved.outcomes) {
    roles.set(outcome, "outcome");
  }

  return Object.freeze({
    kind: "recipe" as const,
    formula: formula.trim(),
    variables: Object.freeze(describeVariables(data, roles)),
    steps: Object.freeze([]),
  });
}

/**
 * Append a step. Returns a new recipe.
 */
export function addStep(rec: Recipe, step: RecipeStep): Recipe {
  return Object.freeze({ ...rec, steps: Object.freeze([...rec.steps, step]) });
}

export function isRecipe(value: unknown): value is Recipe {
  return (
    value !== null &&
    typeof value === "object" &&
    Reflect.get(value, "kind") === "recipe" &&
    typeof Reflect.get(value, "formula") === "string" &&
    Array.isArray(Reflect.get(value, "steps"))
  );
}

function checkColumns(data: Table, variables: readonly VariableInfo[], skipOutcomes: boolean): void {
  const missing = variables
    .filter((variable) => !(skipOutcomes && variable.role === "outcome"))
    .filter((variable) => !hasColumn(data, variable.name))
    .map((variable) => variable.name);
  if (missing.length > 0) {
    throw new RecipeError(
      `The following required columns are missing: ${missing.map((name) => `'${name}'`).join(", ")}`
    );
  }
}

/**
 * Train every step, in order, on `data`.
 */
export function prep(rec: Recipe, data: Table): PreppedRecipe {
  checkColumns(data, rec.variables, false);

  const roles = new Map(rec.variables.map((variable) => [variable.name, variable.role] as const));
  let current: Table = data;
  const trained: TrainedStep[] = [];
  for (const step of rec.steps) {
    const variables = describeVariables(current, roles);
    const trainedStep = step.prep(current, variables);
    current = trainedStep.bake(current);
    trained.push(trainedStep);
    // Columns created by a step become predictors
    for (const column of current.columns) {
      if (!roles.has(column) && !data.columns.includes(column)) {
        roles.set(column, "predictor");
      }
    }
  }

  return Object.freeze({
    kind: "prepped_recipe" as const,
    formula: rec.formula,
    variables: rec.variables,
    steps: Object.freeze(trained),
    outputVariables: Object.freeze(describeVariables(current, roles)),
  });
}

/**
 * Apply a prepped recipe to new data. Outcome columns may be absent.
 */
export function bake(prepped: PreppedRecipe, data: Table): Table {
  checkColumns(data, prepped.variables, true);

  let current = data;
  for (const step of prepped.steps) {
    current = step.bake(current);
  }
  return current;
}

export interface StepLogOptions {
  /** Logarithm base, natural log by default */
  base?: number;
}

/**
 * Log-transform numeric columns in place.
 * Columns absent at bake time (e.g. an outcome during prediction) are skipped.
 */
export function stepLog(columns: readonly string[], options: StepLogOptions = {}): RecipeStep {
  const { base } = options;
  if (base !== undefined && (!(base > 0) || base === 1)) {
    throw new RecipeError(`\`base\` must be a positive number other than 1, got: ${base}`);
  }
  const target = Object.freeze([...columns]);

  return Object.freeze({
    kind: "log",
    columns: target,
    prep(data: Table): TrainedStep {
      for (const column of target) {
        if (!hasColumn(data, column)) {
          throw new RecipeError(`step_log: column \`${column}\` not found`);
        }
        if (columnType(data, column) !== "numeric") {
          throw new RecipeError(`step_log: column \`${column}\` must be numeric`);
        }
      }
      const divisor = base === undefined ? 1 : Math.log(base);
      return Object.freeze({
        kind: "log",
        columns: target,
        bake(input: Table): Table {
          const present = target.filter((column) => hasColumn(input, column));
          const logged = new Map(
            present.map((column) => [
              column,
              numericColumn(input, column).map((value) =>
                value === null ? null : Math.log(value) / divisor
              ),
            ] as const)
          );
          const rows: Row[] = input.rows.map((row, index) => {
            const next: Record<string, CellValue> = { ...row };
            for (const [column, values] of logged) {
              next[column] = values[index] ?? null;
            }
            return next;
          });
          return { columns: input.columns, rows };
        },
      });
    },
  });
}
