/**
 * Molding and forging.
 *
 * `mold*()` runs a preprocessor against training data and returns a Mold:
 * the encoded predictors, the outcomes, the blueprint actually used, and
 * whatever is needed to repeat the same encoding later (formula terms and
 * column prototypes, or the prepped recipe).
 *
 * `forge()` repeats that encoding on new data, checking that the required
 * columns exist with the same types and no unseen categorical levels
 * (unless the blueprint allows them).
 *
 * Formula encoding of a categorical predictor, with `indicators` on:
 *
 * - no intercept: the first categorical term gets one column per level,
 *   later ones drop their first level;
 * - intercept: every categorical term drops its first level.
 *
 * Indicator columns are named `<column><level>`, e.g. `Speciessetosa`; a
 * name that clashes with another encoded column is a FormulaError.
 * With `indicators` off the column is passed through as is.
 */

import type { FormulaBlueprint, RecipeBlueprint } from "../blueprint/index.js";
import {
  columnLevels,
  columnType,
  columnValues,
  hasColumn,
  numericColumn,
  selectColumns,
  type CellValue,
  type Row,
  type Table,
} from "../data/index.js";
import { deepFreeze } from "../utils/immutable.js";
import {
  applyTransform,
  FormulaError,
  parseFormula,
  resolveFormula,
  type FormulaTerm,
} from "./formula.js";
import { bake, prep, type PreppedRecipe, type Recipe } from "./recipe.js";

export const INTERCEPT_COLUMN = "(Intercept)";

export type ColumnPrototype =
  | { readonly name: string; readonly type: "numeric" }
  | { readonly name: string; readonly type: "categorical"; readonly levels: readonly string[] };

export interface FormulaMold {
  readonly kind: "formula";
  readonly predictors: Table;
  readonly outcomes: Table;
  readonly blueprint: FormulaBlueprint;
  readonly formula: string;
  readonly terms: readonly FormulaTerm[];
  /** Raw predictor columns as seen in training */
  readonly ptype: readonly ColumnPrototype[];
}

export interface RecipeMold {
  readonly kind: "recipe";
  readonly predictors: Table;
  readonly outcomes: Table;
  readonly blueprint: RecipeBlueprint;
  readonly recipe: PreppedRecipe;
  readonly ptype: readonly ColumnPrototype[];
}

export type Mold = FormulaMold | RecipeMold;

/**
 * New data does not fit the shape recorded at training time.
 */
export class ForgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ForgeError";
  }
}

function buildTable(columns: ReadonlyArray<readonly [string, readonly CellValue[]]>, rowCount: number): Table {
  const rows: Row[] = [];
  for (let i = 0; i < rowCount; i++) {
    const row: Record<string, CellValue> = {};
    for (const [name, values] of columns) {
      row[name] = values[i] ?? null;
    }
    rows.push(row);
  }
  return { columns: columns.map(([name]) => name), rows };
}

function prototypes(data: Table, columns: readonly string[]): ColumnPrototype[] {
  return columns.map((name): ColumnPrototype =>
    columnType(data, name) === "categorical"
      ? { name, type: "categorical", levels: columnLevels(data, name) }
      : { name, type: "numeric" }
  );
}

function uniqueColumns(terms: readonly FormulaTerm[]): string[] {
  return Array.from(new Set(terms.map((term) => term.column)));
}

function withIntercept(table: Table): Table {
  return {
    columns: [INTERCEPT_COLUMN, ...table.columns],
    rows: table.rows.map((row) => ({ [INTERCEPT_COLUMN]: 1, ...row })),
  };
}

function encodeFormulaTerms(
  terms: readonly FormulaTerm[],
  ptype: readonly ColumnPrototype[],
  blueprint: FormulaBlueprint,
  data: Table
): Table {
  const columns: Array<readonly [string, readonly CellValue[]]> = [];
  if (blueprint.intercept) {
    columns.push([INTERCEPT_COLUMN, data.rows.map(() => 1)]);
  }

  let fullRank = !blueprint.intercept;
  for (const term of terms) {
    const proto = ptype.find((candidate) => candidate.name === term.column);
    if (proto === undefined) {
      throw new ForgeError(`No training prototype for column \`${term.column}\``);
    }

    if (proto.type === "numeric") {
      const values = numericColumn(data, term.column).map((value) =>
        value === null ? null : applyTransform(term.transform, value)
      );
      columns.push([term.label, values]);
      continue;
    }

    const values = columnValues(data, term.column);
    if (!blueprint.indicators) {
      columns.push([term.label, values]);
      continue;
    }

    const levels = fullRank ? proto.levels : proto.levels.slice(1);
    fullRank = false;
    for (const level of levels) {
      columns.push([
        `${term.column}${level}`,
        values.map((value) => (value === null ? null : value === level ? 1 : 0)),
      ]);
    }
  }

  return buildTable(columns, data.rows.length);
}

/**
 * Check new data against training prototypes.
 */
function checkPrototypes(
  ptype: readonly ColumnPrototype[],
  data: Table,
  allowNovelLevels: boolean
): void {
  const missing = ptype.filter((proto) => !hasColumn(data, proto.name)).map((proto) => proto.name);
  if (missing.length > 0) {
    throw new ForgeError(
      `The following required columns are missing: ${missing.map((name) => `'${name}'`).join(", ")}`
    );
  }

  for (const proto of ptype) {
    const values = columnValues(data, proto.name);
    if (proto.type === "numeric") {
      if (values.some((value) => typeof value === "string")) {
        throw new ForgeError(`Column \`${proto.name}\` must be numeric, as it was in training`);
      }
      continue;
    }

    if (values.some((value) => typeof value === "number")) {
      throw new ForgeError(`Column \`${proto.name}\` must be categorical, as it was in training`);
    }
    if (allowNovelLevels) {
      continue;
    }
    const novel = new Set<string>();
    for (const value of values) {
      if (typeof value === "string" && !proto.levels.includes(value)) {
        novel.add(value);
      }
    }
    if (novel.size > 0) {
      throw new ForgeError(
        `Novel levels found in column \`${proto.name}\`: ${Array.from(novel)
          .map((level) => `'${level}'`)
          .join(", ")}`
      );
    }
  }
}

/**
 * Mold training data with a formula.
 *
 * @throws FormulaError when the formula does not match the data, or two
 *   encoded columns would share a name
 */
export function moldFormula(formula: string, blueprint: FormulaBlueprint, data: Table): FormulaMold {
  const resolved = resolveFormula(parseFormula(formula), data.columns);
  const ptype = prototypes(data, uniqueColumns(resolved.terms));

  for (const term of resolved.terms) {
    const proto = ptype.find((candidate) => candidate.name === term.column);
    if (proto?.type === "categorical" && term.transform !== "identity") {
      throw new FormulaError(
        `\`${term.label}\` applies ${term.transform}() to categorical column \`${term.column}\``,
        formula
      );
    }
  }

  const predictors = encodeFormulaTerms(resolved.terms, ptype, blueprint, data);
  const repeated = predictors.columns.filter((name, i) => predictors.columns.indexOf(name) !== i);
  if (repeated.length > 0) {
    throw new FormulaError(
      `Encoded predictor names collide: ${Array.from(new Set(repeated))
        .map((name) => `'${name}'`)
        .join(", ")}`,
      formula
    );
  }

  return deepFreeze({
    kind: "formula" as const,
    predictors,
    outcomes: selectColumns(data, resolved.outcomes),
    blueprint,
    formula,
    terms: resolved.terms,
    ptype,
  });
}

/**
 * Mold training data with a recipe: prep it, bake the data, split columns
 * by role. Recipes never have their categorical columns expanded here.
 */
export function moldRecipe(rec: Recipe, blueprint: RecipeBlueprint, data: Table): RecipeMold {
  const prepped = prep(rec, data);
  const baked = bake(prepped, data);

  const namesWithRole = (role: "predictor" | "outcome"): string[] =>
    prepped.outputVariables.filter((variable) => variable.role === role).map((variable) => variable.name);

  const predictors = selectColumns(baked, namesWithRole("predictor"));
  const rawPredictors = prepped.variables
    .filter((variable) => variable.role === "predictor")
    .map((variable) => variable.name);

  return deepFreeze({
    kind: "recipe" as const,
    predictors: blueprint.intercept ? withIntercept(predictors) : predictors,
    outcomes: selectColumns(baked, namesWithRole("outcome")),
    blueprint,
    recipe: prepped,
    ptype: prototypes(data, rawPredictors),
  });
}

/**
 * Encode new data the way the mold's training data was encoded.
 * Returns the predictors only; outcome columns are not required.
 *
 * @throws ForgeError when the data does not match the training shape
 */
export function forge(mold: Mold, data: Table): Table {
  checkPrototypes(mold.ptype, data, mold.blueprint.allowNovelLevels);

  switch (mold.kind) {
    case "formula":
      return encodeFormulaTerms(mold.terms, mold.ptype, mold.blueprint, data);
    case "recipe": {
      const baked = bake(mold.recipe, data);
      const names = mold.predictors.columns.filter((name) => name !== INTERCEPT_COLUMN);
      const predictors = selectColumns(baked, names);
      return mold.blueprint.intercept ? withIntercept(predictors) : predictors;
    }
  }
}
