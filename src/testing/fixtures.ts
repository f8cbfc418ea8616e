/**
 * Shared test data and stand-in models.
 */

import { tableFromColumns, type Table } from "../data/index.js";
import { createLogger, type Logger } from "../logging/index.js";
import type { ModelSpec } from "../models/index.js";

/**
 * mpg falls by exactly 3.5 per cylinder on average: least squares of
 * `mpg ~ cyl` gives intercept 42 and slope -3.5.
 */
export const cars: Table = tableFromColumns([
  ["mpg", [30, 26, 22, 20, 16, 12]],
  ["cyl", [4, 4, 6, 6, 8, 8]],
  ["disp", [100, 120, 180, 200, 300, 360]],
]);

/**
 * Sepal.Length = 2 + Sepal.Width + (0 | 1 | 2 by Species), without noise.
 */
export const flowers: Table = tableFromColumns([
  ["Sepal.Length", [5.0, 5.4, 5.8, 6.2, 7.0, 6.6]],
  ["Sepal.Width", [3.0, 3.4, 2.8, 3.2, 3.0, 2.6]],
  ["Species", ["setosa", "setosa", "versicolor", "versicolor", "virginica", "virginica"]],
]);

export interface MeanForestFit {
  readonly predictors: readonly string[];
  readonly mean: number;
}

/**
 * A tree-style model that takes categorical predictors as they are. It
 * "fits" the outcome mean.
 */
export function meanForest(): ModelSpec<MeanForestFit> {
  return Object.freeze({
    name: "rand_forest",
    mode: "regression" as const,
    engine: "ranger",
    requiredEncoding: () => ({ indicators: false }),
    fit(predictors: Table, outcomes: Table): MeanForestFit {
      const outcome = outcomes.columns[0] ?? "";
      const values = outcomes.rows.map((row) => Number(row[outcome]));
      return {
        predictors: predictors.columns,
        mean: values.reduce((sum, value) => sum + value, 0) / values.length,
      };
    },
    predict(fit: MeanForestFit, predictors: Table): number[] {
      return predictors.rows.map(() => fit.mean);
    },
  });
}

/**
 * A logger that drops everything.
 */
export function silentLogger(): Logger {
  return createLogger({ console: false, file: false });
}
