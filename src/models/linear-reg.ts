/**
 * Linear regression specification.
 *
 * `linearReg()` describes the model; the "lm" engine fits it by ordinary
 * least squares. An intercept is always estimated; an `(Intercept)` column
 * from the mold (a blueprint with `intercept: true`) is taken as that one.
 *
 * Columns that are linear combinations of earlier ones are aliased: they
 * are left out of the solve and their coefficient is null. A full set of
 * indicators next to the intercept loses its last level this way.
 *
 * The lm engine needs numeric predictors, so it asks for indicator
 * columns. Without an engine the spec reports no encoding preference and
 * cannot be fit.
 */

import { numericColumn, type Table } from "../data/index.js";
import { INTERCEPT_COLUMN } from "../preprocessing/index.js";
import { EngineError, type EncodingInfo, type ModelSpec } from "./spec.js";

export const LINEAR_REG_ENGINES = ["lm"] as const;

export type LinearRegEngine = (typeof LINEAR_REG_ENGINES)[number];

export interface LinearRegOptions {
  engine?: LinearRegEngine | null;
}

export interface LinearRegFit {
  /** Coefficients keyed by predictor column, intercept first; null when aliased */
  readonly coefficients: Readonly<Record<string, number | null>>;
  /** Predictor columns left out because they were collinear with earlier ones */
  readonly aliased: readonly string[];
  /** Predictor columns in coefficient order, without the intercept */
  readonly predictors: readonly string[];
  readonly outcome: string;
  readonly fittedValues: readonly number[];
  readonly residuals: readonly number[];
  /** Residual degrees of freedom */
  readonly dfResidual: number;
}

const SINGULAR_TOLERANCE = 1e-10;

/**
 * Solve the square system `a x = b` by Gaussian elimination with partial
 * pivoting. Returns null when the system is singular.
 */
export function solveLinearSystem(a: readonly (readonly number[])[], b: readonly number[]): number[] | null {
  const n = b.length;
  const m = a.map((row, i) => [...row, b[i] ?? 0]);
  const scale = Math.max(1, ...m.flatMap((row) => row.slice(0, n).map(Math.abs)));

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(m[row]?.[col] ?? 0) > Math.abs(m[pivot]?.[col] ?? 0)) {
        pivot = row;
      }
    }
    const pivotRow = m[pivot];
    const current = m[col];
    if (pivotRow === undefined || current === undefined) {
      return null;
    }
    const pivotValue = pivotRow[col] ?? 0;
    if (Math.abs(pivotValue) < SINGULAR_TOLERANCE * scale) {
      return null;
    }
    m[col] = pivotRow;
    m[pivot] = current;

    for (let row = col + 1; row < n; row++) {
      const target = m[row];
      if (target === undefined) {
        continue;
      }
      const factor = (target[col] ?? 0) / pivotValue;
      for (let k = col; k <= n; k++) {
        target[k] = (target[k] ?? 0) - factor * (pivotRow[k] ?? 0);
      }
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let row = n - 1; row >= 0; row--) {
    const r = m[row];
    if (r === undefined) {
      return null;
    }
    let sum = r[n] ?? 0;
    for (let k = row + 1; k < n; k++) {
      sum -= (r[k] ?? 0) * (x[k] ?? 0);
    }
    x[row] = sum / (r[row] ?? 1);
  }
  return x;
}

function requireComplete(values: (number | null)[], column: string, engine: string): number[] {
  return values.map((value, index) => {
    if (value === null || !Number.isFinite(value)) {
      throw new EngineError(
        `${engine}: column \`${column}\` has a missing or non-finite value in row ${index + 1}`,
        engine
      );
    }
    return value;
  });
}

function numericPredictor(predictors: Table, column: string, engine: string): number[] {
  try {
    return requireComplete(numericColumn(predictors, column), column, engine);
  } catch (err) {
    if (err instanceof EngineError) {
      throw err;
    }
    throw new EngineError(
      `${engine}: predictor \`${column}\` is not numeric; encode it with indicator columns first`,
      engine
    );
  }
}

/**
 * Indices of the design columns to estimate, in order. A column is dropped
 * when it is a linear combination of the columns kept before it.
 */
function independentColumns(xtx: readonly (readonly number[])[]): number[] {
  const kept: number[] = [];
  for (let j = 0; j < xtx.length; j++) {
    const trial = [...kept, j];
    const sub = trial.map((r) => trial.map((c) => xtx[r]?.[c] ?? 0));
    if (solveLinearSystem(sub, trial.map(() => 0)) !== null) {
      kept.push(j);
    }
  }
  return kept;
}

function fitLm(predictors: Table, outcomes: Table): LinearRegFit {
  const outcome = outcomes.columns[0];
  if (outcome === undefined || outcomes.columns.length !== 1) {
    throw new EngineError(
      `lm: expected exactly one outcome column, got ${outcomes.columns.length}`,
      "lm"
    );
  }
  const y = requireComplete(numericColumn(outcomes, outcome), outcome, "lm");

  const names = predictors.columns.filter((name) => name !== INTERCEPT_COLUMN);
  const design: number[][] = y.map(() => [1]);
  for (const name of names) {
    const values = numericPredictor(predictors, name, "lm");
    values.forEach((value, i) => design[i]?.push(value));
  }

  const p = names.length + 1;
  if (y.length <= p - 1) {
    throw new EngineError(
      `lm: ${y.length} observation(s) are not enough to estimate ${p} coefficients`,
      "lm"
    );
  }

  // Normal equations: (X'X) beta = X'y
  const xtx: number[][] = Array.from({ length: p }, () => new Array<number>(p).fill(0));
  const xty = new Array<number>(p).fill(0);
  design.forEach((row, i) => {
    const yi = y[i] ?? 0;
    for (let j = 0; j < p; j++) {
      const xij = row[j] ?? 0;
      xty[j] = (xty[j] ?? 0) + xij * yi;
      const xtxRow = xtx[j];
      if (xtxRow === undefined) {
        continue;
      }
      for (let k = 0; k < p; k++) {
        xtxRow[k] = (xtxRow[k] ?? 0) + xij * (row[k] ?? 0);
      }
    }
  });

  const kept = independentColumns(xtx);
  const solved = solveLinearSystem(
    kept.map((r) => kept.map((c) => xtx[r]?.[c] ?? 0)),
    kept.map((r) => xty[r] ?? 0)
  );
  if (solved === null) {
    throw new EngineError("lm: the design matrix could not be solved", "lm");
  }
  const beta: (number | null)[] = new Array<number | null>(p).fill(null);
  kept.forEach((column, i) => {
    beta[column] = solved[i] ?? 0;
  });

  const coefficients: Record<string, number | null> = { [INTERCEPT_COLUMN]: beta[0] ?? null };
  names.forEach((name, j) => {
    coefficients[name] = beta[j + 1] ?? null;
  });

  const fittedValues = design.map((row) => row.reduce((sum, x, j) => sum + x * (beta[j] ?? 0), 0));
  const residuals = y.map((yi, i) => yi - (fittedValues[i] ?? 0));

  return Object.freeze({
    coefficients: Object.freeze(coefficients),
    aliased: Object.freeze(names.filter((_, j) => beta[j + 1] === null)),
    predictors: Object.freeze(names),
    outcome,
    fittedValues: Object.freeze(fittedValues),
    residuals: Object.freeze(residuals),
    dfResidual: y.length - kept.length,
  });
}

function predictLm(fit: LinearRegFit, predictors: Table): number[] {
  const columns = fit.predictors.map((name) => numericPredictor(predictors, name, "lm"));
  return predictors.rows.map((_, i) =>
    fit.predictors.reduce(
      (sum, name, j) => sum + (fit.coefficients[name] ?? 0) * (columns[j]?.[i] ?? 0),
      fit.coefficients[INTERCEPT_COLUMN] ?? 0
    )
  );
}

/**
 * Describe a linear regression model.
 */
export function linearReg(options: LinearRegOptions = {}): ModelSpec<LinearRegFit> {
  const engine = options.engine ?? null;

  return Object.freeze({
    name: "linear_reg",
    mode: "regression" as const,
    engine,

    requiredEncoding(): EncodingInfo | undefined {
      return engine === null ? undefined : { indicators: true };
    },

    fit(predictors: Table, outcomes: Table): LinearRegFit {
      if (engine === null) {
        throw new EngineError(
          "linear_reg: an engine must be set before fitting (available: lm)",
          engine
        );
      }
      return fitLm(predictors, outcomes);
    },

    predict(fit: LinearRegFit, predictors: Table): number[] {
      return predictLm(fit, predictors);
    },
  });
}
