/**
 * Model specification contract.
 *
 * A ModelSpec is an untrained, engine-tagged description of a model. The
 * workflow core never looks models up in a registry: everything it needs
 * to know about a model it asks the spec itself.
 *
 * - `requiredEncoding()` reports how the model wants categorical
 *   predictors encoded for its current mode and engine. Specs that cannot
 *   say (for example because no engine has been chosen yet) return
 *   undefined, or leave the method out.
 * - `fit()` trains the engine on an encoded predictors/outcomes pair.
 * - `predict()` is optional; workflows without it cannot predict.
 */

import type { CellValue, Table } from "../data/index.js";

export type ModelMode = "regression" | "classification" | "unknown";

/**
 * How a model wants its predictors encoded.
 */
export interface EncodingInfo {
  /** Whether categorical predictors must be expanded into indicator columns */
  readonly indicators: boolean;
}

export interface ModelSpec<TFit = unknown> {
  /** Model type, e.g. "linear_reg" */
  readonly name: string;
  readonly mode: ModelMode;
  /** Computational engine, null until one is chosen */
  readonly engine: string | null;

  requiredEncoding?(): EncodingInfo | undefined;

  fit(predictors: Table, outcomes: Table): TFit;

  predict?(fit: TFit, predictors: Table): readonly CellValue[];
}

/**
 * A trained model together with the spec that produced it.
 */
export interface ModelFit<TFit = unknown> {
  readonly spec: ModelSpec<TFit>;
  readonly fit: TFit;
  /** Wall-clock training time */
  readonly elapsedMs: number;
}

/**
 * Failure raised by a model engine while fitting or predicting.
 */
export class EngineError extends Error {
  public readonly engine: string | null;

  constructor(message: string, engine: string | null) {
    super(message);
    this.name = "EngineError";
    this.engine = engine;
  }
}

export function isModelSpec(value: unknown): value is ModelSpec {
  if (value === null || typeof value !== "object") {
    return false;
  }
  const engine: unknown = Reflect.get(value, "engine");
  return (
    typeof Reflect.get(value, "name") === "string" &&
    typeof Reflect.get(value, "mode") === "string" &&
    (engine === null || typeof engine === "string") &&
    typeof Reflect.get(value, "fit") === "function"
  );
}

export function describeSpec(spec: ModelSpec<unknown>): string {
  return `${spec.name} [engine: ${spec.engine ?? "unset"}, mode: ${spec.mode}]`;
}
