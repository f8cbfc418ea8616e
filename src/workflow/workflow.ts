/**
 * Workflow construction.
 */

import { config } from "../config/index.js";
import type { DuplicatePolicy, FitStage, PreStage, Workflow } from "./types.js";

export interface WorkflowOptions {
  /** Overrides WORKFLOW_DUPLICATE_POLICY for this workflow and its descendants */
  duplicatePolicy?: DuplicatePolicy;
}

/**
 * Create an empty workflow.
 *
 * @example
 *   let wf = workflow();
 *   wf = addFormula(wf, "mpg ~ cyl");
 *   wf = addModel(wf, linearReg({ engine: "lm" }));
 *   const fitted = fit(wf, cars);
 */
export function workflow(options: WorkflowOptions = {}): Workflow<unknown> {
  return makeWorkflow({
    pre: {},
    fit: {},
    duplicatePolicy: options.duplicatePolicy ?? config.duplicatePolicy,
  });
}

/**
 * Assemble a frozen workflow from its stages. Stage slots that are
 * undefined are left out rather than stored as undefined.
 */
export function makeWorkflow<TFit>(parts: {
  pre: PreStage;
  fit: FitStage<TFit>;
  duplicatePolicy: DuplicatePolicy;
}): Workflow<TFit> {
  const { action: preAction, mold } = parts.pre;
  const { action: modelAction, fit: modelFit } = parts.fit;
  const pre: PreStage = {
    ...(preAction !== undefined ? { action: preAction } : {}),
    ...(mold !== undefined ? { mold } : {}),
  };
  const fit: FitStage<TFit> = {
    ...(modelAction !== undefined ? { action: modelAction } : {}),
    ...(modelFit !== undefined ? { fit: modelFit } : {}),
  };

  return Object.freeze({
    kind: "workflow" as const,
    pre: Object.freeze(pre),
    fit: Object.freeze(fit),
    duplicatePolicy: parts.duplicatePolicy,
  });
}

export function isWorkflow(value: unknown): value is Workflow<unknown> {
  if (value === null || typeof value !== "object") {
    return false;
  }
  const pre: unknown = Reflect.get(value, "pre");
  const fit: unknown = Reflect.get(value, "fit");
  return (
    Reflect.get(value, "kind") === "workflow" &&
    pre !== null &&
    typeof pre === "object" &&
    fit !== null &&
    typeof fit === "object"
  );
}
