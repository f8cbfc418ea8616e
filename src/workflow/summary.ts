/**
 * Plain-text description of a workflow's stages, for debugging.
 */

import { describeSpec } from "../models/index.js";
import { validateIsWorkflow } from "./stage.js";
import type { PreprocessorAction, Workflow } from "./types.js";

function describePreprocessor(action: PreprocessorAction): string[] {
  const { blueprint } = action;
  const flags = [`intercept: ${blueprint.intercept}`, `allowNovelLevels: ${blueprint.allowNovelLevels}`];
  if (blueprint.kind === "formula") {
    flags.push(`indicators: ${blueprint.indicators}`);
  }

  const lines =
    action.kind === "formula"
      ? [`Preprocessor: formula ${action.formula}`]
      : [
          `Preprocessor: recipe ${action.recipe.formula}`,
          ...action.recipe.steps.map((step) => `  step_${step.kind}: ${step.columns.join(", ")}`),
        ];
  lines.push(`  blueprint (${action.blueprintSource}): ${flags.join(", ")}`);
  return lines;
}

/**
 * Describe every stage of `wf`, one fact per line. The output only
 * depends on the workflow's contents.
 */
export function summarizeWorkflow(wf: Workflow<unknown>): string {
  validateIsWorkflow(wf);
  const lines = ["Workflow"];

  const action = wf.pre.action;
  lines.push(...(action === undefined ? ["Preprocessor: none"] : describePreprocessor(action)));

  const mold = wf.pre.mold;
  if (mold !== undefined) {
    lines.push(
      `  mold: ${mold.predictors.rows.length} rows; predictors ${mold.predictors.columns.join(", ")}; ` +
        `outcomes ${mold.outcomes.columns.join(", ")}`
    );
  }

  const model = wf.fit.action;
  lines.push(model === undefined ? "Model: none" : `Model (${model.role}): ${describeSpec(model.spec)}`);
  if (model !== undefined) {
    lines.push(wf.fit.fit === undefined ? "  not fitted" : "  fitted");
  }

  return lines.join("\n");
}
