/**
 * Prediction on new data with a fitted workflow.
 */

import { tableFromColumns, type Table } from "../data/index.js";
import { EngineError } from "../models/index.js";
import { forge } from "../preprocessing/index.js";
import { validateHasFit, validateHasMold, validateIsWorkflow } from "./stage.js";
import type { Workflow } from "./types.js";

export const PREDICTION_COLUMN = ".pred";

/**
 * Encode `newData` exactly as the training data was encoded, then predict.
 * Returns a table with a single `.pred` column, one row per input row.
 *
 * @throws NotPresentError when the workflow has not been fit
 * @throws ForgeError when `newData` lacks columns or has unseen levels
 * @throws EngineError when the model cannot predict
 */
export function predictWorkflow<TFit>(wf: Workflow<TFit>, newData: Table): Table {
  validateIsWorkflow(wf);
  const modelFit = validateHasFit(wf);
  const mold = validateHasMold(wf);

  const { spec } = modelFit;
  if (spec.predict === undefined) {
    throw new EngineError(`${spec.name} does not support prediction`, spec.engine);
  }

  const predictors = forge(mold, newData);
  const predictions = spec.predict(modelFit.fit, predictors);
  if (predictions.length !== newData.rows.length) {
    throw new EngineError(
      `${spec.name} returned ${predictions.length} prediction(s) for ${newData.rows.length} row(s)`,
      spec.engine
    );
  }
  return tableFromColumns([[PREDICTION_COLUMN, predictions]]);
}
