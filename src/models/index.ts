/**
 * Model specifications and the reference engines.
 */

export {
  EngineError,
  isModelSpec,
  describeSpec,
  type EncodingInfo,
  type ModelFit,
  type ModelMode,
  type ModelSpec,
} from "./spec.js";

export {
  linearReg,
  solveLinearSystem,
  LINEAR_REG_ENGINES,
  type LinearRegEngine,
  type LinearRegFit,
  type LinearRegOptions,
} from "./linear-reg.js";
