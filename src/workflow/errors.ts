/**
 * Workflow errors.
 *
 * Every failure the workflow core raises itself is a WorkflowError with a
 * stable `code`. All of them are deterministic: the same workflow and
 * inputs fail the same way, so none is worth retrying.
 *
 * Errors raised by collaborators (FormulaError, RecipeError, ForgeError,
 * EngineError, DatasetError) are not wrapped and reach the caller as thrown.
 */

import type { PreprocessorKind } from "./types.js";

export type WorkflowErrorCode =
  | "INVALID_WORKFLOW"
  | "INVALID_MODEL_SPEC"
  | "DUPLICATE_PREPROCESSOR"
  | "DUPLICATE_MODEL"
  | "MISSING_PREPROCESSOR"
  | "MISSING_MODEL"
  | "MISSING_DATA"
  | "MISSING_ARTIFACT"
  | "WRONG_PREPROCESSOR_KIND"
  | "NOT_PRESENT";

export class WorkflowError extends Error {
  public readonly code: WorkflowErrorCode;

  constructor(code: WorkflowErrorCode, message: string) {
    super(message);
    this.name = "WorkflowError";
    this.code = code;
  }
}

export class InvalidWorkflowError extends WorkflowError {
  constructor(what: string) {
    super("INVALID_WORKFLOW", `Expected a workflow created with \`workflow()\`, got ${what}.`);
    this.name = "InvalidWorkflowError";
  }
}

export class InvalidModelSpecError extends WorkflowError {
  constructor() {
    super(
      "INVALID_MODEL_SPEC",
      "`spec` must be a model specification with `name`, `mode`, `engine` and a `fit()` method."
    );
    this.name = "InvalidModelSpecError";
  }
}

/**
 * An action was added where one already exists and overwriting was not allowed.
 */
export class DuplicateActionError extends WorkflowError {
  constructor(code: "DUPLICATE_PREPROCESSOR" | "DUPLICATE_MODEL", message: string) {
    super(code, message);
    this.name = "DuplicateActionError";
  }
}

export class DuplicatePreprocessorError extends DuplicateActionError {
  public readonly existing: PreprocessorKind;
  public readonly attempted: PreprocessorKind;

  constructor(existing: PreprocessorKind, attempted: PreprocessorKind) {
    const message =
      existing === attempted
        ? `A \`${existing}\` action has already been added to this workflow.`
        : `A \`${attempted}\` cannot be added when a \`${existing}\` already exists.`;
    super(
      "DUPLICATE_PREPROCESSOR",
      `${message} Pass \`{ overwrite: true }\` or remove the \`${existing}\` first.`
    );
    this.name = "DuplicatePreprocessorError";
    this.existing = existing;
    this.attempted = attempted;
  }
}

export class DuplicateModelError extends DuplicateActionError {
  constructor() {
    super(
      "DUPLICATE_MODEL",
      "A `model` action has already been added to this workflow. " +
        "Pass `{ overwrite: true }` or remove the model first."
    );
    this.name = "DuplicateModelError";
  }
}

export class MissingPreprocessorError extends WorkflowError {
  constructor() {
    super(
      "MISSING_PREPROCESSOR",
      "The workflow must have a formula or recipe preprocessor. " +
        "Provide one with `addFormula()` or `addRecipe()`."
    );
    this.name = "MissingPreprocessorError";
  }
}

export class MissingModelError extends WorkflowError {
  constructor() {
    super("MISSING_MODEL", "The workflow must have a model. Provide one with `addModel()`.");
    this.name = "MissingModelError";
  }
}

export class MissingDataError extends WorkflowError {
  constructor(message = "`data` must be provided to fit a workflow.") {
    super("MISSING_DATA", message);
    this.name = "MissingDataError";
  }
}

export class MissingArtifactError extends WorkflowError {
  constructor() {
    super(
      "MISSING_ARTIFACT",
      "The workflow does not have a mold yet. Call `fitPre()` before `fitModel()`."
    );
    this.name = "MissingArtifactError";
  }
}

export class WrongPreprocessorKindError extends WorkflowError {
  public readonly expected: PreprocessorKind;

  constructor(expected: PreprocessorKind) {
    super("WRONG_PREPROCESSOR_KIND", `The workflow must have a ${expected} preprocessor.`);
    this.name = "WrongPreprocessorKindError";
    this.expected = expected;
  }
}

/**
 * Something was requested from a workflow before the stage that produces it ran.
 */
export class NotPresentError extends WorkflowError {
  public readonly element: string;

  constructor(element: string, hint?: string) {
    super(
      "NOT_PRESENT",
      hint === undefined
        ? `The workflow does not have a ${element}.`
        : `The workflow does not have a ${element}. ${hint}`
    );
    this.name = "NotPresentError";
    this.element = element;
  }
}
