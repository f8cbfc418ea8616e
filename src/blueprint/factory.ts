/**
 * Blueprint factories.
 *
 * Options are validated against the schema, defaults are filled in and the
 * result is frozen. Callers that want a different setting build a new
 * blueprint (or use `updateFormulaBlueprint`), they never edit one.
 */

import type { ZodIssue } from "zod";
import { formatIssueList, formatZodIssues, type ValidationIssue } from "../utils/issues.js";
import {
  FormulaBlueprintOptionsSchema,
  RecipeBlueprintOptionsSchema,
  type Blueprint,
  type FormulaBlueprint,
  type FormulaBlueprintOptions,
  type RecipeBlueprint,
  type RecipeBlueprintOptions,
} from "./schema.js";

export class BlueprintError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = "BlueprintError";
    this.issues = issues;
  }

  format(): string {
    return formatIssueList("Blueprint validation failed:", this.issues);
  }
}

function invalid(kind: Blueprint["kind"], zodIssues: ZodIssue[]): BlueprintError {
  const issues = formatZodIssues(zodIssues);
  return new BlueprintError(
    `Invalid ${kind} blueprint options: ${issues.length} validation error(s)`,
    issues
  );
}

/**
 * Build the blueprint used by formula preprocessors.
 *
 * @throws BlueprintError on unknown or mistyped options
 */
export function defaultFormulaBlueprint(options: FormulaBlueprintOptions = {}): FormulaBlueprint {
  const result = FormulaBlueprintOptionsSchema.safeParse(options);
  if (!result.success) {
    throw invalid("formula", result.error.issues);
  }
  return Object.freeze({ kind: "formula" as const, ...result.data });
}

/**
 * Build the blueprint used by recipe preprocessors.
 *
 * @throws BlueprintError on unknown or mistyped options
 */
export function defaultRecipeBlueprint(options: RecipeBlueprintOptions = {}): RecipeBlueprint {
  const result = RecipeBlueprintOptionsSchema.safeParse(options);
  if (!result.success) {
    throw invalid("recipe", result.error.issues);
  }
  return Object.freeze({ kind: "recipe" as const, ...result.data });
}

/**
 * Copy a formula blueprint with some settings replaced.
 */
export function updateFormulaBlueprint(
  blueprint: FormulaBlueprint,
  changes: Partial<Omit<FormulaBlueprint, "kind">>
): FormulaBlueprint {
  return defaultFormulaBlueprint({
    intercept: changes.intercept ?? blueprint.intercept,
    allowNovelLevels: changes.allowNovelLevels ?? blueprint.allowNovelLevels,
    indicators: changes.indicators ?? blueprint.indicators,
  });
}

export function isFormulaBlueprint(value: unknown): value is FormulaBlueprint {
  return (
    value !== null &&
    typeof value === "object" &&
    Reflect.get(value, "kind") === "formula" &&
    FormulaBlueprintOptionsSchema.safeParse(withoutKind(value)).success
  );
}

export function isRecipeBlueprint(value: unknown): value is RecipeBlueprint {
  return (
    value !== null &&
    typeof value === "object" &&
    Reflect.get(value, "kind") === "recipe" &&
    RecipeBlueprintOptionsSchema.safeParse(withoutKind(value)).success
  );
}

function withoutKind(value: object): Record<string, unknown> {
  const copy: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (key !== "kind") {
      copy[key] = entry;
    }
  }
  return copy;
}
