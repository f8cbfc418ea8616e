/**
 * Blueprint schema definitions.
 *
 * A blueprint describes how raw tabular data is encoded into the numeric
 * design matrix handed to a model. There is one blueprint kind per
 * preprocessor kind:
 *
 * - FORMULA blueprints control the intercept column, whether unseen
 *   categorical levels are tolerated at prediction time, and whether
 *   categorical predictors are expanded into indicator columns.
 *
 * - RECIPE blueprints have no `indicators` setting. A recipe states its
 *   own encoding through its steps, so nothing outside the recipe expands
 *   its factors.
 *
 * Blueprints are frozen once built. A changed setting means a new
 * blueprint object.
 */

import { z } from "zod";

export const FormulaBlueprintOptionsSchema = z
  .object({
    /** Add a leading `(Intercept)` column of ones to the predictors */
    intercept: z.boolean().default(false).describe("Add an intercept column"),

    /** Accept categorical levels at prediction time that training never saw */
    allowNovelLevels: z
      .boolean()
      .default(false)
      .describe("Tolerate unseen categorical levels when forging new data"),

    /** Expand categorical predictors into one indicator column per level */
    indicators: z
      .boolean()
      .default(true)
      .describe("Expand categorical predictors into indicator columns"),
  })
  .strict();

export type FormulaBlueprintOptions = z.input<typeof FormulaBlueprintOptionsSchema>;

export type FormulaBlueprint = Readonly<
  { kind: "formula" } & z.infer<typeof FormulaBlueprintOptionsSchema>
>;

export const RecipeBlueprintOptionsSchema = z
  .object({
    intercept: z.boolean().default(false).describe("Add an intercept column"),
    allowNovelLevels: z
      .boolean()
      .default(false)
      .describe("Tolerate unseen categorical levels when forging new data"),
  })
  .strict();

export type RecipeBlueprintOptions = z.input<typeof RecipeBlueprintOptionsSchema>;

export type RecipeBlueprint = Readonly<
  { kind: "recipe" } & z.infer<typeof RecipeBlueprintOptionsSchema>
>;

export type Blueprint = FormulaBlueprint | RecipeBlueprint;
