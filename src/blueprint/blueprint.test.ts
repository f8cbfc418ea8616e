/**
 * Blueprint Tests
 *
 * Run: node --import tsx --test src/blueprint/blueprint.test.ts
 *
 * Tests cover:
 *   1. Default factories and option validation
 *   2. Resolution of default formula blueprints against a model's encoding
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { linearReg } from "../models/index.js";
import { recipe } from "../preprocessing/index.js";
import { cars, meanForest } from "../testing/fixtures.js";
import type { FormulaAction, RecipeAction } from "../workflow/types.js";
import {
  BlueprintError,
  defaultFormulaBlueprint,
  defaultRecipeBlueprint,
  isFormulaBlueprint,
  isRecipeBlueprint,
  resolveBlueprint,
  updateFormulaBlueprint,
} from "./index.js";

describe("blueprint factories", () => {
  it("fills formula defaults and freezes the result", () => {
    const blueprint = defaultFormulaBlueprint();
    assert.deepEqual(blueprint, {
      kind: "formula",
      intercept: false,
      allowNovelLevels: false,
      indicators: true,
    });
    assert.ok(Object.isFrozen(blueprint));
  });

  it("recipe blueprints have no indicators setting", () => {
    assert.deepEqual(defaultRecipeBlueprint({ intercept: true }), {
      kind: "recipe",
      intercept: true,
      allowNovelLevels: false,
    });
  });

  it("rejects unknown options", () => {
    const options = { intercept: true, indicators: false };
    try {
      defaultRecipeBlueprint(options);
      assert.fail("expected BlueprintError");
    } catch (err) {
      assert.ok(err instanceof BlueprintError);
      assert.equal(err.message, "Invalid recipe blueprint options: 1 validation error(s)");
      assert.equal(err.issues[0]?.code, "unrecognized_keys");
    }
  });

  it("updateFormulaBlueprint returns a new blueprint", () => {
    const original = defaultFormulaBlueprint();
    const updated = updateFormulaBlueprint(original, { indicators: false });
    assert.notEqual(updated, original);
    assert.equal(updated.indicators, false);
    assert.equal(original.indicators, true);
  });

  it("guards tell the kinds apart", () => {
    assert.equal(isFormulaBlueprint(defaultFormulaBlueprint()), true);
    assert.equal(isFormulaBlueprint(defaultRecipeBlueprint()), false);
    assert.equal(isRecipeBlueprint(defaultRecipeBlueprint()), true);
    assert.equal(isRecipeBlueprint({ kind: "recipe", intercept: "yes" }), false);
  });
});

describe("resolveBlueprint", () => {
  const formulaAction = (source: "default" | "user", indicators = true): FormulaAction => ({
    kind: "formula",
    formula: "mpg ~ cyl",
    blueprint: defaultFormulaBlueprint({ indicators }),
    blueprintSource: source,
  });

  it("adjusts a default formula blueprint to the model", () => {
    const action = formulaAction("default");
    const resolved = resolveBlueprint(action, meanForest());
    assert.equal(resolved.indicators, false);
    assert.equal(action.blueprint.indicators, true);
  });

  it("returns the same object when nothing changes", () => {
    const action = formulaAction("default");
    assert.equal(resolveBlueprint(action, linearReg({ engine: "lm" })), action.blueprint);
  });

  it("leaves the default alone when the model has no engine", () => {
    const action = formulaAction("default", false);
    assert.equal(resolveBlueprint(action, linearReg()), action.blueprint);
    assert.equal(resolveBlueprint(action), action.blueprint);
  });

  it("never adjusts a caller's blueprint", () => {
    const action = formulaAction("user");
    assert.equal(resolveBlueprint(action, meanForest()), action.blueprint);
  });

  it("never adjusts a recipe blueprint", () => {
    const action: RecipeAction = {
      kind: "recipe",
      recipe: recipe("mpg ~ cyl", cars),
      blueprint: defaultRecipeBlueprint(),
      blueprintSource: "default",
    };
    assert.equal(resolveBlueprint(action, meanForest()), action.blueprint);
  });
});
