/**
 * Dataset Tests
 *
 * Run: node --import tsx --test src/data/table.test.ts
 *
 * Tests cover:
 *   1. Building tables from rows and from columns
 *   2. Column type, level and numeric helpers
 *   3. Loading raw JSON records with structured validation errors
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import {
  columnLevels,
  columnType,
  DatasetError,
  DatasetValidationError,
  isTable,
  loadDataset,
  numericColumn,
  selectColumns,
  tableFromColumns,
  tableFromRows,
} from "./index.js";

describe("tableFromRows", () => {
  it("takes column order from the first record", () => {
    const table = tableFromRows([
      { b: 1, a: "x" },
      { a: "y", b: 2 },
    ]);
    assert.deepEqual(table.columns, ["b", "a"]);
    assert.deepEqual(table.rows[1], { a: "y", b: 2 });
  });

  it("rejects records with missing or extra columns", () => {
    assert.throws(() => tableFromRows([{ a: 1, b: 2 }, { a: 3 }]), {
      name: "DatasetError",
      message: "Row 2 is missing column `b`",
    });
    assert.throws(() => tableFromRows([{ a: 1 }, { a: 3, c: 4 }]), {
      message: "Row 2 has unexpected column `c`",
    });
  });
});

describe("tableFromColumns", () => {
  it("transposes column vectors into rows", () => {
    const table = tableFromColumns([
      ["x", [1, 2]],
      ["g", ["a", null]],
    ]);
    assert.deepEqual(table.rows, [
      { x: 1, g: "a" },
      { x: 2, g: null },
    ]);
  });

  it("rejects columns of different lengths", () => {
    assert.throws(
      () =>
        tableFromColumns([
          ["x", [1, 2]],
          ["y", [1]],
        ]),
      { message: "Columns must have equal lengths, got: x=2, y=1" }
    );
  });
});

describe("column helpers", () => {
  const table = tableFromColumns([
    ["n", [3, null, 1]],
    ["g", ["b", "a", "b"]],
  ]);

  it("types a column with any string as categorical", () => {
    assert.equal(columnType(table, "n"), "numeric");
    assert.equal(columnType(table, "g"), "categorical");
  });

  it("lists sorted distinct levels", () => {
    assert.deepEqual(columnLevels(table, "g"), ["a", "b"]);
  });

  it("numericColumn keeps nulls and rejects strings", () => {
    assert.deepEqual(numericColumn(table, "n"), [3, null, 1]);
    assert.throws(() => numericColumn(table, "g"), {
      message: 'Column `g` must be numeric, found "b" in row 1',
    });
  });

  it("selectColumns reorders and rejects unknown columns", () => {
    assert.deepEqual(selectColumns(table, ["g", "n"]).rows[0], { g: "b", n: 3 });
    assert.throws(() => selectColumns(table, ["z"]), DatasetError);
  });

  it("isTable checks the shape", () => {
    assert.equal(isTable(table), true);
    assert.equal(isTable({ columns: [1], rows: [] }), false);
    assert.equal(isTable([]), false);
  });
});

describe("loadDataset", () => {
  it("accepts an array of flat records", () => {
    const table = loadDataset([{ y: 1, g: "a", z: null }]);
    assert.deepEqual(table.columns, ["y", "g", "z"]);
  });

  it("reports every invalid cell", () => {
    try {
      loadDataset([{ y: true }, { y: [1] }]);
      assert.fail("expected DatasetValidationError");
    } catch (err) {
      assert.ok(err instanceof DatasetValidationError);
      assert.deepEqual(
        err.issues.map((issue) => issue.path),
        [
          [0, "y"],
          [1, "y"],
        ]
      );
      assert.ok(err.format().startsWith("Dataset validation failed:\n  - 0.y: "));
    }
  });

  it("rejects an empty dataset", () => {
    assert.throws(() => loadDataset([]), {
      name: "DatasetValidationError",
      message: "Invalid dataset: 1 validation error(s)",
    });
  });
});
