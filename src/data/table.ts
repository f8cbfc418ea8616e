/**
 * Tabular data passed into preprocessing and produced for models.
 *
 * A Table is column-named and row-oriented. Numeric columns hold numbers,
 * categorical columns hold strings; either may hold null for a missing
 * value. A column is categorical as soon as one of its values is a string.
 */

export type CellValue = number | string | null;

export type Row = Readonly<Record<string, CellValue>>;

export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

export type ColumnType = "numeric" | "categorical";

export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetError";
  }
}

/**
 * Build a table from plain records.
 * Column order comes from the first record; every record must carry
 * exactly the same keys.
 */
export function tableFromRows(rows: readonly Record<string, CellValue>[]): Table {
  const first = rows[0];
  if (first === undefined) {
    return { columns: [], rows: [] };
  }

  const columns = Object.keys(first);
  rows.forEach((row, index) => {
    for (const column of columns) {
      if (!(column in row)) {
        throw new DatasetError(`Row ${index + 1} is missing column \`${column}\``);
      }
    }
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) {
        throw new DatasetError(`Row ${index + 1} has unexpected column \`${key}\``);
      }
    }
  });

  return { columns, rows: rows.map((row) => ({ ...row })) };
}

/**
 * Build a table from named column vectors of equal length.
 */
export function tableFromColumns(columns: ReadonlyArray<readonly [string, readonly CellValue[]]>): Table {
  const lengths = new Set(columns.map(([, values]) => values.length));
  if (lengths.size > 1) {
    throw new DatasetError(
      `Columns must have equal lengths, got: ${columns
        .map(([name, values]) => `${name}=${values.length}`)
        .join(", ")}`
    );
  }

  const rowCount = columns[0]?.[1].length ?? 0;
  const rows: Row[] = [];
  for (let i = 0; i < rowCount; i++) {
    const row: Record<string, CellValue> = {};
    for (const [name, values] of columns) {
      row[name] = values[i] ?? null;
    }
    rows.push(row);
  }

  return { columns: columns.map(([name]) => name), rows };
}

export function hasColumn(table: Table, column: string): boolean {
  return table.columns.includes(column);
}

export function columnValues(table: Table, column: string): CellValue[] {
  if (!hasColumn(table, column)) {
    throw new DatasetError(`Column \`${column}\` not found`);
  }
  return table.rows.map((row) => row[column] ?? null);
}

export function columnType(table: Table, column: string): ColumnType {
  return columnValues(table, column).some((value) => typeof value === "string")
    ? "categorical"
    : "numeric";
}

/**
 * Distinct non-missing values of a categorical column, sorted.
 */
export function columnLevels(table: Table, column: string): string[] {
  const levels = new Set<string>();
  for (const value of columnValues(table, column)) {
    if (value !== null) {
      levels.add(String(value));
    }
  }
  return Array.from(levels).sort((a, b) => a.localeCompare(b));
}

/**
 * Values of a column that must be numeric. Missing values are kept as null.
 */
export function numericColumn(table: Table, column: string): (number | null)[] {
  return columnValues(table, column).map((value, index) => {
    if (value !== null && typeof value !== "number") {
      throw new DatasetError(
        `Column \`${column}\` must be numeric, found "${value}" in row ${index + 1}`
      );
    }
    return value;
  });
}

export function selectColumns(table: Table, columns: readonly string[]): Table {
  for (const column of columns) {
    if (!hasColumn(table, column)) {
      throw new DatasetError(`Column \`${column}\` not found`);
    }
  }
  return {
    columns: [...columns],
    rows: table.rows.map((row) => {
      const selected: Record<string, CellValue> = {};
      for (const column of columns) {
        selected[column] = row[column] ?? null;
      }
      return selected;
    }),
  };
}

/**
 * True when `value` has the shape of a Table. Used at the public entry
 * points where callers may pass arbitrary input.
 */
export function isTable(value: unknown): value is Table {
  if (value === null || typeof value !== "object") {
    return false;
  }
  const columns: unknown = Reflect.get(value, "columns");
  const rows: unknown = Reflect.get(value, "rows");
  return (
    Array.isArray(columns) &&
    columns.every((column) => typeof column === "string") &&
    Array.isArray(rows)
  );
}

export function isEmptyTable(table: Table): boolean {
  return table.rows.length === 0;
}
