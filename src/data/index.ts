/**
 * Dataset representation shared by every stage.
 */

export {
  tableFromRows,
  tableFromColumns,
  hasColumn,
  columnValues,
  columnType,
  columnLevels,
  numericColumn,
  selectColumns,
  isTable,
  isEmptyTable,
  DatasetError,
  type CellValue,
  type Row,
  type Table,
  type ColumnType,
} from "./table.js";

export {
  CellValueSchema,
  DatasetSchema,
  DatasetValidationError,
  loadDataset,
  type DatasetRecords,
} from "./schema.js";
