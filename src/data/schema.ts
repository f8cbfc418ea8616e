/**
 * Schema for datasets supplied as JSON (an array of flat records).
 */

import { z } from "zod";
import { formatIssueList, formatZodIssues, type ValidationIssue } from "../utils/issues.js";
import { tableFromRows, type Table } from "./table.js";

export const CellValueSchema = z.union([z.number(), z.string(), z.null()]);

export const DatasetSchema = z
  .array(z.record(z.string(), CellValueSchema))
  .min(1, "Dataset must contain at least one row");

export type DatasetRecords = z.infer<typeof DatasetSchema>;

export class DatasetValidationError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.name = "DatasetValidationError";
    this.issues = issues;
  }

  format(): string {
    return formatIssueList("Dataset validation failed:", this.issues);
  }
}

/**
 * Validate raw input and convert it into a Table.
 *
 * @throws DatasetValidationError if the input is not an array of flat records
 * @throws DatasetError if records disagree on their columns
 */
export function loadDataset(input: unknown): Table {
  const result = DatasetSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new DatasetValidationError(
      `Invalid dataset: ${issues.length} validation error(s)`,
      issues
    );
  }
  return tableFromRows(result.data);
}
