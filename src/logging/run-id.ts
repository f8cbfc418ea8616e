/**
 * Run ID generation and management.
 * Every fit session gets a run ID so its log lines can be grouped.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Start a new run. Pass an explicit ID to reuse one issued elsewhere.
 */
export function initRunId(runId: string = generateRunId()): string {
  currentRunId = runId;
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
