/**
 * Run ID for log correlation.
 *
 * The CLI calls initRunId() once per invocation so every line logged while
 * generating one project carries the same tag. Library callers that never
 * initialise it get "no-run-id" in their log lines.
 */

import { randomBytes } from "node:crypto";

let currentRunId: string | null = null;

/**
 * Generate a short run ID: UTC date plus six hex characters,
 * e.g. "20240115-a1b2c3".
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replaceAll("-", "");
  return `${datePart}-${randomBytes(3).toString("hex")}`;
}

export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/** Current run ID, or null before initRunId() has been called. */
export function getRunId(): string | null {
  return currentRunId;
}
