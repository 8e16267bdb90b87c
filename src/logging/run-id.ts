/**
 * Run ID generation and management.
 * The process gets one run ID for tracing; every pipeline run gets its own.
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

/** Run ID of this process (CLI invocation or service start) */
let currentRunId: string | null = null;

/**
 * Initialize the process run ID.
 * Should be called once at startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the process run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
