/**
 * ID helpers for runs and sim events. Ids never draw from the simulation's
 * random source.
 */

/**
 * Format: run-timestamp-randomSuffix
 */
export function generateRunId(): string {
  return `run-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Format: timestamp-randomSuffix
 */
export function generateEventId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}
