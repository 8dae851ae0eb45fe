import { v7 as uuidv7 } from "uuid";

/**
 * Trailing hex digits of a UUIDv7. The leading digits encode the timestamp,
 * so the tail is where ids generated together differ.
 */
function randomHex(length: number): string {
  return uuidv7().replace(/-/g, "").slice(-length);
}

export function generateRunId(): string {
  return `run-${randomHex(12)}`;
}

export function generateTaskId(): string {
  return `task-${randomHex(8)}`;
}
