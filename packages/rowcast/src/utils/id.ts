import { nanoid } from "nanoid";

/**
 * Generates a new unique ID.
 *
 * Used for the `operationId` of execution hook contexts.
 */
export function generateId(): string {
  return nanoid();
}
