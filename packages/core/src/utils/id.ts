import { randomUUID } from 'node:crypto';

/**
 * Generate a unique id for changes, messages, devices and OR-Set tags
 */
export function generateId(): string {
  return randomUUID();
}
