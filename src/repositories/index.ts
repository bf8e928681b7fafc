import { createMongooseRepositories } from './mongoose.js';
import type { Repositories } from './types.js';

export type * from './types.js';

let current: Repositories = createMongooseRepositories();

/**
 * Active persistence backend. Services resolve it per call so it can be swapped
 * (e.g. for in-memory repositories under test).
 */
export function repositories(): Repositories {
  return current;
}

export function setRepositories(next: Repositories): void {
  current = next;
}
