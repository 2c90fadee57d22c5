import { getDatabase } from '../db';
import { StoreRegistry } from './index';

/**
 * Run `fn` inside a single SQLite transaction. Every store reached through
 * the callback's registry shares it; a throw rolls the whole thing back.
 *
 * @example
 * ```typescript
 * withTransaction((stores) => {
 *   for (const accountId of accountIds) {
 *     stores.teams.addRelated(teamId, 'members', accountId);
 *   }
 * });
 * ```
 */
export function withTransaction<T>(fn: (stores: StoreRegistry) => T): T {
  const db = getDatabase();
  return db.transaction(() => fn(StoreRegistry.create(db)))();
}
