/**
 * Config Store
 *
 * Scoped key-value settings. A key is unique within its scope.
 */

import type { ConfigEntry } from '@quarry/common';
import type { StorageHandle } from '../database.js';

export const GLOBAL_SCOPE = 'global';

export class ConfigStore {
  constructor(private readonly db: StorageHandle) {}

  set(key: string, value: string, scope: string = GLOBAL_SCOPE): ConfigEntry {
    this.db.execute(
      `INSERT INTO configs (scope, key, value) VALUES (?, ?, ?)
       ON CONFLICT(scope, key) DO UPDATE SET value = excluded.value`,
      [scope, key, value]
    );
    return { scope, key, value };
  }

  get(key: string, scope: string = GLOBAL_SCOPE): string | undefined {
    const row = this.db.queryOne<{ value: string }>(
      'SELECT value FROM configs WHERE scope = ? AND key = ?',
      [scope, key]
    );
    return row?.value;
  }

  /**
   * List entries, optionally within one scope
   */
  list(scope?: string): ConfigEntry[] {
    return scope
      ? this.db.query<ConfigEntry>(
          'SELECT scope, key, value FROM configs WHERE scope = ? ORDER BY key',
          [scope]
        )
      : this.db.query<ConfigEntry>('SELECT scope, key, value FROM configs ORDER BY scope, key');
  }

  delete(key: string, scope: string = GLOBAL_SCOPE): boolean {
    return this.db.execute('DELETE FROM configs WHERE scope = ? AND key = ?', [scope, key]).changes > 0;
  }
}
