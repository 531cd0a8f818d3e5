/**
 * Blueprint Store
 */

import type { Blueprint } from '@quarry/common';
import { NotFoundError, parseJsonObject } from '@quarry/common';
import type { StorageHandle } from '../database.js';

interface BlueprintRow {
  id: number;
  name: string;
  stack: string;
  config_json: string;
  created_at: string;
  updated_at: string;
}

export class BlueprintStore {
  constructor(private readonly db: StorageHandle) {}

  /**
   * Create or replace a blueprint by name
   */
  upsert(blueprint: { name: string; stack: string; config: Record<string, unknown> }): Blueprint {
    const now = new Date().toISOString();

    this.db.execute(
      `INSERT INTO blueprints (name, stack, config_json, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(name) DO UPDATE SET
         stack = excluded.stack,
         config_json = excluded.config_json,
         updated_at = excluded.updated_at`,
      [blueprint.name, blueprint.stack, JSON.stringify(blueprint.config), now, now]
    );

    return this.get(blueprint.name);
  }

  get(name: string): Blueprint {
    const blueprint = this.find(name);
    if (!blueprint) {
      throw new NotFoundError('Blueprint', name);
    }
    return blueprint;
  }

  find(name: string): Blueprint | undefined {
    const row = this.db.queryOne<BlueprintRow>('SELECT * FROM blueprints WHERE name = ?', [name]);
    return row ? this.rowToBlueprint(row) : undefined;
  }

  list(stack?: string): Blueprint[] {
    const rows = stack
      ? this.db.query<BlueprintRow>('SELECT * FROM blueprints WHERE stack = ? ORDER BY name', [stack])
      : this.db.query<BlueprintRow>('SELECT * FROM blueprints ORDER BY name');

    return rows.map((row) => this.rowToBlueprint(row));
  }

  delete(name: string): boolean {
    return this.db.execute('DELETE FROM blueprints WHERE name = ?', [name]).changes > 0;
  }

  private rowToBlueprint(row: BlueprintRow): Blueprint {
    return {
      id: row.id,
      name: row.name,
      stack: row.stack,
      config: parseJsonObject(row.config_json),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
