/**
 * Audit Store
 *
 * Append-only record of commands that changed the store.
 */

import type { AuditEntry } from '@quarry/common';
import { parseJsonObject } from '@quarry/common';
import type { StorageHandle } from '../database.js';

interface AuditRow {
  id: number;
  actor: string;
  action: string;
  entity: string;
  details_json: string;
  created_at: string;
}

export class AuditStore {
  constructor(private readonly db: StorageHandle) {}

  record(entry: {
    actor: string;
    action: string;
    entity: string;
    details?: Record<string, unknown>;
  }): AuditEntry {
    const createdAt = new Date().toISOString();
    const details = entry.details ?? {};

    const result = this.db.execute(
      `INSERT INTO audits (actor, action, entity, details_json, created_at) VALUES (?, ?, ?, ?, ?)`,
      [entry.actor, entry.action, entry.entity, JSON.stringify(details), createdAt]
    );

    return {
      id: Number(result.lastInsertRowid),
      actor: entry.actor,
      action: entry.action,
      entity: entry.entity,
      details,
      createdAt,
    };
  }

  /**
   * Most recent entries first
   */
  list(limit: number = 50): AuditEntry[] {
    const rows = this.db.query<AuditRow>(
      'SELECT * FROM audits ORDER BY created_at DESC, id DESC LIMIT ?',
      [limit]
    );

    return rows.map((row) => ({
      id: row.id,
      actor: row.actor,
      action: row.action,
      entity: row.entity,
      details: parseJsonObject(row.details_json),
      createdAt: row.created_at,
    }));
  }
}
