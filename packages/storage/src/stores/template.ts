/**
 * Template Store
 *
 * Generator templates keyed by unique name. Content is stored as a blob.
 */

import type { Template } from '@quarry/common';
import { NotFoundError, parseJsonObject } from '@quarry/common';
import type { StorageHandle } from '../database.js';

interface TemplateRow {
  id: number;
  name: string;
  kind: string;
  content: Buffer | string;
  metadata_json: string;
  created_at: string;
  updated_at: string;
}

export class TemplateStore {
  constructor(private readonly db: StorageHandle) {}

  /**
   * Create or replace a template by name
   */
  upsert(template: {
    name: string;
    kind: string;
    content: string;
    metadata?: Record<string, unknown>;
  }): Template {
    const now = new Date().toISOString();

    this.db.execute(
      `INSERT INTO templates (name, kind, content, metadata_json, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT(name) DO UPDATE SET
         kind = excluded.kind,
         content = excluded.content,
         metadata_json = excluded.metadata_json,
         updated_at = excluded.updated_at`,
      [
        template.name,
        template.kind,
        Buffer.from(template.content, 'utf8'),
        JSON.stringify(template.metadata ?? {}),
        now,
        now,
      ]
    );

    return this.get(template.name);
  }

  /**
   * Get a template by name, throwing when absent
   */
  get(name: string): Template {
    const template = this.find(name);
    if (!template) {
      throw new NotFoundError('Template', name);
    }
    return template;
  }

  find(name: string): Template | undefined {
    const row = this.db.queryOne<TemplateRow>('SELECT * FROM templates WHERE name = ?', [name]);
    return row ? this.rowToTemplate(row) : undefined;
  }

  /**
   * List templates, optionally of one kind
   */
  list(kind?: string): Template[] {
    const rows = kind
      ? this.db.query<TemplateRow>('SELECT * FROM templates WHERE kind = ? ORDER BY name', [kind])
      : this.db.query<TemplateRow>('SELECT * FROM templates ORDER BY name');

    return rows.map((row) => this.rowToTemplate(row));
  }

  delete(name: string): boolean {
    return this.db.execute('DELETE FROM templates WHERE name = ?', [name]).changes > 0;
  }

  private rowToTemplate(row: TemplateRow): Template {
    return {
      id: row.id,
      name: row.name,
      kind: row.kind,
      content: Buffer.isBuffer(row.content) ? row.content.toString('utf8') : row.content,
      metadata: parseJsonObject(row.metadata_json),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
