/**
 * Base schema
 *
 * Created on every open. All statements are idempotent.
 */

import type Database from 'better-sqlite3';

export const LEDGER_TABLE = 'schema_migrations';

/** Tables the export and health layers never treat as user data */
export const INTERNAL_TABLES: readonly string[] = [LEDGER_TABLE];

/** Append-only tables whose ids the importing store assigns */
export const GENERATED_KEY_TABLES: readonly string[] = ['audits', 'audit_log'];

const BASE_SCHEMA = `
  -- Templates rendered by the generator
  CREATE TABLE IF NOT EXISTS templates (
    id              INTEGER PRIMARY KEY,
    name            TEXT NOT NULL UNIQUE,
    kind            TEXT NOT NULL,
    content         BLOB NOT NULL,
    metadata_json   TEXT NOT NULL DEFAULT '{}',
    created_at      TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
    updated_at      TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
  );

  -- Stack presets
  CREATE TABLE IF NOT EXISTS blueprints (
    id              INTEGER PRIMARY KEY,
    name            TEXT NOT NULL UNIQUE,
    stack           TEXT NOT NULL,
    config_json     TEXT NOT NULL,
    created_at      TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
    updated_at      TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
  );

  -- Scoped key-value configuration
  CREATE TABLE IF NOT EXISTS configs (
    id              INTEGER PRIMARY KEY,
    scope           TEXT NOT NULL DEFAULT 'global',
    key             TEXT NOT NULL,
    value           TEXT NOT NULL,
    UNIQUE(scope, key)
  );

  CREATE TABLE IF NOT EXISTS hooks (
    id              INTEGER PRIMARY KEY,
    name            TEXT NOT NULL,
    event           TEXT NOT NULL,
    language        TEXT NOT NULL DEFAULT 'shell',
    script          TEXT NOT NULL,
    enabled         INTEGER NOT NULL DEFAULT 1
  );

  CREATE TABLE IF NOT EXISTS plugins (
    id              INTEGER PRIMARY KEY,
    name            TEXT NOT NULL UNIQUE,
    version         TEXT NOT NULL,
    entrypoint      TEXT NOT NULL,
    metadata_json   TEXT NOT NULL DEFAULT '{}'
  );

  -- Command audit records
  CREATE TABLE IF NOT EXISTS audits (
    id              INTEGER PRIMARY KEY,
    actor           TEXT NOT NULL,
    action          TEXT NOT NULL,
    entity          TEXT NOT NULL,
    details_json    TEXT NOT NULL DEFAULT '{}',
    created_at      TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
  );

  -- Indexes
  CREATE INDEX IF NOT EXISTS idx_templates_kind ON templates(kind);
  CREATE INDEX IF NOT EXISTS idx_configs_scope_key ON configs(scope, key);
  CREATE INDEX IF NOT EXISTS idx_hooks_event ON hooks(event);
  CREATE INDEX IF NOT EXISTS idx_audits_action ON audits(action);
  CREATE INDEX IF NOT EXISTS idx_audits_created_at ON audits(created_at);
`;

const LEDGER_SCHEMA = `
  CREATE TABLE IF NOT EXISTS ${LEDGER_TABLE} (
    id          TEXT PRIMARY KEY,
    description TEXT NOT NULL,
    applied_at  TEXT NOT NULL,
    checksum    TEXT NOT NULL
  )
`;

export function applyBaseSchema(db: Database.Database): void {
  db.exec(BASE_SCHEMA);
}

export function createLedgerTable(db: Database.Database): void {
  db.exec(LEDGER_SCHEMA);
}

/**
 * Quote an identifier for interpolation into SQL
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
