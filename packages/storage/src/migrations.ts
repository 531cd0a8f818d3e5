/**
 * Database Migrations
 *
 * Registry of ordered schema changes with forward and reverse bodies.
 * The schema_migrations ledger is the only record of what has been applied;
 * definitions never carry applied state.
 */

import {
  ConfigError,
  ConflictError,
  NotFoundError,
  sha256,
  silentLogger,
  wrapError,
  type Logger,
} from '@quarry/common';
import type { StorageHandle } from './database.js';
import { createLedgerTable, LEDGER_TABLE } from './schema.js';

export interface MigrationDefinition {
  readonly id: string;
  readonly description: string;
  readonly up: string;
  readonly down: string;
  /** Reason the migration cannot be reversed, when it cannot */
  readonly irreversible?: string;
}

export interface LedgerEntry {
  id: string;
  description: string;
  appliedAt: string;
  checksum: string;
}

export interface MigrationStatus {
  id: string;
  description: string;
  applied: boolean;
  appliedAt: string | null;
  checksum: string | null;
  /** Applied body differs from the registered one */
  drifted: boolean;
}

export interface ApplyResult {
  applied: string[];
}

export type DuplicatePolicy = 'replace' | 'warn' | 'error';

export interface MigrationEngineOptions {
  logger?: Logger;
  onDuplicate?: DuplicatePolicy;
}

interface LedgerRow {
  id: string;
  description: string;
  applied_at: string;
  checksum: string;
}

const CORE_MIGRATIONS: MigrationDefinition[] = [
  {
    id: '001_initial_schema',
    description: 'Create initial core tables for templates and blueprints',
    up: `
      -- Core tables are created when the store is opened.
      -- This entry marks the baseline in the ledger.
    `,
    down: `
      -- Dropping the core tables would destroy user data; only the ledger entry is removed.
    `,
  },
  {
    id: '002_add_indexes',
    description: 'Add database indexes for improved query performance',
    up: `
      CREATE INDEX IF NOT EXISTS idx_templates_name ON templates(name);
      CREATE INDEX IF NOT EXISTS idx_blueprints_name ON blueprints(name);
      CREATE INDEX IF NOT EXISTS idx_blueprints_stack ON blueprints(stack);
    `,
    down: `
      DROP INDEX IF EXISTS idx_templates_name;
      DROP INDEX IF EXISTS idx_blueprints_name;
      DROP INDEX IF EXISTS idx_blueprints_stack;
    `,
  },
  {
    id: '003_add_audit_trail',
    description: 'Add audit trail tables for tracking changes',
    up: `
      CREATE TABLE IF NOT EXISTS audit_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        table_name TEXT NOT NULL,
        record_id TEXT NOT NULL,
        action TEXT NOT NULL,  -- INSERT, UPDATE, DELETE
        old_values TEXT,  -- JSON
        new_values TEXT,  -- JSON
        changed_at TEXT DEFAULT CURRENT_TIMESTAMP,
        changed_by TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_audit_log_table ON audit_log(table_name);
      CREATE INDEX IF NOT EXISTS idx_audit_log_changed_at ON audit_log(changed_at);
    `,
    down: `
      DROP TABLE IF EXISTS audit_log;
    `,
  },
  {
    id: '004_add_metadata_columns',
    description: 'Add description and source columns to templates and blueprints',
    up: `
      ALTER TABLE templates ADD COLUMN description TEXT NOT NULL DEFAULT '';
      ALTER TABLE templates ADD COLUMN source TEXT NOT NULL DEFAULT 'user';
      ALTER TABLE blueprints ADD COLUMN description TEXT NOT NULL DEFAULT '';
      ALTER TABLE blueprints ADD COLUMN source TEXT NOT NULL DEFAULT 'user';
    `,
    down: '',
    irreversible: 'added columns cannot be dropped from the store',
  },
];

/**
 * Fingerprint of a forward body, stored in the ledger
 */
export function migrationChecksum(body: string): string {
  return sha256(body.trim());
}

export class MigrationEngine {
  private readonly db: StorageHandle;
  private readonly logger: Logger;
  private readonly onDuplicate: DuplicatePolicy;
  private readonly registry = new Map<string, MigrationDefinition>();

  constructor(db: StorageHandle, options: MigrationEngineOptions = {}) {
    this.db = db;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'migrations' });
    this.onDuplicate = options.onDuplicate ?? 'replace';
  }

  /**
   * Register a migration definition. The ledger is not touched.
   */
  register(
    id: string,
    description: string,
    up: string,
    down: string,
    options: { irreversible?: string } = {}
  ): MigrationDefinition {
    if (!id.trim()) {
      throw new ConfigError('Migration id must not be empty');
    }

    if (this.registry.has(id)) {
      if (this.onDuplicate === 'error') {
        throw new ConflictError(`Migration '${id}' is already registered`, { id });
      }
      if (this.onDuplicate === 'warn') {
        this.logger.warn('Replacing registered migration', { id });
      }
    }

    const definition: MigrationDefinition = Object.freeze({
      id,
      description,
      up,
      down,
      ...(options.irreversible ? { irreversible: options.irreversible } : {}),
    });
    this.registry.set(id, definition);
    return definition;
  }

  /**
   * Register the bootstrap migrations every migration-aware command needs
   */
  registerCoreSchemas(): void {
    for (const migration of CORE_MIGRATIONS) {
      this.register(migration.id, migration.description, migration.up, migration.down, {
        irreversible: migration.irreversible,
      });
    }
  }

  /**
   * Registered definition by id
   */
  get(id: string): MigrationDefinition | undefined {
    return this.registry.get(id);
  }

  /**
   * All registered definitions, sorted by id
   */
  list(): MigrationDefinition[] {
    return [...this.registry.values()].sort(compareById);
  }

  /**
   * Create the ledger table if absent
   */
  initLedger(): void {
    try {
      createLedgerTable(this.db.raw);
    } catch (error) {
      throw wrapError(error, `Failed to create ${LEDGER_TABLE} table`);
    }
  }

  /**
   * Ledger entries keyed by id, read fresh on every call
   */
  getApplied(): Map<string, LedgerEntry> {
    this.initLedger();

    let rows: LedgerRow[];
    try {
      rows = this.db.query<LedgerRow>(
        `SELECT id, description, applied_at, checksum FROM ${LEDGER_TABLE} ORDER BY id`
      );
    } catch (error) {
      throw wrapError(error, 'Failed to query applied migrations');
    }

    return new Map(rows.map((row) => [row.id, rowToEntry(row)]));
  }

  /**
   * Registered migrations absent from the ledger, in application order
   */
  getPending(): MigrationDefinition[] {
    const applied = this.getApplied();
    return this.list().filter((migration) => !applied.has(migration.id));
  }

  /**
   * Execute a forward body and record it, atomically
   */
  apply(migration: MigrationDefinition): void {
    if (!migration.up.trim()) {
      throw new ConfigError(`Migration ${migration.id} has no forward body`, { id: migration.id });
    }

    this.initLedger();

    try {
      this.db.transaction(() => {
        this.db.exec(migration.up);
        this.db.execute(
          `INSERT INTO ${LEDGER_TABLE} (id, description, applied_at, checksum) VALUES (?, ?, ?, ?)`,
          [migration.id, migration.description, new Date().toISOString(), migrationChecksum(migration.up)]
        );
      });
    } catch (error) {
      throw wrapError(error, `Failed to apply migration ${migration.id}`, { id: migration.id });
    }

    this.logger.info('Applied migration', { id: migration.id, description: migration.description });
  }

  /**
   * Apply every pending migration in order, stopping at the first failure
   */
  applyAll(): ApplyResult {
    const pending = this.getPending();
    if (pending.length === 0) {
      this.logger.debug('No pending migrations');
      return { applied: [] };
    }

    const applied: string[] = [];
    for (const migration of pending) {
      this.apply(migration);
      applied.push(migration.id);
    }

    this.logger.info('Applied pending migrations', { count: applied.length });
    return { applied };
  }

  /**
   * Execute a reverse body and remove the ledger entry, atomically
   */
  rollback(migration: MigrationDefinition): void {
    if (migration.irreversible) {
      throw new ConfigError(
        `Migration ${migration.id} is irreversible: ${migration.irreversible}`,
        { id: migration.id }
      );
    }
    if (!migration.down.trim()) {
      throw new ConfigError(`Migration ${migration.id} has no reverse body`, { id: migration.id });
    }

    this.initLedger();

    try {
      this.db.transaction(() => {
        this.db.exec(migration.down);
        this.db.execute(`DELETE FROM ${LEDGER_TABLE} WHERE id = ?`, [migration.id]);
      });
    } catch (error) {
      throw wrapError(error, `Failed to roll back migration ${migration.id}`, { id: migration.id });
    }

    this.logger.info('Rolled back migration', { id: migration.id, description: migration.description });
  }

  /**
   * Most recently applied ledger entry
   */
  getLastApplied(): LedgerEntry | undefined {
    this.initLedger();

    try {
      const row = this.db.queryOne<LedgerRow>(
        `SELECT id, description, applied_at, checksum FROM ${LEDGER_TABLE}
         ORDER BY applied_at DESC, rowid DESC
         LIMIT 1`
      );
      return row ? rowToEntry(row) : undefined;
    } catch (error) {
      throw wrapError(error, 'Failed to get last applied migration');
    }
  }

  /**
   * Roll back the most recently applied migration.
   * Returns its id, or null when nothing is applied.
   */
  rollbackLast(): string | null {
    const last = this.getLastApplied();
    if (!last) {
      this.logger.debug('No migrations to roll back');
      return null;
    }

    const migration = this.registry.get(last.id);
    if (!migration) {
      throw new NotFoundError('Migration', last.id);
    }

    this.rollback(migration);
    return migration.id;
  }

  /**
   * Roll back up to count migrations, newest first
   */
  rollbackMany(count: number): string[] {
    const rolledBack: string[] = [];
    for (let i = 0; i < count; i++) {
      const id = this.rollbackLast();
      if (id === null) break;
      rolledBack.push(id);
    }
    return rolledBack;
  }

  /**
   * Every registered migration reconciled against the ledger
   */
  getStatus(): MigrationStatus[] {
    const applied = this.getApplied();

    return this.list().map((migration) => {
      const entry = applied.get(migration.id);
      return {
        id: migration.id,
        description: migration.description,
        applied: entry !== undefined,
        appliedAt: entry?.appliedAt ?? null,
        checksum: entry?.checksum ?? null,
        drifted: entry !== undefined && entry.checksum !== migrationChecksum(migration.up),
      };
    });
  }
}

function compareById(a: MigrationDefinition, b: MigrationDefinition): number {
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

function rowToEntry(row: LedgerRow): LedgerEntry {
  return {
    id: row.id,
    description: row.description,
    appliedAt: row.applied_at,
    checksum: row.checksum,
  };
}
