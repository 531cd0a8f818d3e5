/**
 * Storage Handle
 *
 * Owns the single better-sqlite3 connection for one command invocation.
 * Managers borrow it for the duration of a call and never close it.
 */

import Database from 'better-sqlite3';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';
import { silentLogger, wrapError, type Logger } from '@quarry/common';
import { applyBaseSchema, createLedgerTable, INTERNAL_TABLES, quoteIdentifier } from './schema.js';

export interface DatabaseOptions {
  path: string;
  readonly?: boolean;
  verbose?: boolean;
  logger?: Logger;
}

export interface ColumnInfo {
  name: string;
  type: string;
  notnull: number;
  pk: number;
}

export class StorageHandle {
  readonly path: string;
  private readonly db: Database.Database;

  constructor(db: Database.Database, path: string) {
    this.db = db;
    this.path = path;
  }

  get raw(): Database.Database {
    return this.db;
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  /**
   * Run a query that returns rows
   */
  query<T>(sql: string, params: unknown[] = []): T[] {
    return this.db.prepare<unknown[], T>(sql).all(...params);
  }

  /**
   * Run a query that returns a single row
   */
  queryOne<T>(sql: string, params: unknown[] = []): T | undefined {
    return this.db.prepare<unknown[], T>(sql).get(...params);
  }

  /**
   * Run an insert/update/delete query
   */
  execute(sql: string, params: unknown[] = []): Database.RunResult {
    return this.db.prepare(sql).run(...params);
  }

  /**
   * Run one or more statements without parameters
   */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  /**
   * Run multiple statements in a transaction; a throw rolls everything back
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /**
   * Read a single pragma value
   */
  pragma(name: string): unknown {
    return this.db.pragma(name, { simple: true });
  }

  /**
   * Move WAL content into the main database file
   */
  checkpoint(): void {
    if (!this.db.readonly) {
      this.db.pragma('wal_checkpoint(TRUNCATE)');
    }
  }

  /**
   * User tables, sorted by name
   */
  listTables(options: { includeInternal?: boolean } = {}): string[] {
    const rows = this.query<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    );
    const names = rows.map((row) => row.name);
    return options.includeInternal ? names : names.filter((name) => !INTERNAL_TABLES.includes(name));
  }

  tableExists(table: string): boolean {
    const row = this.queryOne<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
      [table]
    );
    return row !== undefined;
  }

  tableColumns(table: string): ColumnInfo[] {
    return this.query<ColumnInfo>(`PRAGMA table_info(${quoteIdentifier(table)})`);
  }

  countRows(table: string): number {
    const row = this.queryOne<{ count: number }>(`SELECT COUNT(*) AS count FROM ${quoteIdentifier(table)}`);
    return row?.count ?? 0;
  }

  /**
   * Close the connection
   */
  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

/**
 * Open the store at a path, applying durability pragmas and the base schema
 */
export function openDatabase(options: DatabaseOptions): StorageHandle {
  const logger = options.logger ?? silentLogger();
  const readonly = options.readonly ?? false;

  let db: Database.Database;
  try {
    if (!readonly && options.path !== ':memory:') {
      mkdirSync(dirname(options.path), { recursive: true });
    }

    db = new Database(options.path, {
      readonly,
      fileMustExist: readonly,
      verbose: options.verbose ? (message) => logger.debug('sql', { sql: message }) : undefined,
    });
  } catch (error) {
    throw wrapError(error, `Failed to open database at ${options.path}`, { path: options.path });
  }

  try {
    if (!readonly) {
      // WAL for concurrent readers
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.pragma('foreign_keys = ON');
      db.pragma('cache_size = 1000');

      applyBaseSchema(db);
      createLedgerTable(db);
    }
  } catch (error) {
    db.close();
    throw wrapError(error, `Failed to initialize database at ${options.path}`, { path: options.path });
  }

  logger.debug('Database opened', { path: options.path, readonly });
  return new StorageHandle(db, options.path);
}

/**
 * Open a database file without touching its schema and return the
 * integrity_check output. Opening or reading a file that is not a
 * database throws.
 */
export function checkDatabaseFile(path: string): string[] {
  const db = new Database(path, { fileMustExist: true });
  try {
    return db
      .prepare<[], { integrity_check: string }>('PRAGMA integrity_check')
      .all()
      .map((row) => row.integrity_check);
  } finally {
    db.close();
  }
}

/**
 * Open a store, run one operation and close it again
 */
export async function withDatabase<T>(
  options: DatabaseOptions,
  fn: (db: StorageHandle) => T | Promise<T>
): Promise<T> {
  const db = openDatabase(options);
  try {
    return await fn(db);
  } finally {
    db.close();
  }
}
