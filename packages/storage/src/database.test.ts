/**
 * Storage Handle Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { StorageError } from '@quarry/common';
import { checkDatabaseFile, openDatabase, withDatabase, type StorageHandle } from './database.js';

describe('openDatabase', () => {
  let tempDir: string;
  let dbPath: string;
  let db: StorageHandle | undefined;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'quarry-db-test-'));
    dbPath = path.join(tempDir, 'nested', 'dir', 'store.db');
  });

  afterEach(() => {
    db?.close();
    db = undefined;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates parent directories and the file', () => {
    db = openDatabase({ path: dbPath });
    expect(fs.existsSync(dbPath)).toBe(true);
    expect(db.isOpen).toBe(true);
  });

  it('enables WAL and foreign keys', () => {
    db = openDatabase({ path: dbPath });
    expect(db.pragma('journal_mode')).toBe('wal');
    expect(db.pragma('foreign_keys')).toBe(1);
  });

  it('creates the base schema and ledger', () => {
    db = openDatabase({ path: dbPath });
    expect(db.listTables()).toEqual(['audits', 'blueprints', 'configs', 'hooks', 'plugins', 'templates']);
    expect(db.tableExists('schema_migrations')).toBe(true);
    expect(db.listTables({ includeInternal: true })).toContain('schema_migrations');
  });

  it('reports columns and row counts', () => {
    db = openDatabase({ path: dbPath });
    db.execute("INSERT INTO configs (scope, key, value) VALUES ('global', 'editor', 'vim')");

    expect(db.countRows('configs')).toBe(1);
    expect(db.tableColumns('configs').map((c) => c.name)).toEqual(['id', 'scope', 'key', 'value']);
  });

  it('rolls back a failed transaction', () => {
    db = openDatabase({ path: dbPath });
    const handle = db;

    expect(() =>
      handle.transaction(() => {
        handle.execute("INSERT INTO configs (scope, key, value) VALUES ('global', 'a', '1')");
        throw new Error('abort');
      })
    ).toThrow('abort');
    expect(handle.countRows('configs')).toBe(0);
  });

  it('closes idempotently', () => {
    db = openDatabase({ path: dbPath });
    db.close();
    db.close();
    expect(db.isOpen).toBe(false);
  });

  it('wraps open failures as StorageError', () => {
    expect(() => openDatabase({ path: path.join(tempDir, 'missing.db'), readonly: true })).toThrow(StorageError);
  });
});

describe('withDatabase', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'quarry-db-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('closes the handle after an async callback', async () => {
    let handle: StorageHandle | undefined;
    const count = await withDatabase({ path: path.join(tempDir, 'a.db') }, async (db) => {
      handle = db;
      await Promise.resolve();
      return db.countRows('templates');
    });

    expect(count).toBe(0);
    expect(handle?.isOpen).toBe(false);
  });

  it('closes the handle when the callback throws', async () => {
    let handle: StorageHandle | undefined;
    await expect(
      withDatabase({ path: path.join(tempDir, 'a.db') }, (db) => {
        handle = db;
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(handle?.isOpen).toBe(false);
  });
});

describe('checkDatabaseFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'quarry-db-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('returns ok for a healthy store', () => {
    const dbPath = path.join(tempDir, 'ok.db');
    openDatabase({ path: dbPath }).close();
    expect(checkDatabaseFile(dbPath)).toEqual(['ok']);
  });

  it('throws for a file that is not a database', () => {
    const filePath = path.join(tempDir, 'junk.db');
    fs.writeFileSync(filePath, 'x'.repeat(4096));
    expect(() => checkDatabaseFile(filePath)).toThrow();
  });
});
