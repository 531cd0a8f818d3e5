/**
 * Health Checker Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { openDatabase, type StorageHandle } from './database.js';
import { HealthChecker, worstStatus } from './health.js';

describe('worstStatus', () => {
  it('picks the most severe status', () => {
    expect(worstStatus([])).toBe('OK');
    expect(worstStatus([{ status: 'OK' }, { status: 'WARNING' }])).toBe('WARNING');
    expect(worstStatus([{ status: 'ERROR' }, { status: 'WARNING' }])).toBe('ERROR');
  });
});

describe('HealthChecker', () => {
  let tempDir: string;
  let db: StorageHandle;
  let checker: HealthChecker;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'quarry-health-test-'));
    db = openDatabase({ path: path.join(tempDir, 'store.db') });
    checker = new HealthChecker(db);
  });

  afterEach(() => {
    db.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('check()', () => {
    it('reports a fresh store as healthy', () => {
      const status = checker.check();

      expect(status.status).toBe('OK');
      expect(status.checks.find((c) => c.name === 'Journal Mode')?.value).toBe('wal');
      expect(status.checks.find((c) => c.name === 'Database Integrity')?.value).toBe('ok');

      expect(status.integrityOk).toBe(true);
      expect(status.walMode).toBe(true);
      expect(status.databasePath).toBe(db.path);
      expect(status.version).toMatch(/^3\.\d+\.\d+/);
      expect(status.recommendations).toEqual([]);
    });

    it('runs every probe in order', () => {
      expect(checker.check().checks.map((c) => c.name)).toEqual([
        'Database Connectivity',
        'Database Integrity',
        'SQLite Version',
        'Journal Mode',
        'Table Count',
        'Total Row Count',
        'Free Space',
        'Query Performance',
      ]);
    });

    it('counts tables including the ledger', () => {
      const status = checker.check();
      expect(status.tableCount).toBe(7);
      expect(status.checks[4].message).toBe('Database contains 7 tables');
    });

    it('counts rows across tables', () => {
      db.execute("INSERT INTO configs (scope, key, value) VALUES ('global', 'a', '1')");
      db.execute("INSERT INTO configs (scope, key, value) VALUES ('global', 'b', '2')");
      expect(checker.check().totalRows).toBe(2);
    });

    it('stops after a failed connectivity probe', () => {
      db.close();
      const status = checker.check();

      expect(status.status).toBe('ERROR');
      expect(status.checks).toHaveLength(1);
      expect(status.checks[0].status).toBe('ERROR');
    });
  });

  describe('getStats()', () => {
    it('describes pages and tables', () => {
      const stats = checker.getStats();

      expect(stats.journalMode).toBe('wal');
      expect(stats.dataSize).toBe(stats.pageCount * stats.pageSize);
      expect(stats.tables.map((t) => t.name)).toContain('templates');
    });
  });

  describe('integrity()', () => {
    it('returns ok for a fresh store', () => {
      expect(checker.integrity()).toEqual(['ok']);
      expect(() => checker.assertIntegrity()).not.toThrow();
    });
  });

  describe('maintenance', () => {
    it('vacuums and reports sizes', () => {
      db.exec('CREATE TABLE filler (data TEXT)');
      const insert = db.raw.prepare('INSERT INTO filler (data) VALUES (?)');
      for (let i = 0; i < 200; i++) insert.run('x'.repeat(1000));
      db.exec('DROP TABLE filler');
      db.checkpoint();

      const result = checker.vacuum();
      expect(result.sizeAfter).toBeLessThan(result.sizeBefore);
      expect(result.reclaimed).toBe(result.sizeBefore - result.sizeAfter);
      expect(checker.getStats().freePages).toBe(0);
    });

    it('analyzes without changing size', () => {
      const result = checker.analyze();
      expect(result.reclaimed).toBe(0);
      expect(result.sizeAfter).toBe(result.sizeBefore);
    });
  });
});
