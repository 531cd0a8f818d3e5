/**
 * Audit Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { openDatabase, type StorageHandle } from '../database.js';
import { AuditStore } from './audit.js';

describe('AuditStore', () => {
  let tempDir: string;
  let db: StorageHandle;
  let store: AuditStore;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'quarry-audit-test-'));
    db = openDatabase({ path: path.join(tempDir, 'store.db') });
    store = new AuditStore(db);
  });

  afterEach(() => {
    db.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('records an entry', () => {
    const entry = store.record({ actor: 'tester', action: 'db.vacuum', entity: 'database', details: { reclaimed: 0 } });

    expect(entry.id).toBe(1);
    expect(store.list()).toEqual([entry]);
  });

  it('lists newest first with a limit', () => {
    store.record({ actor: 'tester', action: 'first', entity: 'database' });
    store.record({ actor: 'tester', action: 'second', entity: 'database' });
    store.record({ actor: 'tester', action: 'third', entity: 'database' });

    expect(store.list(2).map((e) => e.action)).toEqual(['third', 'second']);
  });
});
