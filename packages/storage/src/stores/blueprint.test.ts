/**
 * Blueprint Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { NotFoundError } from '@quarry/common';
import { openDatabase, type StorageHandle } from '../database.js';
import { BlueprintStore } from './blueprint.js';

describe('BlueprintStore', () => {
  let tempDir: string;
  let db: StorageHandle;
  let store: BlueprintStore;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'quarry-blueprint-test-'));
    db = openDatabase({ path: path.join(tempDir, 'store.db') });
    store = new BlueprintStore(db);
  });

  afterEach(() => {
    db.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates and reads a blueprint', () => {
    store.upsert({ name: 'api', stack: 'node', config: { port: 8080, db: 'postgres' } });

    const blueprint = store.get('api');
    expect(blueprint.stack).toBe('node');
    expect(blueprint.config).toEqual({ port: 8080, db: 'postgres' });
  });

  it('replaces config on upsert', () => {
    store.upsert({ name: 'api', stack: 'node', config: { port: 8080 } });
    store.upsert({ name: 'api', stack: 'deno', config: {} });

    expect(store.get('api')).toMatchObject({ stack: 'deno', config: {} });
  });

  it('lists by stack', () => {
    store.upsert({ name: 'api', stack: 'node', config: {} });
    store.upsert({ name: 'site', stack: 'static', config: {} });

    expect(store.list('node').map((b) => b.name)).toEqual(['api']);
    expect(store.list()).toHaveLength(2);
  });

  it('throws NotFoundError for a missing blueprint', () => {
    expect(() => store.get('nope')).toThrow(NotFoundError);
    expect(store.find('nope')).toBeUndefined();
    expect(store.delete('nope')).toBe(false);
  });
});
