/**
 * Database Commands Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
    dim: (s: string) => s,
    yellow: (s: string) => s,
    green: (s: string) => s,
    red: (s: string) => s,
  },
}));

vi.mock('ora', () => ({
  default: () => ({
    start() {
      return this;
    },
    succeed: () => undefined,
    fail: () => undefined,
  }),
}));

import { openDatabase } from '@quarry/storage';
import { createProgram } from '../program.js';
import {
  colorStatus,
  dbCommands,
  defaultBackupPath,
  parseCount,
  parseFormat,
  parseTableList,
} from './db.js';

describe('Database Commands', () => {
  let db: Command;

  beforeEach(() => {
    db = dbCommands();
  });

  describe('Command Structure', () => {
    it('creates db parent command', () => {
      expect(db.name()).toBe('db');
      expect(db.description()).toBe('Database management commands');
    });

    it('has every subcommand', () => {
      const names = db.commands.map(c => c.name());
      expect(names).toEqual([
        'init',
        'migrate',
        'backup',
        'restore',
        'export',
        'import',
        'status',
        'vacuum',
        'analyze',
        'integrity',
        'size',
        'info',
      ]);
    });
  });

  describe('Migrate Command Options', () => {
    it('has status, rollback and count options', () => {
      const migrate = db.commands.find(c => c.name() === 'migrate');
      const options = migrate?.options.map(o => o.long);
      expect(options).toEqual(['--status', '--rollback', '--count']);
    });

    it('defaults count to 1', () => {
      const migrate = db.commands.find(c => c.name() === 'migrate');
      const count = migrate?.options.find(o => o.long === '--count');
      expect(count?.defaultValue).toBe('1');
    });
  });

  describe('Backup and Restore Command Options', () => {
    it('backup has output, compress and verify options', () => {
      const backup = db.commands.find(c => c.name() === 'backup');
      expect(backup?.options.map(o => o.long)).toEqual(['--output', '--compress', '--verify']);
    });

    it('restore takes an optional file argument', () => {
      const restore = db.commands.find(c => c.name() === 'restore');
      expect(restore?.registeredArguments[0]?.required).toBe(false);
      expect(restore?.options.map(o => o.long)).toEqual(['--from', '--verify', '--backup', '--force']);
    });
  });

  describe('Export and Import Command Options', () => {
    it('export has negatable schema and data options', () => {
      const exportCmd = db.commands.find(c => c.name() === 'export');
      const options = exportCmd?.options.map(o => o.long);
      expect(options).toContain('--no-schema');
      expect(options).toContain('--no-data');
    });

    it('import has validation and dry-run options', () => {
      const importCmd = db.commands.find(c => c.name() === 'import');
      const options = importCmd?.options.map(o => o.long);
      expect(options).toContain('--no-validate');
      expect(options).toContain('--dry-run');
      expect(options).toContain('--replace');
    });
  });

  describe('Argument Parsing', () => {
    it('parses formats', () => {
      expect(parseFormat('json')).toBe('json');
      expect(() => parseFormat('xml')).toThrow('Unsupported format: xml (expected sql, json or csv)');
    });

    it('parses positive counts only', () => {
      expect(parseCount('3')).toBe(3);
      expect(() => parseCount('0')).toThrow("Count must be a positive integer, got '0'");
      expect(() => parseCount('two')).toThrow("Count must be a positive integer, got 'two'");
    });

    it('splits table lists', () => {
      expect(parseTableList(' templates, ,blueprints ')).toEqual(['templates', 'blueprints']);
      expect(parseTableList(undefined)).toEqual([]);
    });

    it('places default backups beside the database', () => {
      const backup = defaultBackupPath('/data/quarry.db', true);
      expect(path.dirname(backup)).toBe('/data/backups');
      expect(backup.endsWith('.db.gz')).toBe(true);
    });

    it('renders statuses', () => {
      expect(colorStatus('WARNING')).toBe('WARNING');
    });
  });
});

describe('Database Command Actions', () => {
  let tempDir: string;
  let dbPath: string;
  let logs: string[];
  let errors: string[];

  async function run(...args: string[]): Promise<void> {
    await createProgram().parseAsync(['--db-path', dbPath, '--log-format', 'json', ...args], { from: 'user' });
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'quarry-cli-test-'));
    dbPath = path.join(tempDir, 'cli.db');
    logs = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.map(String).join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('initializes the database', async () => {
    await run('db', 'init');

    expect(logs).toEqual([`Database initialized at ${dbPath}`, 'Applied 4 migration(s)']);
    expect(process.exitCode).toBeUndefined();
  });

  it('reports an up-to-date database after init', async () => {
    await run('db', 'init');
    await run('db', 'migrate');

    expect(logs[2]).toBe('Database is up to date.');
  });

  it('shows migration status', async () => {
    await run('db', 'init');
    logs = [];
    await run('db', 'migrate', '--status');

    expect(logs).toContain('  001_initial_schema applied Create initial core tables for templates and blueprints');
  });

  it('prints the error and sets the exit code when rollback hits an irreversible migration', async () => {
    await run('db', 'init');
    await run('db', 'migrate', '--rollback');

    expect(errors).toEqual([
      'Error: Migration 004_add_metadata_columns is irreversible: added columns cannot be dropped from the store',
    ]);
    expect(process.exitCode).toBe(1);
  });

  it('requires a backup path for restore', async () => {
    await run('db', 'restore');

    expect(errors).toEqual(['Error: Specify the backup to restore as an argument or with --from']);
    expect(process.exitCode).toBe(1);
  });

  it('reports a missing database on backup without creating it', async () => {
    await run('db', 'backup', '-o', path.join(tempDir, 'out.db'));

    expect(errors).toEqual([`Error: Database '${dbPath}' not found`]);
    expect(fs.existsSync(dbPath)).toBe(false);
  });

  it('writes a compressed backup that info describes', async () => {
    const backupPath = path.join(tempDir, 'backups', 'snapshot.db.gz');
    await run('db', 'init');
    await run('db', 'backup', '-o', backupPath, '--compress', '--verify');
    logs = [];
    await run('db', 'info', backupPath);

    expect(errors).toEqual([]);
    expect(logs[1]).toBe('  Original name: cli.db');
  });

  it('exports and dry-run imports a JSON bundle', async () => {
    const exportPath = path.join(tempDir, 'export.json');
    await run('db', 'init');
    logs = [];
    await run('db', 'export', '-o', exportPath);

    // the only row is the audit entry written by init
    expect(logs[0]).toBe('Exported 1 rows from 7 tables');
    expect(fs.existsSync(exportPath)).toBe(true);

    logs = [];
    await run('db', 'import', exportPath, '--dry-run');
    expect(logs).toEqual(['Dry run: 1 rows in 7 tables would be imported']);
  });

  it('imports an export from one initialized store into another', async () => {
    const exportPath = path.join(tempDir, 'source.sql');
    await run('db', 'init');
    await run('db', 'export', '-o', exportPath);
    dbPath = path.join(tempDir, 'target.db');
    await run('db', 'init');
    logs = [];
    await run('db', 'import', exportPath);

    expect(errors).toEqual([]);
    expect(logs).toEqual(['Imported 1 rows into 1 tables']);
    const target = openDatabase({ path: dbPath });
    try {
      // target init, the imported source init, then the import itself
      expect(target.countRows('audits')).toBe(3);
    } finally {
      target.close();
    }
  });

  it('prints status as JSON', async () => {
    await run('db', 'init');
    logs = [];
    await run('db', 'status', '--json');

    const parsed: unknown = JSON.parse(logs.join('\n'));
    expect(parsed).toMatchObject({ health: { status: 'OK', walMode: true, integrityOk: true } });
  });

  it('records an audit entry for vacuum', async () => {
    await run('db', 'init');
    await run('db', 'vacuum');
    logs = [];
    await run('db', 'export', '-o', path.join(tempDir, 'after.json'));

    expect(logs[0]).toBe('Exported 2 rows from 7 tables');
  });
});
