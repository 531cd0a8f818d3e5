/**
 * Export and Import
 *
 * Serializes store contents to SQL statements, a JSON bundle or CSV files,
 * and loads SQL or JSON back in. Every import path brings the target up to
 * the core schema and writes inside a single transaction; dry runs do the
 * same parsing and validation but never write.
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, extname, join } from 'node:path';
import {
  ConfigError,
  errorMessage,
  exportBundleSchema,
  NotFoundError,
  parseJsonObject,
  silentLogger,
  StorageError,
  truncate,
  validateBody,
  ValidationError,
  wrapError,
  type BundleRow,
  type BundleValue,
  type ExportBundle,
  type ExportedBlueprint,
  type ExportedTemplate,
  type Logger,
  type SqlValue,
  type TransferFormat,
} from '@quarry/common';
import type { StorageHandle } from './database.js';
import { MigrationEngine } from './migrations.js';
import { GENERATED_KEY_TABLES, quoteIdentifier } from './schema.js';

export const BUNDLE_VERSION = '1.0';

export interface ExportOptions {
  outputPath: string;
  format: TransferFormat;
  /** Empty or absent exports every user table */
  tables?: string[];
  includeSchema?: boolean;
  includeData?: boolean;
}

export interface ImportOptions {
  inputPath: string;
  format: TransferFormat;
  validate?: boolean;
  dryRun?: boolean;
  replaceExisting?: boolean;
}

export interface ExportResult {
  format: TransferFormat;
  path: string;
  tableCount: number;
  rowCount: number;
  files: string[];
}

export interface ImportResult {
  format: TransferFormat;
  dryRun: boolean;
  /** Statement count, for SQL imports */
  statements?: number;
  tableCount: number;
  rowCount: number;
}

export interface TransferManagerOptions {
  logger?: Logger;
}

type Row = Record<string, unknown>;

/** Thrown inside a dry-run transaction to discard its writes */
class DryRunRollback extends Error {}

/**
 * Pick a format from a file extension
 */
export function detectFormat(path: string, fallback: TransferFormat = 'sql'): TransferFormat {
  switch (extname(path).toLowerCase()) {
    case '.sql':
      return 'sql';
    case '.json':
      return 'json';
    case '.csv':
      return 'csv';
    default:
      return fallback;
  }
}

/**
 * Render a value as a SQL literal
 */
export function sqlLiteral(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (typeof value === 'number') {
    // SQLite reads an out-of-range literal as Infinity and stores NaN as NULL
    if (Number.isNaN(value)) return 'NULL';
    if (!Number.isFinite(value)) return value > 0 ? '9e999' : '-9e999';
    return String(value);
  }
  if (typeof value === 'bigint') return String(value);
  if (Buffer.isBuffer(value)) return `X'${value.toString('hex')}'`;
  return `'${String(value).replace(/'/g, "''")}'`;
}

/**
 * Render a value as an RFC 4180 field
 */
export function csvField(value: unknown): string {
  if (value === null || value === undefined) return '';
  const text = Buffer.isBuffer(value) ? value.toString('hex') : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Split a SQL script into statements on semicolons that sit outside
 * strings, quoted identifiers and comments. Comments are dropped.
 */
export function splitStatements(script: string): string[] {
  const statements: string[] = [];
  let current = '';
  let i = 0;

  const push = (): void => {
    const statement = current.trim();
    if (statement) statements.push(statement);
    current = '';
  };

  while (i < script.length) {
    const char = script[i];
    const next = script[i + 1];

    if (char === '-' && next === '-') {
      const end = script.indexOf('\n', i);
      i = end === -1 ? script.length : end;
      continue;
    }

    if (char === '/' && next === '*') {
      const end = script.indexOf('*/', i + 2);
      i = end === -1 ? script.length : end + 2;
      current += ' ';
      continue;
    }

    if (char === "'" || char === '"' || char === '`') {
      let j = i + 1;
      while (j < script.length) {
        if (script[j] === char) {
          if (script[j + 1] === char) {
            j += 2;
            continue;
          }
          break;
        }
        j++;
      }
      current += script.slice(i, j + 1);
      i = j + 1;
      continue;
    }

    if (char === '[') {
      const end = script.indexOf(']', i);
      const stop = end === -1 ? script.length : end + 1;
      current += script.slice(i, stop);
      i = stop;
      continue;
    }

    if (char === ';') {
      push();
      i++;
      continue;
    }

    current += char;
    i++;
  }

  push();
  return statements;
}

const INSERT_TARGET = /^INSERT\s+(?:OR\s+\w+\s+)?INTO\s+("(?:[^"]|"")+"|[\w$]+)/i;

function summarizeStatements(statements: string[]): { tableCount: number; rowCount: number } {
  const tables = new Set<string>();
  let rowCount = 0;

  for (const statement of statements) {
    const match = INSERT_TARGET.exec(statement);
    if (match) {
      tables.add(match[1].replace(/^"|"$/g, '').replace(/""/g, '"'));
      rowCount++;
    }
  }

  return { tableCount: tables.size, rowCount };
}

/**
 * Render a value for the JSON bundle
 */
export function encodeValue(value: unknown): BundleValue {
  if (value === null || value === undefined) return null;
  if (Buffer.isBuffer(value)) return { $base64: value.toString('base64') };
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'bigint') {
    // INTEGER affinity turns the text back into the same integer on import
    const narrowed = Number(value);
    return Number.isSafeInteger(narrowed) ? narrowed : value.toString();
  }
  return String(value);
}

function decodeValue(value: BundleValue): SqlValue {
  if (value !== null && typeof value === 'object') {
    return Buffer.from(value.$base64, 'base64');
  }
  return value;
}

function asText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  return String(value);
}

function asNullableText(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

export class TransferManager {
  private readonly db: StorageHandle;
  private readonly logger: Logger;

  constructor(db: StorageHandle, options: TransferManagerOptions = {}) {
    this.db = db;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'transfer' });
  }

  // ==========================================================================
  // Export
  // ==========================================================================

  async export(options: ExportOptions): Promise<ExportResult> {
    const tables = this.getTablesToExport(options.tables ?? []);

    let result: ExportResult;
    switch (options.format) {
      case 'sql':
        result = await this.exportSql(options, tables);
        break;
      case 'json':
        result = await this.exportJson(options, tables);
        break;
      case 'csv':
        result = await this.exportCsv(options, tables);
        break;
      default:
        throw new ConfigError(`Unsupported export format: ${String(options.format)}`);
    }

    this.logger.info('Export completed', {
      format: result.format,
      path: result.path,
      tables: result.tableCount,
      rows: result.rowCount,
    });
    return result;
  }

  private getTablesToExport(requested: string[]): string[] {
    if (requested.length === 0) {
      return this.db.listTables();
    }

    for (const table of requested) {
      if (!this.db.tableExists(table)) {
        throw new NotFoundError('Table', table);
      }
    }
    return requested;
  }

  private readTable(table: string): { columns: string[]; rows: Row[] } {
    try {
      const generatedKey = GENERATED_KEY_TABLES.includes(table);
      const columns = this.db
        .tableColumns(table)
        .filter((column) => !(generatedKey && column.pk > 0))
        .map((column) => column.name);
      const rows = this.db.query<Row>(`SELECT * FROM ${quoteIdentifier(table)}`);
      return { columns, rows };
    } catch (error) {
      throw wrapError(error, `Failed to read table ${table}`, { table });
    }
  }

  private tableSchema(table: string): string | undefined {
    const row = this.db.queryOne<{ sql: string | null }>(
      "SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ?",
      [table]
    );
    if (!row?.sql) return undefined;
    return row.sql.replace(/^CREATE\s+TABLE\s+(?!IF\s+NOT\s+EXISTS)/i, 'CREATE TABLE IF NOT EXISTS ');
  }

  private async exportSql(options: ExportOptions, tables: string[]): Promise<ExportResult> {
    const { includeSchema = true, includeData = true } = options;
    const lines: string[] = [
      '-- quarry database export',
      `-- Generated on: ${new Date().toISOString()}`,
      '-- Format: SQL',
      '',
    ];

    let rowCount = 0;
    for (const table of tables) {
      this.logger.debug('Exporting table', { table });

      if (includeSchema) {
        const schema = this.tableSchema(table);
        if (schema) {
          lines.push(`-- Schema for table ${table}`, `${schema};`, '');
        }
      }

      if (includeData) {
        const { columns, rows } = this.readTable(table);
        const columnList = columns.map(quoteIdentifier).join(', ');
        lines.push(`-- Data for table ${table}`);
        for (const row of rows) {
          const values = columns.map((column) => sqlLiteral(row[column])).join(', ');
          lines.push(`INSERT INTO ${quoteIdentifier(table)} (${columnList}) VALUES (${values});`);
        }
        rowCount += rows.length;
      }

      lines.push('');
    }

    await this.writeOutput(options.outputPath, lines.join('\n'));
    return {
      format: 'sql',
      path: options.outputPath,
      tableCount: tables.length,
      rowCount,
      files: [options.outputPath],
    };
  }

  /**
   * Build the JSON bundle for a set of tables
   */
  buildBundle(tables: string[]): ExportBundle {
    const bundle: ExportBundle = {
      metadata: {
        exportedAt: new Date().toISOString(),
        version: BUNDLE_VERSION,
        format: 'json',
        tableCount: 0,
        rowCount: 0,
      },
      tables: {},
    };

    let rowCount = 0;
    for (const table of tables) {
      this.logger.debug('Exporting table', { table });
      const { columns, rows } = this.readTable(table);

      bundle.tables[table] = rows.map((row) => {
        const encoded: BundleRow = {};
        for (const column of columns) {
          encoded[column] = encodeValue(row[column]);
        }
        return encoded;
      });
      rowCount += rows.length;

      if (table === 'templates') {
        bundle.templates = this.templatesView();
      } else if (table === 'blueprints') {
        bundle.blueprints = this.blueprintsView();
      }
    }

    bundle.metadata.tableCount = tables.length;
    bundle.metadata.rowCount = rowCount;
    return bundle;
  }

  private async exportJson(options: ExportOptions, tables: string[]): Promise<ExportResult> {
    const bundle = this.buildBundle(tables);
    await this.writeOutput(options.outputPath, `${JSON.stringify(bundle, null, 2)}\n`);

    return {
      format: 'json',
      path: options.outputPath,
      tableCount: bundle.metadata.tableCount,
      rowCount: bundle.metadata.rowCount,
      files: [options.outputPath],
    };
  }

  private async exportCsv(options: ExportOptions, tables: string[]): Promise<ExportResult> {
    const extension = extname(options.outputPath);
    const baseDir = extension ? options.outputPath.slice(0, -extension.length) : options.outputPath;

    try {
      await mkdir(baseDir, { recursive: true });
    } catch (error) {
      throw wrapError(error, `Failed to create CSV directory ${baseDir}`, { path: baseDir });
    }

    const files: string[] = [];
    let rowCount = 0;
    for (const table of tables) {
      this.logger.debug('Exporting table', { table });
      const { columns, rows } = this.readTable(table);

      const lines = [columns.map(csvField).join(',')];
      for (const row of rows) {
        lines.push(columns.map((column) => csvField(row[column])).join(','));
      }

      const file = join(baseDir, `${table}.csv`);
      await this.writeOutput(file, `${lines.join('\r\n')}\r\n`);
      files.push(file);
      rowCount += rows.length;
    }

    return { format: 'csv', path: baseDir, tableCount: tables.length, rowCount, files };
  }

  private templatesView(): ExportedTemplate[] {
    const columns = new Set(this.db.tableColumns('templates').map((column) => column.name));
    const rows = this.db.query<Row>('SELECT * FROM templates ORDER BY name');

    return rows.map((row) => ({
      name: asText(row.name),
      kind: asText(row.kind),
      description: columns.has('description') ? asText(row.description) : '',
      content: asText(row.content),
      metadata: parseJsonObject(asNullableText(row.metadata_json)),
      createdAt: asNullableText(row.created_at),
      updatedAt: asNullableText(row.updated_at),
    }));
  }

  private blueprintsView(): ExportedBlueprint[] {
    const columns = new Set(this.db.tableColumns('blueprints').map((column) => column.name));
    const rows = this.db.query<Row>('SELECT * FROM blueprints ORDER BY name');

    return rows.map((row) => ({
      name: asText(row.name),
      stack: asText(row.stack),
      description: columns.has('description') ? asText(row.description) : '',
      config: parseJsonObject(asNullableText(row.config_json)),
      createdAt: asNullableText(row.created_at),
      updatedAt: asNullableText(row.updated_at),
    }));
  }

  private async writeOutput(path: string, content: string): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, 'utf8');
    } catch (error) {
      throw wrapError(error, `Failed to write ${path}`, { path });
    }
  }

  // ==========================================================================
  // Import
  // ==========================================================================

  async import(options: ImportOptions): Promise<ImportResult> {
    if (!existsSync(options.inputPath)) {
      throw new NotFoundError('Import file', options.inputPath);
    }

    let content: string;
    switch (options.format) {
      case 'sql':
        content = await this.readInput(options.inputPath);
        return this.importSql(content, options);
      case 'json':
        content = await this.readInput(options.inputPath);
        return this.importJson(content, options);
      case 'csv':
        throw new ConfigError('CSV import is not supported; import from a sql or json export');
      default:
        throw new ConfigError(`Unsupported import format: ${String(options.format)}`);
    }
  }

  private async readInput(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf8');
    } catch (error) {
      throw wrapError(error, `Failed to read ${path}`, { path });
    }
  }

  private importSql(content: string, options: ImportOptions): ImportResult {
    const statements = splitStatements(content);
    const summary = summarizeStatements(statements);
    const result: ImportResult = {
      format: 'sql',
      dryRun: options.dryRun ?? false,
      statements: statements.length,
      ...summary,
    };

    if (options.dryRun) {
      this.logger.info('Dry run: SQL import not applied', { statements: statements.length });
      return result;
    }

    try {
      this.db.transaction(() => {
        this.upgradeSchema(this.logger);
        statements.forEach((statement, index) => {
          this.logger.debug('Executing statement', { index: index + 1, statement: truncate(statement, 80) });
          try {
            this.db.exec(statement);
          } catch (error) {
            throw new StorageError(`Statement ${index + 1} failed: ${errorMessage(error)}`, {
              index: index + 1,
              statement: truncate(statement, 200),
            });
          }
        });
      });
    } catch (error) {
      throw wrapError(error, `Failed to import ${options.inputPath}`, { path: options.inputPath });
    }

    this.logger.info('SQL import completed', { statements: statements.length });
    return result;
  }

  /**
   * Decode and validate a JSON bundle
   */
  parseBundle(content: string, validate: boolean): ExportBundle {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ValidationError(`Import file is not valid JSON: ${errorMessage(error)}`);
    }

    const result = validateBody(exportBundleSchema, parsed);
    if (!result.success) {
      throw new ValidationError(`Invalid export bundle: ${result.error}`);
    }
    const bundle = result.data;

    if (validate) {
      if (!bundle.metadata.version.trim()) {
        throw new ValidationError('Import data missing version information');
      }

      const tableCount = Object.keys(bundle.tables).length;
      const rowCount = Object.values(bundle.tables).reduce((sum, rows) => sum + rows.length, 0);
      if (bundle.metadata.tableCount !== tableCount || bundle.metadata.rowCount !== rowCount) {
        throw new ValidationError(
          `Bundle metadata does not match its content: expected ${bundle.metadata.tableCount} tables and ` +
            `${bundle.metadata.rowCount} rows, found ${tableCount} tables and ${rowCount} rows`
        );
      }
    }

    return bundle;
  }

  /**
   * Apply pending core migrations so the target has every column an export
   * from a migrated store can name. Runs inside the caller's transaction.
   */
  private upgradeSchema(logger: Logger): void {
    const engine = new MigrationEngine(this.db, { logger });
    engine.registerCoreSchemas();
    engine.applyAll();
  }

  private checkTargets(bundle: ExportBundle): void {
    for (const [table, rows] of Object.entries(bundle.tables)) {
      if (!this.db.tableExists(table)) {
        throw new ValidationError(`Import targets unknown table ${table}`, { table });
      }

      const columns = new Set(this.db.tableColumns(table).map((column) => column.name));
      for (const row of rows) {
        for (const column of Object.keys(row)) {
          if (!columns.has(column)) {
            throw new ValidationError(`Import targets unknown column ${table}.${column}`, { table, column });
          }
        }
      }
    }
  }

  private importJson(content: string, options: ImportOptions): ImportResult {
    const bundle = this.parseBundle(content, options.validate ?? true);

    const tableCount = Object.keys(bundle.tables).length;
    const rowCount = Object.values(bundle.tables).reduce((sum, rows) => sum + rows.length, 0);
    const result: ImportResult = { format: 'json', dryRun: options.dryRun ?? false, tableCount, rowCount };

    if (options.dryRun) {
      try {
        this.db.transaction(() => {
          this.upgradeSchema(silentLogger());
          this.checkTargets(bundle);
          throw new DryRunRollback();
        });
      } catch (error) {
        if (!(error instanceof DryRunRollback)) throw error;
      }
      this.logger.info('Dry run: JSON import not applied', { tables: tableCount, rows: rowCount });
      return result;
    }

    const verb = options.replaceExisting ? 'INSERT OR REPLACE' : 'INSERT';
    this.db.transaction(() => {
      this.upgradeSchema(this.logger);
      this.checkTargets(bundle);
      for (const [table, rows] of Object.entries(bundle.tables)) {
        this.logger.debug('Importing table', { table, rows: rows.length });
        for (const row of rows) {
          const columns = Object.keys(row);
          if (columns.length === 0) continue;

          const sql =
            `${verb} INTO ${quoteIdentifier(table)} (${columns.map(quoteIdentifier).join(', ')}) ` +
            `VALUES (${columns.map(() => '?').join(', ')})`;
          try {
            this.db.execute(sql, columns.map((column) => decodeValue(row[column])));
          } catch (error) {
            throw wrapError(error, `Failed to import table ${table}`, { table });
          }
        }
      }
    });

    this.logger.info('JSON import completed', { tables: tableCount, rows: rowCount });
    return result;
  }
}
