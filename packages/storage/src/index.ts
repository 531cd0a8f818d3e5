/**
 * @quarry/storage - SQLite Persistence Layer
 *
 * Storage handle, migrations, health, backup and transfer for the quarry store.
 */

export { StorageHandle, openDatabase, withDatabase, checkDatabaseFile } from './database.js';
export type { DatabaseOptions, ColumnInfo } from './database.js';
export { LEDGER_TABLE, INTERNAL_TABLES, GENERATED_KEY_TABLES, quoteIdentifier } from './schema.js';

export { MigrationEngine, migrationChecksum } from './migrations.js';
export type {
  MigrationDefinition,
  LedgerEntry,
  MigrationStatus,
  ApplyResult,
  DuplicatePolicy,
  MigrationEngineOptions,
} from './migrations.js';

export { HealthChecker, worstStatus } from './health.js';
export type { HealthCheckerOptions, MaintenanceResult } from './health.js';

export { BackupManager, verifyDatabaseFile, formatBackupInfo } from './backup.js';
export type {
  BackupOptions,
  RestoreOptions,
  BackupResult,
  RestoreResult,
  BackupInfo,
  BackupManagerOptions,
} from './backup.js';
export { isCompressedFile, readGzipHeader, parseGzipHeader, GZIP_MAGIC } from './archive.js';

export {
  TransferManager,
  detectFormat,
  splitStatements,
  sqlLiteral,
  csvField,
  encodeValue,
  BUNDLE_VERSION,
} from './transfer.js';
export type {
  ExportOptions,
  ImportOptions,
  ExportResult,
  ImportResult,
  TransferManagerOptions,
} from './transfer.js';

export * from './stores/index.js';
