/**
 * Database Commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import {
  ConfigError,
  errorMessage,
  formatMegabytes,
  isQuarryError,
  loggerFromConfig,
  resolveConfig,
  transferFormatSchema,
  validateBody,
  type CheckStatus,
  type ConfigInput,
  type Logger,
  type QuarryConfig,
  type TransferFormat,
} from '@quarry/common';
import {
  AuditStore,
  BackupManager,
  detectFormat,
  formatBackupInfo,
  HealthChecker,
  MigrationEngine,
  TransferManager,
  withDatabase,
  type MigrationStatus,
  type StorageHandle,
} from '@quarry/storage';

export const AUDIT_ACTOR = 'quarry-cli';

interface Context {
  config: QuarryConfig;
  logger: Logger;
}

interface MigrateOptions {
  status?: boolean;
  rollback?: boolean;
  count: string;
}

interface BackupCommandOptions {
  output?: string;
  compress?: boolean;
  verify?: boolean;
}

interface RestoreCommandOptions {
  from?: string;
  verify?: boolean;
  backup?: boolean;
  force?: boolean;
}

interface ExportCommandOptions {
  output?: string;
  format?: string;
  tables?: string;
  schema: boolean;
  data: boolean;
}

interface ImportCommandOptions {
  from?: string;
  format?: string;
  validate: boolean;
  dryRun?: boolean;
  replace?: boolean;
}

interface StatusCommandOptions {
  detailed?: boolean;
  json?: boolean;
}

function context(command: Command): Context {
  const config = resolveConfig(command.optsWithGlobals<ConfigInput>());
  return { config, logger: loggerFromConfig(config) };
}

async function withStore<T>(
  command: Command,
  fn: (db: StorageHandle, ctx: Context) => T | Promise<T>
): Promise<T> {
  const ctx = context(command);
  return withDatabase(
    { path: ctx.config.dbPath, verbose: ctx.config.verbose, logger: ctx.logger },
    (db) => fn(db, ctx)
  );
}

function recordAudit(db: StorageHandle, action: string, details: Record<string, unknown> = {}): void {
  new AuditStore(db).record({ actor: AUDIT_ACTOR, action, entity: 'database', details });
}

function reportError(error: unknown): void {
  if (isQuarryError(error)) {
    console.error(chalk.red(`Error: ${error.message}`));
  } else {
    console.error(chalk.red(`Unexpected error: ${errorMessage(error)}`));
  }
  process.exitCode = 1;
}

/**
 * Wrap an action so failures print in red and set a non-zero exit code
 */
function guarded<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      reportError(error);
    }
  };
}

function timestamp(): string {
  return new Date().toISOString().replace(/[:.]/g, '-');
}

/**
 * Backup location used when --output is not given
 */
export function defaultBackupPath(dbPath: string, compress: boolean): string {
  return join(dirname(dbPath), 'backups', `quarry-${timestamp()}.db${compress ? '.gz' : ''}`);
}

export function parseFormat(value: string): TransferFormat {
  const result = validateBody(transferFormatSchema, value);
  if (!result.success) {
    throw new ConfigError(`Unsupported format: ${value} (expected sql, json or csv)`);
  }
  return result.data;
}

export function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1) {
    throw new ConfigError(`Count must be a positive integer, got '${value}'`);
  }
  return count;
}

export function parseTableList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((table) => table.trim())
    .filter((table) => table.length > 0);
}

export function colorStatus(status: CheckStatus): string {
  switch (status) {
    case 'OK':
      return chalk.green(status);
    case 'WARNING':
      return chalk.yellow(status);
    case 'ERROR':
      return chalk.red(status);
  }
}

function printMigrationStatus(statuses: MigrationStatus[]): void {
  console.log(chalk.bold(`\nMigrations (${statuses.length}):\n`));
  for (const migration of statuses) {
    const state = migration.applied ? chalk.green('applied') : chalk.yellow('pending');
    console.log(`  ${chalk.cyan(migration.id)} ${state} ${chalk.gray(migration.description)}`);
    if (migration.appliedAt) {
      console.log(chalk.dim(`    applied at ${migration.appliedAt}`));
    }
    if (migration.drifted) {
      console.log(chalk.yellow('    body changed since it was applied'));
    }
  }
  console.log();
}

export function dbCommands(): Command {
  const db = new Command('db')
    .description('Database management commands');

  db
    .command('init')
    .description('Initialize the database and apply core migrations')
    .action(guarded(async (_options: Record<string, never>, command: Command) => {
      await withStore(command, (store, { config, logger }) => {
        const engine = new MigrationEngine(store, { logger });
        engine.registerCoreSchemas();
        const { applied } = engine.applyAll();
        recordAudit(store, 'db.init', { applied });

        console.log(chalk.green(`Database initialized at ${config.dbPath}`));
        console.log(chalk.gray(`Applied ${applied.length} migration(s)`));
      });
    }));

  db
    .command('migrate')
    .description('Run database migrations')
    .option('--status', 'Show migration status')
    .option('--rollback', 'Roll back applied migrations')
    .option('--count <n>', 'Number of migrations to roll back', '1')
    .action(guarded(async (options: MigrateOptions, command: Command) => {
      await withStore(command, (store, { logger }) => {
        const engine = new MigrationEngine(store, { logger });
        engine.registerCoreSchemas();

        if (options.status) {
          printMigrationStatus(engine.getStatus());
          return;
        }

        if (options.rollback) {
          const rolledBack = engine.rollbackMany(parseCount(options.count));
          if (rolledBack.length === 0) {
            console.log(chalk.yellow('No migrations to roll back.'));
            return;
          }
          recordAudit(store, 'db.migrate.rollback', { rolledBack });
          for (const id of rolledBack) {
            console.log(chalk.green(`Rolled back ${id}`));
          }
          return;
        }

        const { applied } = engine.applyAll();
        if (applied.length === 0) {
          console.log(chalk.yellow('Database is up to date.'));
          return;
        }
        recordAudit(store, 'db.migrate', { applied });
        for (const id of applied) {
          console.log(chalk.green(`Applied ${id}`));
        }
      });
    }));

  db
    .command('backup')
    .description('Create a database backup')
    .option('-o, --output <path>', 'Backup file path')
    .option('--compress', 'Compress the backup with gzip')
    .option('--verify', 'Verify the backup after writing')
    .action(guarded(async (options: BackupCommandOptions, command: Command) => {
      const { config, logger } = context(command);
      const compress = options.compress ?? false;
      const outputPath = options.output ?? defaultBackupPath(config.dbPath, compress);
      const spinner = ora(`Backing up ${config.dbPath}...`).start();

      try {
        const run = (store?: StorageHandle) =>
          new BackupManager(config.dbPath, { db: store, logger }).backup({
            outputPath,
            compress,
            verify: options.verify,
          });

        // Opening a missing store would create it; let the manager report it instead
        const result = existsSync(config.dbPath)
          ? await withDatabase({ path: config.dbPath, logger }, (store) => run(store))
          : await run();

        spinner.succeed(`Backup written to ${result.path}`);
        console.log(chalk.gray(`  Size: ${formatMegabytes(result.size)}`));
        console.log(chalk.gray(`  Compressed: ${result.compressed ? 'yes' : 'no'}`));
      } catch (error) {
        spinner.fail('Backup failed');
        throw error;
      }
    }));

  db
    .command('restore [file]')
    .description('Restore the database from a backup')
    .option('--from <path>', 'Backup file to restore')
    .option('--verify', 'Verify the restored database')
    .option('--backup', 'Back up the current database first')
    .option('--force', 'Overwrite an existing database')
    .action(guarded(async (file: string | undefined, options: RestoreCommandOptions, command: Command) => {
      const { config, logger } = context(command);
      const backupPath = file ?? options.from;
      if (!backupPath) {
        throw new ConfigError('Specify the backup to restore as an argument or with --from');
      }

      const spinner = ora(`Restoring from ${backupPath}...`).start();
      try {
        const result = await new BackupManager(config.dbPath, { logger }).restore({
          backupPath,
          verify: options.verify,
          createBackup: options.backup,
          force: options.force,
        });

        spinner.succeed(`Database restored to ${result.path}`);
        if (result.safetyBackup) {
          console.log(chalk.gray(`  Previous database saved to ${result.safetyBackup}`));
        }
      } catch (error) {
        spinner.fail('Restore failed');
        throw error;
      }
    }));

  db
    .command('export')
    .description('Export database contents')
    .option('-o, --output <path>', 'Output file path')
    .option('-f, --format <format>', 'Export format (sql, json, csv)')
    .option('--tables <list>', 'Comma-separated tables to export')
    .option('--no-schema', 'Exclude table schemas')
    .option('--no-data', 'Exclude table data')
    .action(guarded(async (options: ExportCommandOptions, command: Command) => {
      const format = options.format
        ? parseFormat(options.format)
        : options.output
          ? detectFormat(options.output)
          : 'sql';
      const outputPath = options.output ?? `quarry-export-${timestamp()}.${format}`;

      await withStore(command, async (store, { logger }) => {
        const result = await new TransferManager(store, { logger }).export({
          outputPath,
          format,
          tables: parseTableList(options.tables),
          includeSchema: options.schema,
          includeData: options.data,
        });

        console.log(chalk.green(`Exported ${result.rowCount} rows from ${result.tableCount} tables`));
        for (const file of result.files) {
          console.log(chalk.gray(`  ${file}`));
        }
      });
    }));

  db
    .command('import [file]')
    .description('Import data into the database')
    .option('--from <path>', 'File to import')
    .option('-f, --format <format>', 'Import format (sql, json)')
    .option('--no-validate', 'Skip bundle validation')
    .option('--dry-run', 'Parse and validate without writing')
    .option('--replace', 'Replace rows that already exist')
    .action(guarded(async (file: string | undefined, options: ImportCommandOptions, command: Command) => {
      const inputPath = file ?? options.from;
      if (!inputPath) {
        throw new ConfigError('Specify the file to import as an argument or with --from');
      }
      const format = options.format ? parseFormat(options.format) : detectFormat(inputPath);

      await withStore(command, async (store, { logger }) => {
        const result = await new TransferManager(store, { logger }).import({
          inputPath,
          format,
          validate: options.validate,
          dryRun: options.dryRun,
          replaceExisting: options.replace,
        });

        if (result.dryRun) {
          console.log(chalk.yellow(`Dry run: ${result.rowCount} rows in ${result.tableCount} tables would be imported`));
          return;
        }

        recordAudit(store, 'db.import', { path: inputPath, format, rows: result.rowCount });
        console.log(chalk.green(`Imported ${result.rowCount} rows into ${result.tableCount} tables`));
      });
    }));

  db
    .command('status')
    .description('Show database health')
    .option('--detailed', 'Include statistics and migration status')
    .option('--json', 'Output as JSON')
    .action(guarded(async (options: StatusCommandOptions, command: Command) => {
      await withStore(command, (store, { logger }) => {
        const checker = new HealthChecker(store, { logger });
        const health = checker.check();
        const stats = options.detailed ? checker.getStats() : undefined;

        let migrations: MigrationStatus[] | undefined;
        if (options.detailed) {
          const engine = new MigrationEngine(store, { logger });
          engine.registerCoreSchemas();
          migrations = engine.getStatus();
        }

        if (options.json) {
          console.log(JSON.stringify({ health, stats, migrations }, null, 2));
          return;
        }

        console.log(chalk.bold(`\nDatabase: ${health.databasePath}`));
        console.log(`Status: ${colorStatus(health.status)}`);
        console.log(chalk.gray(`Size: ${formatMegabytes(health.databaseSize)}, tables: ${health.tableCount}, rows: ${health.totalRows}`));
        console.log();

        for (const check of health.checks) {
          console.log(`  ${colorStatus(check.status)} ${check.name}: ${chalk.gray(check.message)}`);
        }

        if (health.recommendations.length > 0) {
          console.log(chalk.bold('\nRecommendations:'));
          for (const recommendation of health.recommendations) {
            console.log(`  - ${recommendation}`);
          }
        }

        if (stats) {
          console.log(chalk.bold('\nStatistics:'));
          console.log(`  Pages: ${stats.pageCount} x ${stats.pageSize} bytes (${stats.freePages} free)`);
          console.log(`  WAL size: ${formatMegabytes(stats.walSize)}`);
          console.log(`  Journal mode: ${stats.journalMode}`);
          for (const table of stats.tables) {
            console.log(chalk.gray(`  ${table.name}: ${table.rowCount} rows`));
          }
        }

        if (migrations) {
          printMigrationStatus(migrations);
        } else {
          console.log();
        }
      });
    }));

  db
    .command('vacuum')
    .description('Reclaim free space')
    .action(guarded(async (_options: Record<string, never>, command: Command) => {
      await withStore(command, (store, { logger }) => {
        const result = new HealthChecker(store, { logger }).vacuum();
        recordAudit(store, 'db.vacuum', { reclaimed: result.reclaimed });

        console.log(chalk.green(`Vacuum completed in ${result.durationMs}ms`));
        console.log(chalk.gray(`  Size: ${formatMegabytes(result.sizeBefore)} -> ${formatMegabytes(result.sizeAfter)}`));
      });
    }));

  db
    .command('analyze')
    .description('Refresh query planner statistics')
    .action(guarded(async (_options: Record<string, never>, command: Command) => {
      await withStore(command, (store, { logger }) => {
        const result = new HealthChecker(store, { logger }).analyze();
        console.log(chalk.green(`Analyze completed in ${result.durationMs}ms`));
      });
    }));

  db
    .command('integrity')
    .description('Run an integrity check')
    .action(guarded(async (_options: Record<string, never>, command: Command) => {
      await withStore(command, (store, { logger }) => {
        const result = new HealthChecker(store, { logger }).integrity();
        if (result.length === 1 && result[0] === 'ok') {
          console.log(chalk.green('Integrity check passed'));
          return;
        }

        console.log(chalk.red('Integrity check failed:'));
        for (const line of result) {
          console.log(chalk.red(`  ${line}`));
        }
        process.exitCode = 1;
      });
    }));

  db
    .command('size')
    .description('Show database size')
    .option('--breakdown', 'Show row counts per table')
    .action(guarded(async (options: { breakdown?: boolean }, command: Command) => {
      await withStore(command, (store, { logger }) => {
        const stats = new HealthChecker(store, { logger }).getStats();

        console.log(`Total size: ${formatMegabytes(stats.totalSize)}`);
        console.log(`Data size: ${formatMegabytes(stats.dataSize)}`);
        console.log(`WAL size: ${formatMegabytes(stats.walSize)}`);
        console.log(`Free pages: ${stats.freePages}`);

        if (options.breakdown) {
          console.log(chalk.bold('\nTables:'));
          for (const table of stats.tables) {
            console.log(`  ${table.name}: ${table.rowCount} rows`);
          }
        }
      });
    }));

  db
    .command('info <file>')
    .description('Show backup file information')
    .action(guarded(async (file: string, _options: Record<string, never>, command: Command) => {
      const { config, logger } = context(command);
      const info = await new BackupManager(config.dbPath, { logger }).getBackupInfo(file);

      console.log(formatBackupInfo(info));
      if (info.originalName) {
        console.log(chalk.gray(`  Original name: ${info.originalName}`));
      }
    }));

  return db;
}
