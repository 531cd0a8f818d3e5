/**
 * Database Health
 *
 * Read-only diagnostic probes plus the vacuum and analyze maintenance
 * operations. Nothing here is persisted; every report is recomputed.
 */

import { existsSync, statSync } from 'node:fs';
import {
  elapsedMs,
  errorMessage,
  IntegrityError,
  silentLogger,
  wrapError,
  type CheckStatus,
  type DatabaseStats,
  type HealthCheck,
  type HealthStatus,
  type Logger,
  type TableStats,
} from '@quarry/common';
import type { StorageHandle } from './database.js';

export interface HealthCheckerOptions {
  logger?: Logger;
}

export interface MaintenanceResult {
  durationMs: number;
  sizeBefore: number;
  sizeAfter: number;
  reclaimed: number;
}

const FREE_PAGE_WARNING = 100;
const SLOW_QUERY_MS = 100;
const LARGE_DATABASE_BYTES = 100 * 1024 * 1024;
const HIGH_ROW_COUNT = 10000;

const SEVERITY: Record<CheckStatus, number> = { OK: 0, WARNING: 1, ERROR: 2 };

/**
 * Worst status among a set of checks
 */
export function worstStatus(checks: Pick<HealthCheck, 'status'>[]): CheckStatus {
  return checks.reduce<CheckStatus>(
    (worst, check) => (SEVERITY[check.status] > SEVERITY[worst] ? check.status : worst),
    'OK'
  );
}

type Probe = () => { status: CheckStatus; message: string; value?: string };

function fileSize(path: string): number {
  return existsSync(path) ? statSync(path).size : 0;
}

export class HealthChecker {
  private readonly db: StorageHandle;
  private readonly logger: Logger;

  constructor(db: StorageHandle, options: HealthCheckerOptions = {}) {
    this.db = db;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'health' });
  }

  /**
   * Run every probe and derive the overall status and recommendations
   */
  check(): HealthStatus {
    const status: HealthStatus = {
      status: 'OK',
      checkedAt: new Date().toISOString(),
      databasePath: this.db.path,
      databaseSize: fileSize(this.db.path),
      tableCount: 0,
      totalRows: 0,
      integrityOk: false,
      walMode: false,
      version: '',
      checks: [],
      recommendations: [],
    };

    const connectivity = this.checkConnectivity();
    status.checks.push(connectivity);
    if (connectivity.status === 'ERROR') {
      status.status = 'ERROR';
      return status;
    }

    const integrity = this.checkIntegrity();
    status.checks.push(integrity);
    status.integrityOk = integrity.status === 'OK';

    const version = this.checkVersion();
    status.checks.push(version);
    status.version = version.value ?? '';

    const journal = this.checkJournalMode();
    status.checks.push(journal);
    status.walMode = journal.value === 'wal';

    const tables = this.checkTables();
    status.checks.push(tables);
    status.tableCount = Number(tables.value ?? 0);

    const rows = this.checkRowCounts();
    status.checks.push(rows);
    status.totalRows = Number(rows.value ?? 0);

    status.checks.push(this.checkFreeSpace());
    status.checks.push(this.checkPerformance());

    status.recommendations = this.generateRecommendations(status);
    status.status = worstStatus(status.checks);

    this.logger.debug('Health check completed', { status: status.status, checks: status.checks.length });
    return status;
  }

  /**
   * Detailed statistics for status --detailed and size
   */
  getStats(): DatabaseStats {
    try {
      const pageCount = this.pragmaNumber('page_count');
      const pageSize = this.pragmaNumber('page_size');

      return {
        totalSize: fileSize(this.db.path),
        dataSize: pageCount * pageSize,
        freePages: this.pragmaNumber('freelist_count'),
        pageCount,
        pageSize,
        walSize: fileSize(`${this.db.path}-wal`),
        journalMode: String(this.db.pragma('journal_mode')),
        cacheSize: this.pragmaNumber('cache_size'),
        tempStore: String(this.db.pragma('temp_store')),
        tables: this.getTableStats(),
      };
    } catch (error) {
      throw wrapError(error, 'Failed to collect database statistics');
    }
  }

  /**
   * Raw integrity_check output lines
   */
  integrity(): string[] {
    try {
      return this.db
        .query<{ integrity_check: string }>('PRAGMA integrity_check')
        .map((row) => row.integrity_check);
    } catch (error) {
      throw wrapError(error, 'Integrity check failed');
    }
  }

  /**
   * Throw IntegrityError unless the store reports exactly "ok"
   */
  assertIntegrity(): void {
    const result = this.integrity();
    if (result.length !== 1 || result[0] !== 'ok') {
      throw new IntegrityError(`Database integrity check failed: ${result.join('; ')}`, {
        path: this.db.path,
        details: { issues: result },
      });
    }
  }

  /**
   * Rebuild the database file, reclaiming free pages
   */
  vacuum(): MaintenanceResult {
    const sizeBefore = fileSize(this.db.path);
    const start = performance.now();

    try {
      this.db.exec('VACUUM');
    } catch (error) {
      throw wrapError(error, 'Vacuum failed', { path: this.db.path });
    }

    // Fold the rebuilt pages back into the main file so the size is current
    this.db.checkpoint();

    const sizeAfter = fileSize(this.db.path);
    const result = {
      durationMs: elapsedMs(start),
      sizeBefore,
      sizeAfter,
      reclaimed: Math.max(0, sizeBefore - sizeAfter),
    };
    this.logger.info('Vacuum completed', { ...result });
    return result;
  }

  /**
   * Refresh query planner statistics
   */
  analyze(): MaintenanceResult {
    const size = fileSize(this.db.path);
    const start = performance.now();

    try {
      this.db.exec('ANALYZE');
    } catch (error) {
      throw wrapError(error, 'Analyze failed', { path: this.db.path });
    }

    const result = { durationMs: elapsedMs(start), sizeBefore: size, sizeAfter: size, reclaimed: 0 };
    this.logger.info('Analyze completed', { durationMs: result.durationMs });
    return result;
  }

  // ==========================================================================
  // Probes
  // ==========================================================================

  private runProbe(name: string, onError: CheckStatus, probe: Probe): HealthCheck {
    const checkedAt = new Date().toISOString();
    const start = performance.now();

    try {
      const outcome = probe();
      return { name, ...outcome, durationMs: elapsedMs(start), checkedAt };
    } catch (error) {
      return {
        name,
        status: onError,
        message: `${name} failed: ${errorMessage(error)}`,
        durationMs: elapsedMs(start),
        checkedAt,
      };
    }
  }

  private checkConnectivity(): HealthCheck {
    return this.runProbe('Database Connectivity', 'ERROR', () => {
      this.db.queryOne('SELECT 1');
      return { status: 'OK', message: 'Database connection successful' };
    });
  }

  private checkIntegrity(): HealthCheck {
    return this.runProbe('Database Integrity', 'ERROR', () => {
      const result = this.integrity().join('; ');
      if (result === 'ok') {
        return { status: 'OK', message: 'Database integrity verified', value: 'ok' };
      }
      return { status: 'ERROR', message: `Integrity issues found: ${result}`, value: result };
    });
  }

  private checkVersion(): HealthCheck {
    return this.runProbe('SQLite Version', 'WARNING', () => {
      const row = this.db.queryOne<{ version: string }>('SELECT sqlite_version() AS version');
      const version = row?.version ?? 'unknown';
      return { status: 'OK', message: `SQLite version: ${version}`, value: version };
    });
  }

  private checkJournalMode(): HealthCheck {
    return this.runProbe('Journal Mode', 'WARNING', () => {
      const mode = String(this.db.pragma('journal_mode'));
      if (mode === 'wal') {
        return { status: 'OK', message: 'WAL mode enabled', value: mode };
      }
      return { status: 'WARNING', message: `Journal mode is ${mode} (consider enabling WAL)`, value: mode };
    });
  }

  private checkTables(): HealthCheck {
    return this.runProbe('Table Count', 'WARNING', () => {
      const count = this.db.listTables({ includeInternal: true }).length;
      return { status: 'OK', message: `Database contains ${count} tables`, value: String(count) };
    });
  }

  private checkRowCounts(): HealthCheck {
    return this.runProbe('Total Row Count', 'WARNING', () => {
      const total = this.getTableStats().reduce((sum, table) => sum + Math.max(0, table.rowCount), 0);
      return { status: 'OK', message: `Database contains ${total} total rows`, value: String(total) };
    });
  }

  private checkFreeSpace(): HealthCheck {
    return this.runProbe('Free Space', 'WARNING', () => {
      const freePages = this.pragmaNumber('freelist_count');
      if (freePages > FREE_PAGE_WARNING) {
        return {
          status: 'WARNING',
          message: `Database has ${freePages} free pages (consider VACUUM)`,
          value: String(freePages),
        };
      }
      return { status: 'OK', message: `Database has ${freePages} free pages`, value: String(freePages) };
    });
  }

  private checkPerformance(): HealthCheck {
    return this.runProbe('Query Performance', 'WARNING', () => {
      const start = performance.now();
      this.db.queryOne('SELECT COUNT(*) FROM sqlite_master');
      const duration = elapsedMs(start);

      if (duration > SLOW_QUERY_MS) {
        return { status: 'WARNING', message: `Slow query performance: ${duration}ms`, value: `${duration}ms` };
      }
      return { status: 'OK', message: `Query performance: ${duration}ms`, value: `${duration}ms` };
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private pragmaNumber(name: string): number {
    const value = Number(this.db.pragma(name));
    return Number.isFinite(value) ? value : 0;
  }

  private getTableStats(): TableStats[] {
    return this.db.listTables({ includeInternal: true }).map((name) => {
      try {
        return { name, rowCount: this.db.countRows(name) };
      } catch (error) {
        this.logger.warn('Could not count rows', { table: name, error: errorMessage(error) });
        return { name, rowCount: -1 };
      }
    });
  }

  private generateRecommendations(status: HealthStatus): string[] {
    const recommendations: string[] = [];

    if (!status.walMode) {
      recommendations.push('Enable WAL mode for better concurrency: PRAGMA journal_mode=WAL');
    }

    if (status.checks.some((check) => check.name === 'Free Space' && check.status === 'WARNING')) {
      recommendations.push('Run VACUUM to reclaim free space and optimize database');
    }

    if (status.databaseSize > LARGE_DATABASE_BYTES) {
      recommendations.push('Large database detected - consider regular ANALYZE for query optimization');
    }

    if (status.totalRows > HIGH_ROW_COUNT) {
      recommendations.push('High row count - ensure proper indexes are in place for frequently queried columns');
    }

    return recommendations;
  }
}
