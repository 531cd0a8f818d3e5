/**
 * Backup and Restore
 *
 * Copies the store's backing file to and from archive locations, raw or
 * gzip-compressed. Archive format is always detected from the magic bytes.
 */

import { createReadStream, createWriteStream, existsSync } from 'node:fs';
import { mkdir, open, rename, rm, stat } from 'node:fs/promises';
import { basename, dirname } from 'node:path';
import { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGunzip, createGzip } from 'node:zlib';
import {
  ConflictError,
  errorMessage,
  formatMegabytes,
  IntegrityError,
  isQuarryError,
  NotFoundError,
  silentLogger,
  wrapError,
  type Logger,
} from '@quarry/common';
import { embedFileName, isCompressedFile, readGzipHeader } from './archive.js';
import { checkDatabaseFile, type StorageHandle } from './database.js';

export interface BackupOptions {
  outputPath: string;
  compress?: boolean;
  verify?: boolean;
}

export interface RestoreOptions {
  backupPath: string;
  verify?: boolean;
  createBackup?: boolean;
  force?: boolean;
}

export interface BackupResult {
  path: string;
  size: number;
  compressed: boolean;
}

export interface RestoreResult {
  path: string;
  compressed: boolean;
  safetyBackup?: string;
}

export interface BackupInfo {
  path: string;
  size: number;
  modifiedAt: Date;
  isCompressed: boolean;
  originalName?: string;
}

export interface BackupManagerOptions {
  /** Open handle on the same file; checkpointed before each copy */
  db?: StorageHandle;
  logger?: Logger;
}

/**
 * Flush a written file to durable storage
 */
async function syncFile(path: string): Promise<void> {
  const handle = await open(path, 'r+');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Run integrity_check against a database file, throwing IntegrityError on
 * anything other than "ok"
 */
export function verifyDatabaseFile(path: string): void {
  let result: string[];
  try {
    result = checkDatabaseFile(path);
  } catch (error) {
    throw new IntegrityError(`${path} is not a valid database: ${errorMessage(error)}`, { path });
  }

  if (result.length !== 1 || result[0] !== 'ok') {
    throw new IntegrityError(`Database integrity check failed for ${path}: ${result.join('; ')}`, {
      path,
      details: { issues: result },
    });
  }
}

/**
 * One-line summary of a backup file
 */
export function formatBackupInfo(info: BackupInfo): string {
  const kind = info.isCompressed ? 'Compressed' : 'Raw';
  return `${info.path} (${formatMegabytes(info.size)}, ${kind}, ${info.modifiedAt.toISOString()})`;
}

export class BackupManager {
  private readonly dbPath: string;
  private readonly db?: StorageHandle;
  private readonly logger: Logger;

  constructor(dbPath: string, options: BackupManagerOptions = {}) {
    this.dbPath = dbPath;
    this.db = options.db;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'backup' });
  }

  /**
   * Write a snapshot of the store to outputPath
   */
  async backup(options: BackupOptions): Promise<BackupResult> {
    const { outputPath, compress = false, verify = false } = options;

    if (!existsSync(this.dbPath)) {
      throw new NotFoundError('Database', this.dbPath);
    }

    // WAL content must reach the main file before it is copied
    if (this.db?.isOpen) {
      this.db.checkpoint();
    }

    try {
      await mkdir(dirname(outputPath), { recursive: true });

      if (compress) {
        this.logger.debug('Compressing database', { source: this.dbPath, outputPath });
        const { mtime } = await stat(this.dbPath);
        await pipeline(
          createReadStream(this.dbPath),
          createGzip(),
          embedFileName(basename(this.dbPath), mtime),
          createWriteStream(outputPath)
        );
      } else {
        this.logger.debug('Copying database file', { source: this.dbPath, outputPath });
        await pipeline(createReadStream(this.dbPath), createWriteStream(outputPath));
      }

      await syncFile(outputPath);
    } catch (error) {
      throw wrapError(error, `Failed to write backup ${outputPath}`, { path: outputPath });
    }

    if (verify) {
      await this.verifyBackup(outputPath);
    }

    const { size } = await stat(outputPath);
    this.logger.info('Backup completed', { path: outputPath, size, compressed: compress });
    return { path: outputPath, size, compressed: compress };
  }

  /**
   * Replace the store with the contents of a backup
   */
  async restore(options: RestoreOptions): Promise<RestoreResult> {
    const { backupPath, verify = false, createBackup = false, force = false } = options;

    if (!existsSync(backupPath)) {
      throw new NotFoundError('Backup', backupPath);
    }

    if (this.db?.isOpen) {
      throw new ConflictError(`Close the database at ${this.dbPath} before restoring over it`, {
        path: this.dbPath,
      });
    }

    const destExists = existsSync(this.dbPath);
    if (destExists && !force) {
      throw new ConflictError(
        `Destination database already exists: ${this.dbPath} (use --force to overwrite)`,
        { path: this.dbPath }
      );
    }

    let safetyBackup: string | undefined;
    if (createBackup && destExists) {
      safetyBackup = `${this.dbPath}.backup.${Math.floor(Date.now() / 1000)}`;
      this.logger.debug('Creating safety backup', { path: safetyBackup });
      await this.backup({ outputPath: safetyBackup });
    }

    const compressed = await isCompressedFile(backupPath);
    const staging = `${this.dbPath}.restoring`;

    try {
      await mkdir(dirname(this.dbPath), { recursive: true });
      if (compressed) {
        await pipeline(createReadStream(backupPath), createGunzip(), createWriteStream(staging));
      } else {
        await pipeline(createReadStream(backupPath), createWriteStream(staging));
      }
      await syncFile(staging);
    } catch (error) {
      await rm(staging, { force: true });
      if (compressed && !isQuarryError(error)) {
        throw new IntegrityError(`Backup archive ${backupPath} is corrupted: ${errorMessage(error)}`, {
          path: backupPath,
        });
      }
      throw wrapError(error, `Failed to restore from ${backupPath}`, { path: backupPath });
    }

    try {
      // A stale WAL would be replayed over the restored pages
      await rm(`${this.dbPath}-wal`, { force: true });
      await rm(`${this.dbPath}-shm`, { force: true });
      await rename(staging, this.dbPath);
    } catch (error) {
      throw wrapError(error, `Failed to move restored database into ${this.dbPath}`, { path: this.dbPath });
    }

    if (verify) {
      verifyDatabaseFile(this.dbPath);
    }

    this.logger.info('Database restored', { from: backupPath, path: this.dbPath, compressed });
    return { path: this.dbPath, compressed, ...(safetyBackup ? { safetyBackup } : {}) };
  }

  /**
   * Size, mtime and format of a backup file
   */
  async getBackupInfo(path: string): Promise<BackupInfo> {
    if (!existsSync(path)) {
      throw new NotFoundError('Backup', path);
    }

    const stats = await stat(path);
    const isCompressed = await isCompressedFile(path);
    const info: BackupInfo = { path, size: stats.size, modifiedAt: stats.mtime, isCompressed };

    if (isCompressed) {
      const header = await readGzipHeader(path);
      if (header?.originalName) {
        info.originalName = header.originalName;
      }
    }

    return info;
  }

  /**
   * Check an artifact: compressed archives must decompress fully, raw
   * files must pass integrity_check
   */
  async verifyBackup(path: string): Promise<void> {
    this.logger.debug('Verifying backup', { path });

    if (await isCompressedFile(path)) {
      const sink = new Writable({
        write(_chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
          callback();
        },
      });

      try {
        await pipeline(createReadStream(path), createGunzip(), sink);
      } catch (error) {
        throw new IntegrityError(`Backup archive ${path} is corrupted: ${errorMessage(error)}`, { path });
      }
      return;
    }

    verifyDatabaseFile(path);
  }
}
