/**
 * Compressed snapshots of the document store
 *
 * Snapshots are written as `<backupDir>/<storeName>_backup_YYYYMMDD_HHMMSS.tar.gz`
 * and never deleted by this tool.
 */

import { execFile } from 'node:child_process';
import { mkdir, stat } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { promisify } from 'node:util';

import { IntegrityError, toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../api/logger.js';
import { timeStamp } from '../utils/dates.js';

const execFileAsync = promisify(execFile);

/**
 * Produces a snapshot of a directory tree
 */
export interface Snapshotter {
  /**
   * @returns Path of the created snapshot
   * @throws IntegrityError when the snapshot could not be created
   */
  snapshot(sourceDir: string): Promise<string>;
}

/**
 * Snapshotter backed by the system `tar` binary
 */
export class TarSnapshotter implements Snapshotter {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly backupDir: string,
    options: { logger?: Logger; now?: () => Date } = {}
  ) {
    this.log = (options.logger ?? defaultLogger).child({ component: 'backup' });
    this.now = options.now ?? (() => new Date());
  }

  async snapshot(sourceDir: string): Promise<string> {
    const source = resolve(sourceDir);
    const archivePath = join(this.backupDir, `${basename(source)}_backup_${timeStamp(this.now())}.tar.gz`);

    this.log.info('Creating backup', { source, archive: archivePath });

    try {
      await mkdir(this.backupDir, { recursive: true });
      await execFileAsync('tar', ['-czf', archivePath, '-C', dirname(source), basename(source)]);
      const info = await stat(archivePath);
      if (info.size === 0) {
        throw new Error('tar produced an empty archive');
      }
    } catch (error) {
      throw new IntegrityError(`Backup of ${source} failed: ${toError(error).message}`, toError(error));
    }

    this.log.info('Backup created', { archive: archivePath });
    return archivePath;
  }
}
