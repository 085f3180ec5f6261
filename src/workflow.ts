/**
 * File-level theme workflows used by the CLI.
 *
 * Each workflow reads the whole archive, transforms it in memory and replaces
 * the file atomically. The backup is written and flushed before the archive is
 * touched.
 */
import { resolve } from 'node:path';
import {
  createBackup,
  defaultBackupPath,
  readArchiveFile,
  restoreBackup,
  writeFileAtomic,
} from './archive-io.js';
import { patchArchive, unpatchArchive } from './patch.js';
import { DEFAULT_ENTRY_PATH } from './constants/injection-defaults.js';
import type { InjectionConfig } from './types/injection.js';
import type { Logger } from './types/logger.js';

export interface ApplyThemeOptions {
  readonly archivePath: string;
  readonly css: string;
  readonly js?: string;
  readonly entryPath?: string;
  readonly backupPath?: string;
  readonly makeBackup?: boolean;
  readonly reapply?: boolean;
  readonly injection?: InjectionConfig;
  readonly logger?: Logger;
}

export interface RemoveThemeOptions {
  readonly archivePath: string;
  readonly entryPath?: string;
  readonly injection?: InjectionConfig;
  readonly logger?: Logger;
}

export interface RestoreThemeOptions {
  readonly archivePath: string;
  readonly backupPath?: string;
  readonly logger?: Logger;
}

/**
 * Injects a theme into the archive on disk.
 *
 * @returns `patched`, or `already-patched` when the archive was left as it was
 */
export async function applyTheme(options: ApplyThemeOptions): Promise<'patched' | 'already-patched'> {
  const logger = options.logger ?? console;
  const archivePath = resolve(options.archivePath);
  const entryPath = options.entryPath ?? DEFAULT_ENTRY_PATH;

  logger.log(`Reading archive: ${archivePath}`);
  const archiveBytes = await readArchiveFile(archivePath);

  logger.log(`Injecting theme into ${entryPath}...`);
  const result = patchArchive(archiveBytes, {
    entryPath,
    css: options.css,
    js: options.js ?? '',
    ...(options.injection ? { injection: options.injection } : {}),
    ...(options.reapply ? { reapply: true } : {}),
  });

  if (result.status === 'already-patched') {
    logger.warn(`${entryPath} already contains an injected theme; pass --reapply to replace it`);
    return result.status;
  }

  if (options.makeBackup ?? true) {
    const backupPath = resolve(options.backupPath ?? defaultBackupPath(archivePath));
    const backup = await createBackup(archivePath, backupPath);
    logger.log(
      backup === 'created'
        ? `Backup written to: ${backupPath}`
        : `Backup ${backupPath} already exists, keeping it`
    );
  }

  await writeFileAtomic(archivePath, result.archive);
  logger.log(`${entryPath}: ${result.previousSize} -> ${result.newSize} bytes`);
  return result.status;
}

/**
 * Cuts a previously injected theme out of the archive on disk.
 *
 * @returns `unpatched`, or `not-patched` when there was nothing to remove
 */
export async function removeTheme(options: RemoveThemeOptions): Promise<'unpatched' | 'not-patched'> {
  const logger = options.logger ?? console;
  const archivePath = resolve(options.archivePath);
  const entryPath = options.entryPath ?? DEFAULT_ENTRY_PATH;

  const result = unpatchArchive(await readArchiveFile(archivePath), {
    entryPath,
    ...(options.injection ? { injection: options.injection } : {}),
  });
  if (result.status === 'not-patched') {
    logger.warn(`${entryPath} has no injected theme`);
    return result.status;
  }
  await writeFileAtomic(archivePath, result.archive);
  logger.log(`Removed injected theme from ${entryPath}`);
  return result.status;
}

/**
 * Copies the backup over the archive.
 */
export async function restoreTheme(options: RestoreThemeOptions): Promise<void> {
  const logger = options.logger ?? console;
  const archivePath = resolve(options.archivePath);
  const backupPath = resolve(options.backupPath ?? defaultBackupPath(archivePath));
  logger.log(`Restoring ${archivePath} from ${backupPath}`);
  await restoreBackup(archivePath, backupPath);
}
