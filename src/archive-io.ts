/**
 * File-system side of patching: whole-file reads, atomic replacement and the
 * backup/restore contract.
 */
import { open, readFile, rename, rm, stat } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { BackupError } from './types/errors.js';

export type BackupStatus = 'created' | 'kept-existing';

/**
 * Backup location used when the caller names none.
 */
export function defaultBackupPath(archivePath: string): string {
  return `${archivePath}.backup`;
}

/**
 * Check if a file exists at the given path.
 *
 * @param filePath - Path to check
 * @returns true if file exists, false if nothing is there
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export async function readArchiveFile(filePath: string): Promise<Buffer> {
  return readFile(filePath);
}

/** Permission bits of an existing file, or undefined when nothing is there. */
async function permissionBits(filePath: string): Promise<number | undefined> {
  try {
    return (await stat(filePath)).mode & 0o7777;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

/**
 * Writes `data` to a sibling temp file, flushes it to disk and renames it over
 * `filePath`, so readers see either the old or the new file. A replaced file
 * keeps its permission bits.
 */
export async function writeFileAtomic(filePath: string, data: Buffer): Promise<void> {
  const tempPath = join(dirname(filePath), `.${basename(filePath)}.${process.pid}.tmp`);
  const mode = await permissionBits(filePath);
  try {
    const handle = await open(tempPath, 'w');
    try {
      if (mode !== undefined) {
        await handle.chmod(mode);
      }
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Copies the archive to `backupPath` and flushes it before returning.
 * An existing backup is kept unless `overwrite` is set, so the first,
 * unmodified archive stays recoverable across repeated patches.
 *
 * @throws {BackupError} If the archive cannot be copied
 */
export async function createBackup(
  archivePath: string,
  backupPath: string,
  options?: { readonly overwrite?: boolean }
): Promise<BackupStatus> {
  if (!options?.overwrite && (await fileExists(backupPath))) {
    return 'kept-existing';
  }
  try {
    const bytes = await readFile(archivePath);
    await writeFileAtomic(backupPath, bytes);
    return 'created';
  } catch (error) {
    throw new BackupError(
      `Failed to back up "${archivePath}" to "${backupPath}": ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}

/**
 * Copies the backup bytes back over the archive. The backup itself is left in place.
 *
 * @throws {BackupError} If the backup is missing or cannot be copied
 */
export async function restoreBackup(archivePath: string, backupPath: string): Promise<void> {
  if (!(await fileExists(backupPath))) {
    throw new BackupError(`Backup file "${backupPath}" does not exist`);
  }
  try {
    const bytes = await readFile(backupPath);
    await writeFileAtomic(archivePath, bytes);
  } catch (error) {
    throw new BackupError(
      `Failed to restore "${archivePath}" from "${backupPath}": ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}
