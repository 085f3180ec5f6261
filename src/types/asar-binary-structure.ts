/**
 * Decoded asar archive: header tree plus the concatenated file data.
 */
import type { ArchiveDirectory, ArchiveFile } from './archive-header.js';

export interface AsarArchive {
  readonly header: ArchiveDirectory;
  readonly data: Buffer;
  /** Every file in the header keyed by its slash-joined path. */
  readonly files: ReadonlyMap<string, ArchiveFile>;
  /**
   * Header JSON bytes exactly as read by decode, written back verbatim by encode.
   * Absent once the header has been changed.
   */
  readonly headerJson?: Buffer;
}
