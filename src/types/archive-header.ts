/**
 * In-memory model of an asar archive's JSON header.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/**
 * JSON object members in document order. A plain object would move
 * integer-like names to the front and treat `__proto__` specially.
 */
export type JsonObject = ReadonlyMap<string, JsonValue>;

/**
 * Per-file hashes written by newer asar writers.
 */
export interface FileIntegrity {
  readonly algorithm: 'SHA256';
  /** Hex SHA-256 of the whole file. */
  readonly hash: string;
  readonly blockSize: number;
  /** Hex SHA-256 of each `blockSize` chunk. */
  readonly blocks: readonly string[];
}

/**
 * A file entry. Packed files live in the archive's data blob at `offset`;
 * unpacked files live beside the archive on disk and have no offset.
 */
export interface ArchiveFile {
  readonly kind: 'file';
  readonly size: number;
  readonly offset: number | undefined;
  readonly unpacked: boolean;
  readonly integrity?: FileIntegrity;
  /** Header object as decoded; its key order is the order written back. */
  readonly raw: JsonObject;
}

export interface ArchiveDirectory {
  readonly kind: 'directory';
  readonly entries: ReadonlyMap<string, ArchiveNode>;
  readonly raw: JsonObject;
}

export interface ArchiveLink {
  readonly kind: 'link';
  readonly link: string;
  readonly raw: JsonObject;
}

export type ArchiveNode = ArchiveDirectory | ArchiveFile | ArchiveLink;

/**
 * One line of an archive listing.
 */
export interface ArchiveListing {
  readonly path: string;
  readonly kind: ArchiveNode['kind'];
  /** Byte size for files, child count for directories, 0 for links. */
  readonly size: number;
  readonly unpacked: boolean;
}
