/**
 * Error classes shared by the codec, injection engine, patcher and CLI.
 */

export type ArchiveErrorCode =
  | 'MalformedHeader'
  | 'TruncatedData'
  | 'InvalidEncoding'
  | 'EntryNotFound'
  | 'UnpackedEntry'
  | 'NonTextEntry';

export type InjectionErrorCode =
  | 'AnchorNotFound'
  | 'AmbiguousAnchor'
  | 'PayloadEscapeViolation'
  | 'MalformedInjection'
  | 'InvalidConfig';

/**
 * Raised when an archive cannot be decoded or an entry cannot be used.
 */
export class ArchiveError extends Error {
  constructor(public readonly code: ArchiveErrorCode, message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ArchiveError';
  }
}

/**
 * Raised when a host script cannot be patched safely.
 */
export class InjectionError extends Error {
  constructor(public readonly code: InjectionErrorCode, message: string) {
    super(message);
    this.name = 'InjectionError';
  }
}

export class BackupError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'BackupError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ConfigError';
  }
}
