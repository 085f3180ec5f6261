/**
 * asar-inject - Main entry point
 *
 * Byte-exact asar archive codec plus a reversible script injection engine.
 */

export { AsarBinary } from './asar-binary.js';
export { flattenFiles, listNodes, parseHeader, serializeHeader } from './archive-header.js';
export { isJsonObject, readJson, writeJson } from './json-text.js';
export { computeIntegrity, DEFAULT_INTEGRITY_BLOCK_SIZE } from './integrity.js';
export {
  extractPayload,
  findAnchor,
  inject,
  isAlreadyPatched,
  removeInjection,
  renderBlock,
  renderPageScript,
  validatePayload,
} from './injection.js';
export { patchArchive, replaceEntryData, unpatchArchive } from './patch.js';
export type { PatchRequest, PatchResult, UnpatchRequest, UnpatchResult } from './patch.js';
export { createBackup, defaultBackupPath, readArchiveFile, restoreBackup, writeFileAtomic } from './archive-io.js';
export { applyTheme, removeTheme, restoreTheme } from './workflow.js';
export { DEFAULT_CONFIG, DEFAULT_CONFIG_FILE, loadConfig, parseConfig } from './config.js';
export type { AppConfig } from './config.js';
export { DEFAULT_ENTRY_PATH, DEFAULT_INJECTION_CONFIG } from './constants/injection-defaults.js';
export { ArchiveError, BackupError, ConfigError, InjectionError } from './types/errors.js';
export type { ArchiveErrorCode, InjectionErrorCode } from './types/errors.js';
export type {
  ArchiveDirectory,
  ArchiveFile,
  ArchiveLink,
  ArchiveListing,
  ArchiveNode,
  FileIntegrity,
  JsonObject,
  JsonValue,
} from './types/archive-header.js';
export type { AsarArchive } from './types/asar-binary-structure.js';
export type { InjectionConfig, InjectionPayload, TextRange } from './types/injection.js';
export type { Logger } from './types/logger.js';
