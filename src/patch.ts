/**
 * Patch Orchestrator - splices a theme into one script entry of an asar archive
 *
 * Everything here works on in-memory buffers; reading and writing the archive
 * file belongs to the caller (see workflow.ts).
 */
import { AsarBinary } from './asar-binary.js';
import { flattenFiles, mapFiles } from './archive-header.js';
import { computeIntegrity } from './integrity.js';
import {
  assertInjectionConfig,
  extractPayload,
  findAnchor,
  inject,
  isAlreadyPatched,
  removeInjection,
} from './injection.js';
import { DEFAULT_INJECTION_CONFIG } from './constants/injection-defaults.js';
import { ArchiveError, InjectionError } from './types/errors.js';
import type { ArchiveFile } from './types/archive-header.js';
import type { AsarArchive } from './types/asar-binary-structure.js';
import type { InjectionConfig, InjectionPayload } from './types/injection.js';

export interface PatchRequest extends InjectionPayload {
  /** Slash-joined path of the script entry, e.g. `app/mainScreen.js`. */
  readonly entryPath: string;
  readonly injection?: InjectionConfig;
  /** Replace an existing block instead of reporting `already-patched`. */
  readonly reapply?: boolean;
}

export type PatchResult =
  | { readonly status: 'patched'; readonly archive: Buffer; readonly previousSize: number; readonly newSize: number }
  | { readonly status: 'already-patched' };

export interface UnpatchRequest {
  readonly entryPath: string;
  readonly injection?: InjectionConfig;
}

export type UnpatchResult =
  | { readonly status: 'unpatched'; readonly archive: Buffer }
  | { readonly status: 'not-patched' };

/**
 * Replaces one packed entry's bytes and shifts every packed entry stored after it.
 * Returns a new archive; `archive` is left untouched.
 *
 * @throws {ArchiveError} `EntryNotFound`, `UnpackedEntry`, or `MalformedHeader` when another entry overlaps the target
 */
export function replaceEntryData(archive: AsarArchive, entryPath: string, content: Buffer): AsarArchive {
  const target = archive.files.get(entryPath);
  if (!target) {
    throw new ArchiveError('EntryNotFound', `No file entry "${entryPath}" in archive`);
  }
  if (target.offset === undefined) {
    throw new ArchiveError('UnpackedEntry', `Entry "${entryPath}" is stored outside the archive`);
  }
  const targetStart = target.offset;
  const targetEnd = targetStart + target.size;
  const delta = content.length - target.size;

  for (const [path, file] of archive.files) {
    if (path === entryPath || file.offset === undefined || file.size === 0) {
      continue;
    }
    if (file.offset < targetEnd && file.offset + file.size > targetStart) {
      throw new ArchiveError('MalformedHeader', `Entry "${path}" overlaps "${entryPath}" in the data section`);
    }
  }

  const header = mapFiles(archive.header, (file: ArchiveFile, path: string): ArchiveFile => {
    if (path === entryPath) {
      return {
        ...file,
        size: content.length,
        ...(file.integrity ? { integrity: computeIntegrity(content, file.integrity.blockSize) } : {}),
      };
    }
    if (file.offset !== undefined && file.offset >= targetEnd) {
      return { ...file, offset: file.offset + delta };
    }
    return file;
  });

  const data = Buffer.concat([
    archive.data.subarray(0, targetStart),
    content,
    archive.data.subarray(targetEnd),
  ]);
  return { header, data, files: flattenFiles(header) };
}

/**
 * Decodes a script entry as UTF-8, keeping any byte order mark.
 * @throws {ArchiveError} `NonTextEntry`
 */
function decodeText(bytes: Buffer, entryPath: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (error) {
    throw new ArchiveError('NonTextEntry', `Entry "${entryPath}" is not UTF-8 text`, error);
  }
}

function readScript(archive: AsarArchive, entryPath: string): { readonly bytes: Buffer; readonly text: string } {
  const bytes = AsarBinary.readEntry({ archive, path: entryPath });
  return { bytes, text: decodeText(bytes, entryPath) };
}

/**
 * Injects the payload into `entryPath` and returns the re-encoded archive.
 * An entry that already carries a block yields `already-patched` unless `reapply` is set,
 * in which case the old block is replaced.
 *
 * @throws {ArchiveError} codec and entry lookup failures
 * @throws {InjectionError} anchor and payload failures
 */
export function patchArchive(archiveBytes: Buffer, request: PatchRequest): PatchResult {
  const config = request.injection ?? DEFAULT_INJECTION_CONFIG;
  assertInjectionConfig(config);
  const archive = AsarBinary.decode({ buffer: archiveBytes });
  const { bytes, text: original } = readScript(archive, request.entryPath);

  let source = original;
  if (isAlreadyPatched(original, config)) {
    if (!request.reapply) {
      return { status: 'already-patched' };
    }
    if (extractPayload(original, config) === undefined) {
      throw new InjectionError('MalformedInjection', `Guard token "${config.guardToken}" is present without an injected block`);
    }
    source = removeInjection(original, config);
  }

  const range = findAnchor(source, config);
  const patched = inject(source, range, { css: request.css, js: request.js }, config);
  const content = Buffer.from(patched, 'utf8');
  const updated = replaceEntryData(archive, request.entryPath, content);
  return {
    status: 'patched',
    archive: AsarBinary.encode({ archive: updated }),
    previousSize: bytes.length,
    newSize: content.length,
  };
}

/**
 * Removes a previously injected block from `entryPath`.
 *
 * @throws {ArchiveError} codec and entry lookup failures
 * @throws {InjectionError} `MalformedInjection` when the block was edited by hand
 */
export function unpatchArchive(archiveBytes: Buffer, request: UnpatchRequest): UnpatchResult {
  const config = request.injection ?? DEFAULT_INJECTION_CONFIG;
  assertInjectionConfig(config);
  const archive = AsarBinary.decode({ buffer: archiveBytes });
  const { text: original } = readScript(archive, request.entryPath);
  if (extractPayload(original, config) === undefined) {
    return { status: 'not-patched' };
  }
  const restored = Buffer.from(removeInjection(original, config), 'utf8');
  const updated = replaceEntryData(archive, request.entryPath, restored);
  return { status: 'unpatched', archive: AsarBinary.encode({ archive: updated }) };
}
