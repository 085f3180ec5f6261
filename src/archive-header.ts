/**
 * Conversion between the asar header JSON and the typed node tree.
 */
import { isJsonObject, writeJson } from './json-text.js';
import { ArchiveError } from './types/errors.js';
import type {
  ArchiveDirectory,
  ArchiveFile,
  ArchiveListing,
  ArchiveNode,
  FileIntegrity,
  JsonObject,
  JsonValue,
} from './types/archive-header.js';

const DECIMAL_PATTERN = /^(0|[1-9][0-9]*)$/;

function structureError(path: string, detail: string): ArchiveError {
  return new ArchiveError('InvalidEncoding', `Invalid header entry "${path || '/'}": ${detail}`);
}

function joinPath(parent: string, name: string): string {
  return parent === '' ? name : `${parent}/${name}`;
}

function parseIntegrity(value: JsonValue, path: string): FileIntegrity {
  if (!isJsonObject(value)) {
    throw structureError(path, 'integrity is not an object');
  }
  const algorithm = value.get('algorithm');
  const hash = value.get('hash');
  const blockSize = value.get('blockSize');
  const blocks = value.get('blocks');
  if (algorithm !== 'SHA256' || typeof hash !== 'string') {
    throw structureError(path, 'integrity must name SHA256 and carry a hash');
  }
  if (typeof blockSize !== 'number' || !Number.isSafeInteger(blockSize) || blockSize <= 0) {
    throw structureError(path, 'integrity blockSize is not a positive integer');
  }
  if (!Array.isArray(blocks)) {
    throw structureError(path, 'integrity blocks is not an array');
  }
  const blockHashes: string[] = [];
  for (const block of blocks) {
    if (typeof block !== 'string') {
      throw structureError(path, 'integrity block hash is not a string');
    }
    blockHashes.push(block);
  }
  return { algorithm, hash, blockSize, blocks: blockHashes };
}

function parseFile(raw: JsonObject, path: string): ArchiveFile {
  const size = raw.get('size');
  if (typeof size !== 'number' || !Number.isSafeInteger(size) || size < 0) {
    throw structureError(path, 'size is not a non-negative integer');
  }
  const unpacked = raw.get('unpacked') === true;
  let offset: number | undefined;
  if (!unpacked) {
    // Offsets are decimal strings so values past 2^32 survive JavaScript writers
    const encodedOffset = raw.get('offset');
    if (typeof encodedOffset !== 'string' || !DECIMAL_PATTERN.test(encodedOffset)) {
      throw structureError(path, 'offset is missing or not a decimal string');
    }
    offset = Number(encodedOffset);
    if (!Number.isSafeInteger(offset)) {
      throw structureError(path, `offset ${encodedOffset} is out of range`);
    }
  }
  const encodedIntegrity = raw.get('integrity');
  const integrity = encodedIntegrity === undefined ? undefined : parseIntegrity(encodedIntegrity, path);
  return {
    kind: 'file',
    size,
    offset,
    unpacked,
    ...(integrity ? { integrity } : {}),
    raw,
  };
}

function parseNode(raw: JsonValue, path: string): ArchiveNode {
  if (!isJsonObject(raw)) {
    throw structureError(path, 'entry is not an object');
  }
  if (raw.has('files')) {
    return parseDirectory(raw, path);
  }
  if (raw.has('link')) {
    const link = raw.get('link');
    if (typeof link !== 'string') {
      throw structureError(path, 'link target is not a string');
    }
    return { kind: 'link', link, raw };
  }
  if (raw.has('size')) {
    return parseFile(raw, path);
  }
  throw structureError(path, 'entry has neither files, link nor size');
}

function parseDirectory(raw: JsonObject, path: string): ArchiveDirectory {
  const files = raw.get('files');
  if (!isJsonObject(files)) {
    throw structureError(path, 'files is not an object');
  }
  const entries = new Map<string, ArchiveNode>();
  for (const [name, child] of files) {
    if (name === '' || name.includes('/')) {
      throw structureError(joinPath(path, name), 'entry name is empty or contains a slash');
    }
    entries.set(name, parseNode(child, joinPath(path, name)));
  }
  return { kind: 'directory', entries, raw };
}

/**
 * Builds the node tree from the parsed header JSON. The root must be a directory.
 *
 * @throws {ArchiveError} `InvalidEncoding` when the tree does not have the asar shape
 */
export function parseHeader(json: JsonValue): ArchiveDirectory {
  if (!isJsonObject(json) || !json.has('files')) {
    throw structureError('', 'header root is not a directory');
  }
  return parseDirectory(json, '');
}

/**
 * Copies `raw` in its key order, replacing the values named in `updates`.
 * Keys of `updates` that `raw` lacks are appended; `undefined` leaves a key untouched.
 */
function overlay(raw: JsonObject, updates: Record<string, JsonValue | undefined>): JsonObject {
  const result = new Map<string, JsonValue>();
  for (const [key, value] of raw) {
    const update = Object.hasOwn(updates, key) ? updates[key] : undefined;
    result.set(key, update === undefined ? value : update);
  }
  for (const [key, update] of Object.entries(updates)) {
    if (update !== undefined && !raw.has(key)) {
      result.set(key, update);
    }
  }
  return result;
}

function serializeIntegrity(integrity: FileIntegrity, raw: JsonValue | undefined): JsonObject {
  return overlay(isJsonObject(raw) ? raw : new Map<string, JsonValue>(), {
    algorithm: integrity.algorithm,
    hash: integrity.hash,
    blockSize: integrity.blockSize,
    blocks: [...integrity.blocks],
  });
}

function serializeNode(node: ArchiveNode): JsonObject {
  switch (node.kind) {
    case 'directory': {
      const files = new Map<string, JsonValue>();
      for (const [name, child] of node.entries) {
        files.set(name, serializeNode(child));
      }
      return overlay(node.raw, { files });
    }
    case 'file':
      return overlay(node.raw, {
        size: node.size,
        offset: node.offset === undefined ? undefined : String(node.offset),
        integrity: node.integrity ? serializeIntegrity(node.integrity, node.raw.get('integrity')) : undefined,
      });
    case 'link':
      return overlay(node.raw, { link: node.link });
  }
}

/**
 * Serializes the node tree to the compact JSON text stored in the archive.
 */
export function serializeHeader(root: ArchiveDirectory): string {
  return writeJson(serializeNode(root));
}

/**
 * Maps every file in the tree to its slash-joined path, in declaration order.
 */
export function flattenFiles(root: ArchiveDirectory): Map<string, ArchiveFile> {
  const files = new Map<string, ArchiveFile>();
  const visit = (directory: ArchiveDirectory, prefix: string): void => {
    for (const [name, node] of directory.entries) {
      const path = joinPath(prefix, name);
      if (node.kind === 'directory') {
        visit(node, path);
      } else if (node.kind === 'file') {
        files.set(path, node);
      }
    }
  };
  visit(root, '');
  return files;
}

/**
 * Depth-first listing of every node under `root`.
 */
export function listNodes(root: ArchiveDirectory): ArchiveListing[] {
  const listing: ArchiveListing[] = [];
  const visit = (directory: ArchiveDirectory, prefix: string): void => {
    for (const [name, node] of directory.entries) {
      const path = joinPath(prefix, name);
      switch (node.kind) {
        case 'directory':
          listing.push({ path, kind: 'directory', size: node.entries.size, unpacked: node.raw.get('unpacked') === true });
          visit(node, path);
          break;
        case 'file':
          listing.push({ path, kind: 'file', size: node.size, unpacked: node.unpacked });
          break;
        case 'link':
          listing.push({ path, kind: 'link', size: 0, unpacked: false });
          break;
      }
    }
  };
  visit(root, '');
  return listing;
}

/**
 * Rebuilds the tree, passing every file and its path through `transform`.
 */
export function mapFiles(
  root: ArchiveDirectory,
  transform: (file: ArchiveFile, path: string) => ArchiveFile
): ArchiveDirectory {
  const visit = (directory: ArchiveDirectory, prefix: string): ArchiveDirectory => {
    const entries = new Map<string, ArchiveNode>();
    for (const [name, node] of directory.entries) {
      const path = joinPath(prefix, name);
      if (node.kind === 'directory') {
        entries.set(name, visit(node, path));
      } else if (node.kind === 'file') {
        entries.set(name, transform(node, path));
      } else {
        entries.set(name, node);
      }
    }
    return { ...directory, entries };
  };
  return visit(root, '');
}
