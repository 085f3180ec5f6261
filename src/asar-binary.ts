/**
 * Asar binary helpers for Electron application archives.
 */
import { ArchiveError } from './types/errors.js';
import type { ArchiveListing, JsonValue } from './types/archive-header.js';
import type { AsarArchive } from './types/asar-binary-structure.js';
import { flattenFiles, listNodes, parseHeader, serializeHeader } from './archive-header.js';
import { readJson } from './json-text.js';

/** Four little-endian u32 fields: two pickle sizes, the pickle payload size and the string length. */
const PREFIX_SIZE = 16;
const SIZE_PICKLE_PAYLOAD = 4;
const HEADER_PICKLE_SIZE_OFFSET = 4;
const HEADER_PAYLOAD_SIZE_OFFSET = 8;
const JSON_SIZE_OFFSET = 12;
const UINT32_MAX = 0xffffffff;

interface HeaderLayout {
  readonly jsonSize: number;
  readonly dataStartOffset: number;
}

function alignTo4(length: number): number {
  return length + ((4 - (length % 4)) % 4);
}

/**
 * Reads and cross-checks the pickle size fields in front of the header JSON.
 * @throws {ArchiveError} `MalformedHeader` when the fields disagree, `TruncatedData` when they point past the buffer
 */
function readLayout(buffer: Buffer): HeaderLayout {
  if (buffer.length < PREFIX_SIZE) {
    throw new ArchiveError('MalformedHeader', `Archive is ${buffer.length} bytes, too small for the ${PREFIX_SIZE}-byte size prefix`);
  }
  const sizePickle: number = buffer.readUInt32LE(0);
  const headerPickleSize: number = buffer.readUInt32LE(HEADER_PICKLE_SIZE_OFFSET);
  const headerPayloadSize: number = buffer.readUInt32LE(HEADER_PAYLOAD_SIZE_OFFSET);
  const jsonSize: number = buffer.readUInt32LE(JSON_SIZE_OFFSET);
  if (sizePickle !== SIZE_PICKLE_PAYLOAD) {
    throw new ArchiveError('MalformedHeader', `Unexpected size pickle payload length ${sizePickle}`);
  }
  const alignedJsonSize = alignTo4(jsonSize);
  if (headerPayloadSize !== alignedJsonSize + 4 || headerPickleSize !== headerPayloadSize + 4) {
    throw new ArchiveError(
      'MalformedHeader',
      `Inconsistent header sizes: pickle=${headerPickleSize}, payload=${headerPayloadSize}, json=${jsonSize}`
    );
  }
  const dataStartOffset = PREFIX_SIZE + alignedJsonSize;
  if (dataStartOffset > buffer.length) {
    throw new ArchiveError('TruncatedData', `Header declares ${jsonSize} JSON bytes but the archive is ${buffer.length} bytes`);
  }
  for (let position = PREFIX_SIZE + jsonSize; position < dataStartOffset; position++) {
    if (buffer[position] !== 0) {
      throw new ArchiveError('MalformedHeader', `Non-zero header padding byte at ${position}`);
    }
  }
  return { jsonSize, dataStartOffset };
}

function readHeaderJson(json: Buffer): JsonValue {
  const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  let text: string;
  try {
    text = decoder.decode(json);
  } catch (error) {
    throw new ArchiveError('InvalidEncoding', 'Header JSON is not valid UTF-8', error);
  }
  try {
    return readJson(text);
  } catch (error) {
    throw new ArchiveError(
      'InvalidEncoding',
      `Header JSON could not be parsed: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}

/**
 * Asar (Electron archive) binary processing utilities.
 * Decoding and encoding work on whole in-memory buffers and perform no I/O.
 */
export class AsarBinary {
  /**
   * Parses an archive buffer into its header tree and data blob.
   * The data blob is copied, so the returned archive does not alias `buffer`.
   *
   * @throws {ArchiveError} `MalformedHeader`, `TruncatedData` or `InvalidEncoding`
   */
  static decode({ buffer }: { readonly buffer: Buffer }): AsarArchive {
    const layout: HeaderLayout = readLayout(buffer);
    const headerJson: Buffer = Buffer.from(buffer.subarray(PREFIX_SIZE, PREFIX_SIZE + layout.jsonSize));
    const header = parseHeader(readHeaderJson(headerJson));
    const data: Buffer = Buffer.from(buffer.subarray(layout.dataStartOffset));
    const files = flattenFiles(header);
    for (const [path, file] of files) {
      if (file.offset !== undefined && file.offset + file.size > data.length) {
        throw new ArchiveError(
          'TruncatedData',
          `Entry "${path}" extends beyond the data section: offset=${file.offset}, size=${file.size}, dataSize=${data.length}`
        );
      }
    }
    return { header, data, files, headerJson };
  }

  /**
   * Writes the archive back to its on-disk layout. `encode(decode(b))` reproduces `b`:
   * an unchanged header is written from the bytes it was decoded from.
   */
  static encode({ archive }: { readonly archive: AsarArchive }): Buffer {
    const json: Buffer = archive.headerJson ?? Buffer.from(serializeHeader(archive.header), 'utf8');
    const alignedJsonSize = alignTo4(json.length);
    if (alignedJsonSize + 8 > UINT32_MAX) {
      throw new ArchiveError('MalformedHeader', `Header JSON of ${json.length} bytes does not fit the size prefix`);
    }
    const prefix: Buffer = Buffer.alloc(PREFIX_SIZE + alignedJsonSize);
    prefix.writeUInt32LE(SIZE_PICKLE_PAYLOAD, 0);
    prefix.writeUInt32LE(alignedJsonSize + 8, HEADER_PICKLE_SIZE_OFFSET);
    prefix.writeUInt32LE(alignedJsonSize + 4, HEADER_PAYLOAD_SIZE_OFFSET);
    prefix.writeUInt32LE(json.length, JSON_SIZE_OFFSET);
    json.copy(prefix, PREFIX_SIZE);
    return Buffer.concat([prefix, archive.data]);
  }

  /**
   * Copies the bytes of one packed entry.
   *
   * @throws {ArchiveError} `EntryNotFound` for an unknown path, `UnpackedEntry` for a file stored outside the archive
   */
  static readEntry({ archive, path }: { readonly archive: AsarArchive; readonly path: string }): Buffer {
    const file = archive.files.get(path);
    if (!file) {
      throw new ArchiveError('EntryNotFound', `No file entry "${path}" in archive`);
    }
    if (file.offset === undefined) {
      throw new ArchiveError('UnpackedEntry', `Entry "${path}" is stored outside the archive`);
    }
    return Buffer.from(archive.data.subarray(file.offset, file.offset + file.size));
  }

  /**
   * Lists every directory, file and link in the archive, depth first.
   */
  static listEntries({ archive }: { readonly archive: AsarArchive }): ArchiveListing[] {
    return listNodes(archive.header);
  }
}
