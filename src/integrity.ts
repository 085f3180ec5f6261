/**
 * SHA-256 integrity records for asar file entries.
 */
import { createHash } from 'node:crypto';
import type { FileIntegrity } from './types/archive-header.js';

/** Block size asar writers use when hashing file contents. */
export const DEFAULT_INTEGRITY_BLOCK_SIZE = 4 * 1024 * 1024;

function sha256(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Hashes `data` the way asar writers do: one digest for the whole entry and one
 * per block. The trailing remainder is always hashed, even when it is empty.
 *
 * @param data - Entry bytes
 * @param blockSize - Bytes per block
 */
export function computeIntegrity(data: Buffer, blockSize: number = DEFAULT_INTEGRITY_BLOCK_SIZE): FileIntegrity {
  const blocks: string[] = [];
  let position = 0;
  while (data.length - position >= blockSize) {
    blocks.push(sha256(data.subarray(position, position + blockSize)));
    position += blockSize;
  }
  blocks.push(sha256(data.subarray(position)));
  return { algorithm: 'SHA256', hash: sha256(data), blockSize, blocks };
}
