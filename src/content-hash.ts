/**
 * Dropbox-style content hash: SHA-256 over the concatenated SHA-256 digests
 * of consecutive fixed-size blocks.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';

export const HASH_BLOCK_SIZE = 4 * 1024 * 1024;

export function contentHashOfBuffer(data: Buffer, blockSize: number = HASH_BLOCK_SIZE): string {
  const overall = createHash('sha256');
  for (let offset = 0; offset < data.length; offset += blockSize) {
    overall.update(createHash('sha256').update(data.subarray(offset, offset + blockSize)).digest());
  }
  return overall.digest('hex');
}

export async function contentHash(filePath: string, blockSize: number = HASH_BLOCK_SIZE): Promise<string> {
  const overall = createHash('sha256');
  let block = createHash('sha256');
  let filled = 0;

  // Stream chunk boundaries do not line up with hash blocks
  for await (const chunk of createReadStream(filePath)) {
    if (!Buffer.isBuffer(chunk)) continue;

    let offset = 0;
    while (offset < chunk.length) {
      const take = Math.min(blockSize - filled, chunk.length - offset);
      block.update(chunk.subarray(offset, offset + take));
      filled += take;
      offset += take;

      if (filled === blockSize) {
        overall.update(block.digest());
        block = createHash('sha256');
        filled = 0;
      }
    }
  }

  if (filled > 0) {
    overall.update(block.digest());
  }
  return overall.digest('hex');
}
