import { describe, it, expect, beforeAll } from 'vitest';
import { createHash } from 'crypto';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { contentHash, contentHashOfBuffer } from './content-hash.js';
import { makeTempDir } from '../tests/helpers.js';

function sha256(data: Buffer): Buffer {
  return createHash('sha256').update(data).digest();
}

describe('content hash', () => {
  let dir: string;

  beforeAll(() => {
    dir = makeTempDir('content-hash');
  });

  it('hashes the concatenated block digests', () => {
    const data = Buffer.from('abcdefghij');
    const expected = createHash('sha256')
      .update(Buffer.concat([
        sha256(Buffer.from('abcd')),
        sha256(Buffer.from('efgh')),
        sha256(Buffer.from('ij')),
      ]))
      .digest('hex');

    expect(contentHashOfBuffer(data, 4)).toBe(expected);
  });

  it('differs from a plain SHA-256 of the bytes', () => {
    const data = Buffer.from('hello world');
    expect(contentHashOfBuffer(data)).not.toBe(createHash('sha256').update(data).digest('hex'));
    expect(contentHashOfBuffer(data)).toBe(createHash('sha256').update(sha256(data)).digest('hex'));
  });

  it('hashes an empty input as the digest of nothing', () => {
    expect(contentHashOfBuffer(Buffer.alloc(0))).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });

  it('streams files across read-chunk boundaries', async () => {
    const data = Buffer.alloc(250_000);
    for (let i = 0; i < data.length; i++) {
      data[i] = (i * 31) % 251;
    }
    const filePath = join(dir, 'large.bin');
    writeFileSync(filePath, data);

    await expect(contentHash(filePath, 100_000)).resolves.toBe(contentHashOfBuffer(data, 100_000));
  });

  it('handles files that end exactly on a block boundary', async () => {
    const data = Buffer.from('12345678');
    const filePath = join(dir, 'aligned.bin');
    writeFileSync(filePath, data);

    await expect(contentHash(filePath, 4)).resolves.toBe(contentHashOfBuffer(data, 4));
  });

  it('hashes empty files', async () => {
    const filePath = join(dir, 'empty.bin');
    writeFileSync(filePath, '');

    await expect(contentHash(filePath)).resolves.toBe(contentHashOfBuffer(Buffer.alloc(0)));
  });
});
