/**
 * Downloads revision bytes into the target tree
 */

import { promises as fsp } from 'fs';
import { dirname } from 'path';
import { Dropbox } from 'dropbox';
import { AppError } from './logger.js';

export interface ContentFetcher {
  /** Write the bytes of `revision` to `destination`, replacing what is there */
  download(revision: string, destination: string): Promise<void>;
}

/**
 * The slice of the Dropbox SDK the fetcher needs
 */
export interface DownloadClient {
  filesDownload(arg: { path: string }): Promise<{ result: unknown }>;
}

function extractBinary(result: unknown): Buffer | null {
  if (typeof result !== 'object' || result === null || !('fileBinary' in result)) {
    return null;
  }
  const binary = result.fileBinary;
  if (Buffer.isBuffer(binary)) return binary;
  if (typeof binary === 'string') return Buffer.from(binary, 'binary');
  return null;
}

export class DropboxContentFetcher implements ContentFetcher {
  private client: DownloadClient;

  constructor(client: DownloadClient) {
    this.client = client;
  }

  static fromToken(accessToken: string): DropboxContentFetcher {
    return new DropboxContentFetcher(new Dropbox({ accessToken }));
  }

  async download(revision: string, destination: string): Promise<void> {
    const response = await this.client.filesDownload({ path: `rev:${revision}` });
    const binary = extractBinary(response.result);

    if (binary === null) {
      throw new AppError(`Download of revision ${revision} returned no content`, 'DOWNLOAD_FAILED', {
        revision,
        destination,
      });
    }

    await fsp.mkdir(dirname(destination), { recursive: true });
    await fsp.writeFile(destination, binary);
  }
}
