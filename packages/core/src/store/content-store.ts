import * as path from 'path';
import * as fs from 'fs';
import * as crypto from 'crypto';
import { Transform } from 'stream';
import { pipeline } from 'stream/promises';
import type { Library } from '../library';
import { StoreIOError, errorMessage } from '../errors';

export interface IngestResult {
  digest: string;
  storeRelativePath: string;
  bytesWritten: number;
  wasNewCopy: boolean;
}

/**
 * Digest-addressed copy-once storage under the library vault.
 *
 * Bytes are streamed into the scratch dir while hashed, then renamed into
 * `vault/<d0d1>/<d2d3>/<digest>.pdf`. A destination that already exists wins
 * and the scratch copy is dropped, so two ingests of the same content never
 * produce an error or a half-written vault file.
 */
export class ContentStore {
  constructor(private library: Library) {}

  async ingest(sourcePath: string): Promise<IngestResult> {
    await fs.promises.mkdir(this.library.tmpDir, { recursive: true });
    const tmpPath = path.join(this.library.tmpDir, `${crypto.randomUUID()}.tmp`);

    try {
      const sourceStat = await fs.promises.stat(sourcePath);
      const { digest, bytesWritten } = await this.copyAndHash(sourcePath, tmpPath);

      const destination = this.library.vaultPathForDigest(digest);
      const storeRelativePath = path.relative(this.library.root, destination);

      if (await exists(destination)) {
        await removeScratch(tmpPath);
        return { digest, storeRelativePath, bytesWritten, wasNewCopy: false };
      }

      await fs.promises.mkdir(path.dirname(destination), { recursive: true });
      await fs.promises.rename(tmpPath, destination);

      try {
        await fs.promises.utimes(destination, sourceStat.atime, sourceStat.mtime);
      } catch (error) {
        console.warn(`[ContentStore] Could not copy timestamps to ${storeRelativePath}: ${errorMessage(error)}`);
      }

      return { digest, storeRelativePath, bytesWritten, wasNewCopy: true };
    } catch (error) {
      await removeScratch(tmpPath);
      throw new StoreIOError(`Failed to ingest ${sourcePath}: ${errorMessage(error)}`, {
        sourcePath,
        cause: error,
      });
    }
  }

  private async copyAndHash(sourcePath: string, tmpPath: string): Promise<{ digest: string; bytesWritten: number }> {
    const hash = crypto.createHash('sha256');
    let bytesWritten = 0;

    const hasher = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        hash.update(chunk);
        bytesWritten += chunk.length;
        callback(null, chunk);
      },
    });

    await pipeline(fs.createReadStream(sourcePath), hasher, fs.createWriteStream(tmpPath, { flags: 'wx' }));

    const handle = await fs.promises.open(tmpPath, 'r+');
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }

    return { digest: hash.digest('hex'), bytesWritten };
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function removeScratch(filePath: string): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (error) {
    console.warn(`[ContentStore] Could not remove scratch file ${filePath}: ${errorMessage(error)}`);
  }
}
