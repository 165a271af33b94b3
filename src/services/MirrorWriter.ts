import { createWriteStream, promises as fs } from 'fs';
import path from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { ErrorHandler, MirrorWriteError, errorMessage } from '../utils/errorHandler.js';

export interface MirroredFile {
  localPath: string;
  bytesWritten: number;
}

/**
 * Maps object keys onto a local directory tree and writes their bytes there
 */
export class MirrorWriter {
  /**
   * localRoot joined with every segment of the key. Keys with empty, '.' or '..' segments are refused.
   */
  static resolveLocalPath(localRoot: string, key: string): string {
    if (!key || key.endsWith('/')) {
      throw new MirrorWriteError(`Key '${key}' does not name a file`, key);
    }

    // Without these segments a key maps to exactly one path below localRoot and no other key shares it
    if (key.split('/').some((segment) => segment === '' || segment === '.' || segment === '..')) {
      throw new MirrorWriteError(`Key '${key}' has an empty, '.' or '..' segment`, key);
    }

    return path.join(localRoot, key);
  }

  /**
   * Streams an object body into its mirrored path, creating parent directories first.
   * A partially written file is removed when the copy fails.
   */
  static async writeObject(localRoot: string, key: string, source: Readable): Promise<MirroredFile> {
    const localPath = this.resolveLocalPath(localRoot, key);

    try {
      await fs.mkdir(path.dirname(localPath), { recursive: true });
    } catch (error) {
      source.destroy();
      throw ErrorHandler.handleFileSystemError(error, key, path.dirname(localPath));
    }

    let bytesWritten = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        bytesWritten += chunk.length;
        callback(null, chunk);
      },
    });

    try {
      await pipeline(source, counter, createWriteStream(localPath));
    } catch (error) {
      await this.removePartial(localPath);
      if (ErrorHandler.isFileSystemError(error)) {
        throw ErrorHandler.handleFileSystemError(error, key, localPath);
      }
      throw new MirrorWriteError(
        `Stream for '${key}' failed after ${bytesWritten} bytes: ${errorMessage(error)}`,
        key,
        error
      );
    }

    return { localPath, bytesWritten };
  }

  private static async removePartial(localPath: string): Promise<void> {
    try {
      await fs.rm(localPath, { force: true });
    } catch (error) {
      console.warn(`[Transfer] Could not remove partial file ${localPath}: ${errorMessage(error)}`);
    }
  }
}
