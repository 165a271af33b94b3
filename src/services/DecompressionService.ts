import { createReadStream, createWriteStream, promises as fs } from 'fs';
import { Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { createGunzip } from 'zlib';
import { randomUUID } from 'crypto';
import { SweepOutcome } from '../types/api.js';
import { CleanupError, ErrorHandler, errorCode, errorMessage } from '../utils/errorHandler.js';
import { listFiles } from '../utils/fileTree.js';
import { DEFAULT_COMPRESSED_EXTENSION, DEFAULT_FILE_SUFFIX } from './ConfigService.js';

export interface SweepPlanEntry {
  path: string;
  outputPath: string;
}

export interface SweepOptions {
  suffix?: string;
  compressedExtension?: string;
}

/**
 * Decompresses every matching file of the local mirror into a sibling and removes the original.
 *
 * Output only ever appears through a rename of a fully written temporary file. The rename
 * replaces any sibling left by an earlier run, so a re-downloaded original always wins.
 */
export class DecompressionService {
  private readonly suffix: string;
  private readonly compressedExtension: string;

  constructor(options: SweepOptions = {}) {
    this.suffix = options.suffix ?? DEFAULT_FILE_SUFFIX;
    this.compressedExtension = options.compressedExtension ?? DEFAULT_COMPRESSED_EXTENSION;
  }

  /**
   * Pure: decides what to do with each file of a tree snapshot
   */
  static planSweep(files: readonly string[], suffix: string, compressedExtension: string): SweepPlanEntry[] {
    return files
      .filter((file) => file.endsWith(suffix))
      .map((file) => ({ path: file, outputPath: file.slice(0, file.length - compressedExtension.length) }));
  }

  async sweep(localRoot: string): Promise<SweepOutcome[]> {
    const files = await listFiles(localRoot);
    const plan = DecompressionService.planSweep(files, this.suffix, this.compressedExtension);

    console.log(`[Sweep] ${plan.length} of ${files.length} files under ${localRoot} match *${this.suffix}`);

    const outcomes: SweepOutcome[] = [];
    for (const entry of plan) {
      outcomes.push(await this.decompressFile(entry));
    }

    const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
    console.log(`[Sweep] Processed ${outcomes.length} files, ${failed} failed`);

    return outcomes;
  }

  private async decompressFile(entry: SweepPlanEntry): Promise<SweepOutcome> {
    const tempPath = `${entry.outputPath}.${randomUUID()}.partial`;
    let bytesWritten = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        bytesWritten += chunk.length;
        callback(null, chunk);
      },
    });

    try {
      await pipeline(
        createReadStream(entry.path),
        createGunzip(),
        counter,
        createWriteStream(tempPath, { flags: 'wx' })
      );
      await fs.rename(tempPath, entry.outputPath);
    } catch (error) {
      await this.discardTemp(tempPath);
      const failure = ErrorHandler.handleDecompressionError(error, entry.path);
      console.error(`[Sweep] ${failure.message}; keeping original`);
      return { path: entry.path, outputPath: entry.outputPath, status: 'failed', bytesWritten: 0, error: failure };
    }

    console.log(`[Sweep] Decompressed ${entry.path} to ${entry.outputPath} (${bytesWritten} bytes)`);
    return this.removeOriginal(entry, bytesWritten);
  }

  private async removeOriginal(entry: SweepPlanEntry, bytesWritten: number): Promise<SweepOutcome> {
    try {
      await fs.unlink(entry.path);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        const warning = new CleanupError(
          `Could not remove ${entry.path}: ${ErrorHandler.describeFileSystemError(error, entry.path)}`,
          entry.path,
          error
        );
        console.warn(`[Sweep] ${warning.message}; both copies are kept`);
        return {
          path: entry.path,
          outputPath: entry.outputPath,
          status: 'decompressed-original-kept',
          bytesWritten,
          error: warning,
        };
      }
    }

    return { path: entry.path, outputPath: entry.outputPath, status: 'decompressed', bytesWritten };
  }

  private async discardTemp(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (error) {
      console.warn(`[Sweep] Could not remove temporary file ${tempPath}: ${errorMessage(error)}`);
    }
  }
}
