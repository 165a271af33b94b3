import { createWriteStream, promises as fs } from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import archiver from 'archiver';
import { MultipartUploader, UploadedPart } from '../types/api.js';
import { ArchiveError, ErrorHandler, errorMessage } from '../utils/errorHandler.js';
import { listFiles } from '../utils/fileTree.js';
import { WorkerPool } from './WorkerPool.js';

export const MIN_PART_SIZE = 5 * 1024 * 1024; // 5MB minimum (S3 requirement)
export const DEFAULT_PART_SIZE = 16 * 1024 * 1024;
export const MAX_PARTS = 10000; // S3 maximum parts per multipart upload

export interface ArchiveUploadOptions {
  partSize?: number;
  concurrency?: number;
  maxRetryAttempts?: number;
  retryBaseDelayMs?: number;
}

export interface CreatedArchive {
  archivePath: string;
  entries: number;
  bytes: number;
}

/**
 * Packages the local mirror into a zip and pushes it back to the bucket
 */
export class ArchiveService {
  private readonly partSize: number;
  private readonly concurrency: number;
  private readonly maxRetryAttempts: number;
  private readonly retryBaseDelayMs: number;

  constructor(private readonly uploader: MultipartUploader, options: ArchiveUploadOptions = {}) {
    this.partSize = options.partSize ?? DEFAULT_PART_SIZE;
    this.concurrency = options.concurrency ?? 4;
    this.maxRetryAttempts = options.maxRetryAttempts ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
  }

  /**
   * Zips every file below sourceDir; entry names are the '/'-separated paths relative to it.
   * Files are streamed into the archive one at a time.
   */
  static async createArchive(sourceDir: string, archivePath: string): Promise<CreatedArchive> {
    try {
      const files = await listFiles(sourceDir);
      await fs.mkdir(path.dirname(archivePath), { recursive: true });

      const zip = archiver('zip');
      zip.on('warning', (warning) => {
        console.warn(`[Archive] ${warning.message}`);
      });
      for (const file of files) {
        zip.file(file, { name: path.relative(sourceDir, file).split(path.sep).join('/') });
      }

      await Promise.all([pipeline(zip, createWriteStream(archivePath)), zip.finalize()]);
      const { size } = await fs.stat(archivePath);

      console.log(`[Archive] Wrote ${files.length} files from ${sourceDir} to ${archivePath} (${size} bytes)`);
      return { archivePath, entries: files.length, bytes: size };
    } catch (error) {
      throw new ArchiveError(`Failed to create archive ${archivePath}: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Part size for a file: at least the preferred size and the S3 minimum,
   * grown when needed so the upload stays under the part count limit
   */
  static calculatePartSize(fileSize: number, preferredPartSize: number = DEFAULT_PART_SIZE): number {
    const partSize = Math.max(MIN_PART_SIZE, preferredPartSize);
    if (Math.ceil(fileSize / partSize) <= MAX_PARTS) {
      return partSize;
    }
    return Math.ceil(fileSize / MAX_PARTS);
  }

  /**
   * Uploads a local file with a multipart upload; aborts the upload when any part fails
   * Returns the S3 location URL
   */
  async uploadArchive(bucket: string, key: string, archivePath: string): Promise<string> {
    let size: number;
    try {
      ({ size } = await fs.stat(archivePath));
    } catch (error) {
      throw new ArchiveError(`Cannot read archive ${archivePath}: ${errorMessage(error)}`, error);
    }

    const partSize = ArchiveService.calculatePartSize(size, this.partSize);
    const partCount = Math.max(1, Math.ceil(size / partSize));
    const partNumbers = Array.from({ length: partCount }, (_, index) => index + 1);

    console.log(`[Archive] Uploading ${archivePath} (${size} bytes) to s3://${bucket}/${key} in ${partCount} parts of up to ${partSize} bytes`);

    const uploadId = await this.uploader.createMultipartUpload(bucket, key, 'application/zip');
    const handle = await fs.open(archivePath, 'r');

    try {
      const pool = new WorkerPool<number, UploadedPart>(
        async (partNumber) => {
          const position = (partNumber - 1) * partSize;
          const length = Math.min(partSize, size - position);
          const data = Buffer.alloc(length);
          const { bytesRead } = await handle.read(data, 0, length, position);
          const etag = await this.uploadPartWithRetry(bucket, key, uploadId, partNumber, data.subarray(0, bytesRead));
          return { PartNumber: partNumber, ETag: etag };
        },
        { concurrency: this.concurrency, label: 'Archive' }
      );

      const parts: UploadedPart[] = [];
      for (const result of await pool.run(partNumbers)) {
        if (result.status === 'fulfilled') {
          parts.push(result.value);
        } else if (result.status === 'rejected') {
          throw result.error;
        } else {
          throw new ArchiveError(`Part ${result.item} was never uploaded`);
        }
      }

      return await this.uploader.completeUpload(bucket, key, uploadId, parts);
    } catch (error) {
      await this.uploader.abortUpload(bucket, key, uploadId);
      throw error instanceof ArchiveError
        ? error
        : new ArchiveError(`Failed to upload ${archivePath} to s3://${bucket}/${key}: ${errorMessage(error)}`, error);
    } finally {
      await handle.close();
    }
  }

  /**
   * Uploads a single part, retrying transient failures with exponential backoff
   */
  private async uploadPartWithRetry(
    bucket: string,
    key: string,
    uploadId: string,
    partNumber: number,
    data: Buffer,
    attempt: number = 1
  ): Promise<string> {
    try {
      const etag = await this.uploader.uploadPart(bucket, key, uploadId, partNumber, data);

      if (attempt > 1) {
        console.log(`Part ${partNumber} uploaded successfully on attempt ${attempt}`);
      }

      return etag;
    } catch (error) {
      console.error(`Failed to upload part ${partNumber} on attempt ${attempt}:`, errorMessage(error));

      const retryable = error instanceof Error && ErrorHandler.isRetryable(error);
      if (!retryable) {
        throw new ArchiveError(`Failed to upload part ${partNumber}: ${errorMessage(error)}`, error);
      }

      if (attempt < this.maxRetryAttempts) {
        console.log(`Retrying part ${partNumber} upload (attempt ${attempt + 1}/${this.maxRetryAttempts})`);

        const delayMs = Math.pow(2, attempt - 1) * this.retryBaseDelayMs;
        await new Promise((resolve) => setTimeout(resolve, delayMs));

        return this.uploadPartWithRetry(bucket, key, uploadId, partNumber, data, attempt + 1);
      }

      throw new ArchiveError(
        `Failed to upload part ${partNumber} after ${this.maxRetryAttempts} attempts: ${errorMessage(error)}`,
        error
      );
    }
  }
}
