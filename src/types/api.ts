import { Readable } from 'stream';

/**
 * One page of a delimited listing
 */
export interface ListPage {
  commonPrefixes: string[];
  keys: string[];
  nextContinuationToken?: string;
}

/**
 * Remote namespace the mirror reads from
 */
export interface ObjectStore {
  listObjectsPage(
    bucket: string,
    prefix: string,
    delimiter: string,
    continuationToken?: string
  ): Promise<ListPage>;
  getObjectStream(bucket: string, key: string): Promise<Readable>;
}

export interface UploadedPart {
  PartNumber: number;
  ETag: string;
}

/**
 * Multipart upload surface used to push the archive back to the bucket
 */
export interface MultipartUploader {
  createMultipartUpload(bucket: string, key: string, contentType?: string): Promise<string>;
  uploadPart(
    bucket: string,
    key: string,
    uploadId: string,
    partNumber: number,
    data: Buffer
  ): Promise<string>;
  completeUpload(bucket: string, key: string, uploadId: string, parts: UploadedPart[]): Promise<string>;
  abortUpload(bucket: string, key: string, uploadId: string): Promise<void>;
}

export interface PrefixFailure {
  prefix: string;
  error: Error;
}

export interface EnumerationResult {
  keys: string[];
  failedPrefixes: PrefixFailure[];
  pagesListed: number;
  aborted: boolean;
}

export type TransferStatus = 'downloaded' | 'failed' | 'skipped';

export interface TransferOutcome {
  key: string;
  localPath: string;
  status: TransferStatus;
  bytesWritten: number;
  error?: Error;
}

export type SweepStatus = 'decompressed' | 'decompressed-original-kept' | 'failed';

export interface SweepOutcome {
  path: string;
  outputPath: string;
  status: SweepStatus;
  bytesWritten: number;
  error?: Error;
}

export interface ArchiveResult {
  archivePath: string;
  entries: number;
  bytes: number;
  s3Location: string;
}

export interface MirrorRunCounts {
  discovered: number;
  downloaded: number;
  downloadFailed: number;
  skipped: number;
  decompressed: number;
  decompressFailed: number;
  originalsKept: number;
  failedPrefixes: number;
}

export interface MirrorRunSummary {
  startTime: Date;
  endTime: Date;
  enumeration: EnumerationResult;
  transfers: TransferOutcome[];
  sweep: SweepOutcome[];
  archive?: ArchiveResult;
  /** The run was cancelled; the mirror may be incomplete and was not archived */
  interrupted: boolean;
  counts: MirrorRunCounts;
}

export interface ArchiveConfig {
  key: string;
  localPath: string;
}

export interface MirrorConfig {
  bucket: string;
  startPrefix: string;
  localRoot: string;
  region: string;
  concurrency: number;
  fileSuffix: string;
  compressedExtension: string;
  archive?: ArchiveConfig;
}
