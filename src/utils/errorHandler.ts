import { S3ServiceException } from '@aws-sdk/client-s3';
import { ValidationErrorCode } from '../types/validation.js';

/**
 * Custom error classes for different error types
 */

export class S3Error extends Error {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'S3Error';
  }
}

export class ListingError extends Error {
  constructor(message: string, public readonly prefix: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'ListingError';
  }
}

export class MirrorWriteError extends Error {
  constructor(message: string, public readonly key: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'MirrorWriteError';
  }
}

export class DecompressionError extends Error {
  constructor(message: string, public readonly path: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'DecompressionError';
  }
}

export class CleanupError extends Error {
  constructor(message: string, public readonly path: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'CleanupError';
  }
}

export class ArchiveError extends Error {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'ArchiveError';
  }
}

export class MirrorSetupError extends Error {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'MirrorSetupError';
  }
}

export class ValidationError extends Error {
  constructor(message: string, public readonly code?: ValidationErrorCode) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Reads a Node system error code (ENOENT, Z_BUF_ERROR, ...) off an unknown value
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

const FILE_SYSTEM_ERROR_CODES = ['ENOENT', 'EACCES', 'EPERM', 'ENOSPC', 'EISDIR', 'ENOTDIR', 'EEXIST', 'EMFILE'];

function httpStatusOf(error: unknown): number | undefined {
  if (error instanceof S3ServiceException) {
    return error.$metadata?.httpStatusCode;
  }
  return undefined;
}

function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}

/**
 * Error handler utility functions
 */
export class ErrorHandler {
  /**
   * Handles S3 errors (bucket not found, access denied, throttling)
   */
  static handleS3Error(error: unknown, bucket?: string, key?: string): S3Error {
    const bucketName = bucket || 'specified bucket';
    const target = key ? `'${key}' in bucket '${bucketName}'` : `bucket '${bucketName}'`;
    const name = errorName(error);
    const status = httpStatusOf(error);

    if (name === 'NoSuchBucket') {
      return new S3Error(`S3 bucket '${bucketName}' does not exist`, error);
    }

    if (name === 'NoSuchKey') {
      return new S3Error(`Object ${target} does not exist`, error);
    }

    // Multipart upload specific errors
    if (name === 'NoSuchUpload') {
      return new S3Error('Multipart upload does not exist or was aborted', error);
    }

    if (name === 'EntityTooSmall') {
      return new S3Error('Multipart upload part is smaller than the 5MB minimum', error);
    }

    if (name === 'InvalidPart' || name === 'InvalidPartOrder') {
      return new S3Error('Invalid multipart upload part list', error);
    }

    if (name === 'NotFound' || status === 404) {
      return new S3Error(`Not found: ${target}`, error);
    }

    if (name === 'AccessDenied' || name === 'Forbidden' || status === 403) {
      return new S3Error(`Access denied to ${target}`, error);
    }

    if (name === 'InvalidBucketName') {
      return new S3Error(`Invalid bucket name: '${bucketName}'`, error);
    }

    if (name === 'InvalidObjectState') {
      return new S3Error(`Object ${target} is archived and cannot be read`, error);
    }

    if (name === 'NetworkingError' || errorCode(error) === 'NetworkingError') {
      return new S3Error('S3 request failed: network error', error);
    }

    if (name === 'RequestTimeout' || name === 'TimeoutError') {
      return new S3Error('S3 request timed out', error);
    }

    if (name === 'SlowDown' || name === 'ThrottlingException' || name === 'RequestLimitExceeded') {
      return new S3Error('S3 request rate exceeded', error);
    }

    if (name === 'ServiceUnavailable' || status === 503) {
      return new S3Error('S3 service temporarily unavailable', error);
    }

    if (name === 'InternalError' || status === 500) {
      return new S3Error('S3 internal server error', error);
    }

    return new S3Error(`S3 operation failed: ${errorMessage(error) || 'Unknown error'}`, error);
  }

  /**
   * Turns a local filesystem failure into a readable message naming the path
   */
  static describeFileSystemError(error: unknown, path: string): string {
    switch (errorCode(error)) {
      case 'ENOENT':
        return `No such file or directory: ${path}`;
      case 'EACCES':
      case 'EPERM':
        return `Permission denied: ${path}`;
      case 'ENOSPC':
        return `No space left on device while writing ${path}`;
      case 'EISDIR':
        return `Expected a file but found a directory: ${path}`;
      case 'ENOTDIR':
        return `A parent of ${path} is not a directory`;
      case 'EEXIST':
        return `Path already exists: ${path}`;
      case 'EMFILE':
        return `Too many open files while opening ${path}`;
      default:
        return `Filesystem operation failed for ${path}: ${errorMessage(error)}`;
    }
  }

  static isFileSystemError(error: unknown): boolean {
    const code = errorCode(error);
    return code !== undefined && FILE_SYSTEM_ERROR_CODES.includes(code);
  }

  static handleFileSystemError(error: unknown, key: string, path: string): MirrorWriteError {
    return new MirrorWriteError(this.describeFileSystemError(error, path), key, error);
  }

  /**
   * Handles gunzip failures (truncated stream, bad header, corrupt data)
   */
  static handleDecompressionError(error: unknown, path: string): DecompressionError {
    const code = errorCode(error);

    if (code === 'Z_BUF_ERROR') {
      return new DecompressionError(`Compressed stream is truncated: ${path}`, path, error);
    }

    if (code === 'Z_DATA_ERROR') {
      return new DecompressionError(`Compressed data is corrupt or not gzip: ${path}`, path, error);
    }

    if (this.isFileSystemError(error)) {
      return new DecompressionError(this.describeFileSystemError(error, path), path, error);
    }

    return new DecompressionError(`Failed to decompress ${path}: ${errorMessage(error)}`, path, error);
  }

  /**
   * Determines if an error is retryable
   */
  static isRetryable(error: Error): boolean {
    const retryableErrors = [
      'ETIMEDOUT',
      'ECONNRESET',
      'ECONNREFUSED',
      'EPIPE',
      'NetworkingError',
      'TimeoutError',
      'RequestTimeout',
      'ServiceUnavailable',
      'ThrottlingException',
      'SlowDown',
    ];

    const causes: unknown[] = [error];
    if ('originalError' in error && error.originalError !== undefined) {
      causes.push(error.originalError);
    }

    return causes.some((cause) =>
      retryableErrors.some(
        (errType) =>
          errorMessage(cause).includes(errType) ||
          errorName(cause) === errType ||
          errorCode(cause) === errType
      )
    );
  }

  /**
   * Formats error for the run summary
   */
  static formatError(error: Error): {
    code: string;
    message: string;
    retryable: boolean;
  } {
    let code = 'UNKNOWN_ERROR';

    if (error instanceof S3Error) {
      code = 'S3_ERROR';
    } else if (error instanceof ListingError) {
      code = 'LISTING_ERROR';
    } else if (error instanceof MirrorWriteError) {
      code = 'MIRROR_WRITE_ERROR';
    } else if (error instanceof DecompressionError) {
      code = 'DECOMPRESSION_ERROR';
    } else if (error instanceof CleanupError) {
      code = 'CLEANUP_ERROR';
    } else if (error instanceof ArchiveError) {
      code = 'ARCHIVE_ERROR';
    } else if (error instanceof MirrorSetupError) {
      code = 'SETUP_ERROR';
    } else if (error instanceof ValidationError) {
      code = 'VALIDATION_ERROR';
    }

    return {
      code,
      message: error.message,
      retryable: this.isRetryable(error),
    };
  }
}
