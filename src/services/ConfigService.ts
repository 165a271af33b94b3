import { MirrorConfig } from '../types/api.js';
import { ValidationErrorCode } from '../types/validation.js';
import { ValidationError } from '../utils/errorHandler.js';
import { ValidationService } from './ValidationService.js';

export const DEFAULT_LOCAL_DIR = '/tmp/downloads/';
export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_FILE_SUFFIX = '.json.gz';
export const DEFAULT_COMPRESSED_EXTENSION = '.gz';
export const DEFAULT_ARCHIVE_PATH = '/tmp/archive.zip';

// Download concurrency bounds
export const DEFAULT_MAX_CONCURRENT_DOWNLOADS = 20;
export const MIN_CONCURRENT_DOWNLOADS = 1;
export const MAX_CONCURRENT_DOWNLOADS_LIMIT = 100;

/**
 * Builds the configuration of a mirror run from environment variables
 */
export class ConfigService {
  static load(env: NodeJS.ProcessEnv = process.env): MirrorConfig {
    const bucket = ValidationService.sanitizeInput(env.BUCKET);
    const bucketValidation = ValidationService.validateBucketName(bucket);
    if (!bucketValidation.isValid) {
      throw new ValidationError(
        `Invalid BUCKET: ${bucketValidation.error}`,
        ValidationErrorCode.INVALID_BUCKET_NAME
      );
    }

    const startPrefix = this.resolveStartPrefix(env);

    const localRoot = ValidationService.sanitizeInput(env.LOCAL_DIR) || DEFAULT_LOCAL_DIR;
    const fileSuffix = ValidationService.sanitizeInput(env.FILE_SUFFIX) || DEFAULT_FILE_SUFFIX;
    const compressedExtension =
      ValidationService.sanitizeInput(env.COMPRESSED_EXTENSION) || DEFAULT_COMPRESSED_EXTENSION;

    const suffixValidation = ValidationService.validateSuffix(fileSuffix, compressedExtension);
    if (!suffixValidation.isValid) {
      throw new ValidationError(
        `Invalid FILE_SUFFIX/COMPRESSED_EXTENSION: ${suffixValidation.error}`,
        ValidationErrorCode.INVALID_SUFFIX
      );
    }

    const config: MirrorConfig = {
      bucket,
      startPrefix,
      localRoot,
      region: ValidationService.sanitizeInput(env.AWS_REGION) || DEFAULT_REGION,
      concurrency: this.parseConcurrency(env.MAX_CONCURRENT_DOWNLOADS),
      fileSuffix,
      compressedExtension,
    };

    const archiveKey = ValidationService.sanitizeInput(env.ARCHIVE_KEY);
    if (archiveKey) {
      const keyValidation = ValidationService.validateKeyPrefix(archiveKey);
      if (!keyValidation.isValid || archiveKey.endsWith('/')) {
        throw new ValidationError(
          `Invalid ARCHIVE_KEY: ${keyValidation.error || 'key must name an object, not a folder'}`,
          ValidationErrorCode.INVALID_KEY_PREFIX
        );
      }

      const archivePath = ValidationService.sanitizeInput(env.ARCHIVE_PATH) || DEFAULT_ARCHIVE_PATH;
      const pathValidation = ValidationService.validateArchivePath(archivePath, localRoot);
      if (!pathValidation.isValid) {
        throw new ValidationError(
          `Invalid ARCHIVE_PATH: ${pathValidation.error}`,
          ValidationErrorCode.INVALID_LOCAL_PATH
        );
      }

      config.archive = { key: archiveKey, localPath: archivePath };
    }

    return config;
  }

  /**
   * START_PREFIX wins; otherwise the prefix is built from PARTITION_ROOT and PARTITION_DATE/HOUR
   */
  static resolveStartPrefix(env: NodeJS.ProcessEnv): string {
    const explicitPrefix = ValidationService.sanitizeInput(env.START_PREFIX);
    if (explicitPrefix) {
      const prefixValidation = ValidationService.validateKeyPrefix(explicitPrefix);
      if (!prefixValidation.isValid) {
        throw new ValidationError(
          `Invalid START_PREFIX: ${prefixValidation.error}`,
          ValidationErrorCode.INVALID_KEY_PREFIX
        );
      }
      return explicitPrefix;
    }

    const root = ValidationService.sanitizeInput(env.PARTITION_ROOT);
    const date = ValidationService.sanitizeInput(env.PARTITION_DATE);
    if (!root || !date) {
      throw new ValidationError(
        'Missing required configuration: START_PREFIX, or PARTITION_ROOT with PARTITION_DATE',
        ValidationErrorCode.INVALID_KEY_PREFIX
      );
    }

    const hour = ValidationService.sanitizeInput(env.PARTITION_HOUR) || undefined;
    const partitionValidation = ValidationService.validatePartition(date, hour);
    if (!partitionValidation.isValid) {
      throw new ValidationError(
        `Invalid partition: ${partitionValidation.error}`,
        ValidationErrorCode.INVALID_PARTITION
      );
    }

    const prefix = this.buildPartitionPrefix(root, date, hour);
    const prefixValidation = ValidationService.validateKeyPrefix(prefix);
    if (!prefixValidation.isValid) {
      throw new ValidationError(
        `Invalid PARTITION_ROOT: ${prefixValidation.error}`,
        ValidationErrorCode.INVALID_KEY_PREFIX
      );
    }

    return prefix;
  }

  /**
   * miner_data + 2025-10-01 + 0 => miner_data/2025/10/01/00/
   */
  static buildPartitionPrefix(root: string, date: string, hour?: string): string {
    const cleanRoot = root.replace(/\/+$/, '');
    const [year, month, day] = date.split('-');
    const segments = [cleanRoot, year, month, day];
    if (hour !== undefined && hour !== '') {
      segments.push(hour.padStart(2, '0'));
    }
    return `${segments.join('/')}/`;
  }

  static parseConcurrency(value: string | undefined): number {
    if (!value) {
      return DEFAULT_MAX_CONCURRENT_DOWNLOADS;
    }

    const parsedValue = parseInt(value, 10);
    if (isNaN(parsedValue)) {
      console.warn(`Invalid MAX_CONCURRENT_DOWNLOADS value "${value}", using default ${DEFAULT_MAX_CONCURRENT_DOWNLOADS}`);
      return DEFAULT_MAX_CONCURRENT_DOWNLOADS;
    }
    if (parsedValue < MIN_CONCURRENT_DOWNLOADS) {
      console.warn(`MAX_CONCURRENT_DOWNLOADS value ${parsedValue} is below minimum ${MIN_CONCURRENT_DOWNLOADS}, using minimum`);
      return MIN_CONCURRENT_DOWNLOADS;
    }
    if (parsedValue > MAX_CONCURRENT_DOWNLOADS_LIMIT) {
      console.warn(`MAX_CONCURRENT_DOWNLOADS value ${parsedValue} exceeds maximum ${MAX_CONCURRENT_DOWNLOADS_LIMIT}, using maximum`);
      return MAX_CONCURRENT_DOWNLOADS_LIMIT;
    }
    return parsedValue;
  }
}
