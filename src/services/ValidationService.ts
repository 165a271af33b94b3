import { ValidationResult } from '../types/validation.js';
import { isWithin } from '../utils/fileTree.js';

export class ValidationService {
  /**
   * Trims configuration input, strips control characters and caps its length
   */
  static sanitizeInput(input: string | undefined): string {
    if (!input) {
      return '';
    }

    let sanitized = input.trim();

    // Remove null bytes and other control characters
    sanitized = sanitized.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, '');

    if (sanitized.length > 2048) {
      sanitized = sanitized.substring(0, 2048);
    }

    return sanitized;
  }

  /**
   * Validates S3 bucket name according to AWS naming conventions
   *
   * Rules:
   * - Must be between 3 and 63 characters long
   * - Can consist only of lowercase letters, numbers, dots (.), and hyphens (-)
   * - Must begin and end with a letter or number
   * - Must not contain two adjacent periods
   * - Must not be formatted as an IP address (e.g., 192.168.5.4)
   */
  static validateBucketName(bucketName: string): ValidationResult {
    if (!bucketName) {
      return { isValid: false, error: 'Bucket name is required' };
    }

    if (bucketName.length < 3 || bucketName.length > 63) {
      return {
        isValid: false,
        error: 'Bucket name must be between 3 and 63 characters long'
      };
    }

    if (!/^[a-z0-9.-]+$/.test(bucketName)) {
      return {
        isValid: false,
        error: 'Bucket name can only contain lowercase letters, numbers, dots, and hyphens'
      };
    }

    if (!/^[a-z0-9].*[a-z0-9]$/.test(bucketName)) {
      return {
        isValid: false,
        error: 'Bucket name must begin and end with a letter or number'
      };
    }

    if (bucketName.includes('..')) {
      return {
        isValid: false,
        error: 'Bucket name must not contain two adjacent periods'
      };
    }

    if (/^(\d{1,3}\.){3}\d{1,3}$/.test(bucketName)) {
      return {
        isValid: false,
        error: 'Bucket name must not be formatted as an IP address'
      };
    }

    return { isValid: true };
  }

  /**
   * Validates a listing prefix. An empty prefix lists the whole bucket.
   */
  static validateKeyPrefix(prefix: string): ValidationResult {
    if (prefix === '') {
      return { isValid: true };
    }

    if (prefix.length > 1024) {
      return {
        isValid: false,
        error: 'Key prefix must not exceed 1024 characters'
      };
    }

    if (prefix.startsWith('/')) {
      return {
        isValid: false,
        error: 'Key prefix should not start with a forward slash'
      };
    }

    if (prefix.includes('//')) {
      return {
        isValid: false,
        error: 'Key prefix must not contain empty path segments'
      };
    }

    if (prefix.split('/').some((segment) => segment === '..')) {
      return {
        isValid: false,
        error: 'Key prefix must not contain ".." segments'
      };
    }

    return { isValid: true };
  }

  /**
   * Validates the suffix filter and the compression extension the sweep strips from it
   */
  static validateSuffix(fileSuffix: string, compressedExtension: string): ValidationResult {
    if (!fileSuffix.startsWith('.') || fileSuffix.length < 2) {
      return {
        isValid: false,
        error: 'File suffix must start with a dot, e.g. ".json.gz"'
      };
    }

    if (fileSuffix.includes('/')) {
      return {
        isValid: false,
        error: 'File suffix must not contain "/"'
      };
    }

    if (!compressedExtension.startsWith('.') || compressedExtension.length < 2) {
      return {
        isValid: false,
        error: 'Compressed extension must start with a dot, e.g. ".gz"'
      };
    }

    if (!fileSuffix.endsWith(compressedExtension) || fileSuffix === compressedExtension) {
      return {
        isValid: false,
        error: `File suffix "${fileSuffix}" must end with the compressed extension "${compressedExtension}" and keep a name before it`
      };
    }

    return { isValid: true };
  }

  /**
   * Validates a date partition: YYYY-MM-DD plus an optional hour 0-23
   */
  static validatePartition(date: string, hour?: string): ValidationResult {
    const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
    if (!match) {
      return {
        isValid: false,
        error: 'Partition date must use the YYYY-MM-DD format'
      };
    }

    const [, year, month, day] = match;
    const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    if (
      parsed.getUTCFullYear() !== Number(year) ||
      parsed.getUTCMonth() !== Number(month) - 1 ||
      parsed.getUTCDate() !== Number(day)
    ) {
      return {
        isValid: false,
        error: `Partition date ${date} is not a calendar date`
      };
    }

    if (hour !== undefined && hour !== '') {
      if (!/^\d{1,2}$/.test(hour) || Number(hour) > 23) {
        return {
          isValid: false,
          error: 'Partition hour must be a number between 0 and 23'
        };
      }
    }

    return { isValid: true };
  }

  /**
   * Validates that the archive is written outside the directory being archived
   */
  static validateArchivePath(archivePath: string, localRoot: string): ValidationResult {
    if (!archivePath.endsWith('.zip')) {
      return {
        isValid: false,
        error: 'Archive path must end with .zip'
      };
    }

    if (isWithin(localRoot, archivePath)) {
      return {
        isValid: false,
        error: 'Archive path must be outside the local mirror directory'
      };
    }

    return { isValid: true };
  }
}
