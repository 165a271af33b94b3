export interface ValidationResult {
  isValid: boolean;
  error?: string;
}

export enum ValidationErrorCode {
  INVALID_BUCKET_NAME = 'invalid_bucket_name',
  INVALID_KEY_PREFIX = 'invalid_key_prefix',
  INVALID_SUFFIX = 'invalid_suffix',
  INVALID_PARTITION = 'invalid_partition',
  INVALID_LOCAL_PATH = 'invalid_local_path'
}
