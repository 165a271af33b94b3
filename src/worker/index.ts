#!/usr/bin/env node
/**
 * Worker entry point
 *
 * Reads its configuration from environment variables, checks that the bucket is
 * reachable, mirrors the configured partition and decompresses it. The exit status
 * reports setup failures and interruption; per-file failures are in the log and the summary.
 */

import { MirrorConfig, MirrorRunSummary } from '../types/api.js';
import { ConfigService } from '../services/ConfigService.js';
import { MirrorPipeline } from '../services/MirrorPipeline.js';
import { S3Service } from '../services/S3Service.js';
import { ErrorHandler } from '../utils/errorHandler.js';

/**
 * Formats error message for user-friendly display
 */
function formatErrorMessage(error: unknown): string {
  if (!error) {
    return 'Unknown error occurred';
  }

  if (error instanceof Error) {
    const { code, message, retryable } = ErrorHandler.formatError(error);
    const text = code === 'UNKNOWN_ERROR' ? message : `${code}: ${message}`;
    return retryable ? `${text} (transient, the run can be retried)` : text;
  }

  if (typeof error === 'string') {
    return error;
  }

  return String(error);
}

async function main(): Promise<number> {
  let config: MirrorConfig;
  try {
    console.log('Parsing environment variables...');
    config = ConfigService.load(process.env);
  } catch (error) {
    console.error(`Configuration error: ${formatErrorMessage(error)}`);
    return 1;
  }

  console.log(`Bucket: ${config.bucket} (${config.region})`);
  console.log(`Start prefix: ${config.startPrefix}`);
  console.log(`Local directory: ${config.localRoot}`);
  console.log(`Concurrency: ${config.concurrency}, suffix: ${config.fileSuffix}`);
  if (config.archive) {
    console.log(`Archive: ${config.archive.localPath} -> s3://${config.bucket}/${config.archive.key}`);
  }

  const s3Service = new S3Service(config.region);

  console.log('Validating S3 bucket access...');
  try {
    await s3Service.validateBucketAccess(config.bucket);
    console.log('Bucket access validated');
  } catch (error) {
    console.error(`Bucket validation failed: ${formatErrorMessage(error)}`);
    return 1;
  }

  // First SIGINT stops new work; in-flight downloads finish
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.warn('Interrupted, finishing in-flight transfers...');
    controller.abort();
  });

  let summary: MirrorRunSummary;
  try {
    const pipeline = new MirrorPipeline(config, { store: s3Service, uploader: s3Service });
    summary = await pipeline.run(controller.signal);
  } catch (error) {
    console.error(`Worker error: ${formatErrorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      console.error('Error stack:', error.stack);
    }
    return 1;
  }

  const exitCode = MirrorPipeline.exitCode(summary);
  if (exitCode !== 0) {
    console.warn(`Process was interrupted; the local mirror is incomplete (exit ${exitCode}).`);
    return exitCode;
  }

  console.log('Process completed successfully.');
  return 0;
}

main()
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error) => {
    console.error('Unhandled error in worker:', error);
    process.exit(1);
  });
