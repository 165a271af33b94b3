import {
  S3Client,
  HeadBucketCommand,
  ListObjectsV2Command,
  GetObjectCommand,
  CreateMultipartUploadCommand,
  UploadPartCommand,
  CompleteMultipartUploadCommand,
  AbortMultipartUploadCommand,
  GetObjectCommandOutput,
} from '@aws-sdk/client-s3';
import { Readable } from 'stream';
import { ListPage, MultipartUploader, ObjectStore, UploadedPart } from '../types/api.js';
import { ErrorHandler, S3Error, errorMessage } from '../utils/errorHandler.js';

/**
 * S3 implementation of the remote namespace and of the archive uploader
 */
export class S3Service implements ObjectStore, MultipartUploader {
  private s3Client: S3Client;

  constructor(region?: string) {
    this.s3Client = new S3Client({
      region: region || process.env.AWS_REGION || 'us-east-1',
      requestHandler: {
        requestTimeout: 300000, // 5 minutes for individual requests
        connectionTimeout: 60000, // 1 minute to establish connection
      },
      maxAttempts: 5,
    });
  }

  /**
   * Validates that the bucket exists and we have access to it
   */
  async validateBucketAccess(bucket: string): Promise<boolean> {
    try {
      await this.s3Client.send(new HeadBucketCommand({ Bucket: bucket }));
      return true;
    } catch (error) {
      console.error('Bucket access validation failed:', errorMessage(error));
      throw ErrorHandler.handleS3Error(error, bucket);
    }
  }

  /**
   * Lists one page under a prefix with the hierarchy delimiter set
   */
  async listObjectsPage(
    bucket: string,
    prefix: string,
    delimiter: string,
    continuationToken?: string
  ): Promise<ListPage> {
    try {
      const response = await this.s3Client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix,
          Delimiter: delimiter,
          ContinuationToken: continuationToken,
        })
      );

      const commonPrefixes: string[] = [];
      for (const entry of response.CommonPrefixes ?? []) {
        if (entry.Prefix) {
          commonPrefixes.push(entry.Prefix);
        }
      }

      const keys: string[] = [];
      for (const object of response.Contents ?? []) {
        if (object.Key) {
          keys.push(object.Key);
        }
      }

      // S3 only sends a token when the listing was truncated
      const nextContinuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;

      return { commonPrefixes, keys, nextContinuationToken };
    } catch (error) {
      throw ErrorHandler.handleS3Error(error, bucket);
    }
  }

  /**
   * Opens the body of an object as a Node stream
   */
  async getObjectStream(bucket: string, key: string): Promise<Readable> {
    let response: GetObjectCommandOutput;
    try {
      response = await this.s3Client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    } catch (error) {
      throw ErrorHandler.handleS3Error(error, bucket, key);
    }

    const body = response.Body;
    if (!(body instanceof Readable)) {
      throw new S3Error(`Object '${key}' returned no readable body`);
    }
    return body;
  }

  /**
   * Creates a multipart upload
   * Returns the upload ID
   */
  async createMultipartUpload(
    bucket: string,
    key: string,
    contentType: string = 'application/octet-stream'
  ): Promise<string> {
    try {
      const response = await this.s3Client.send(
        new CreateMultipartUploadCommand({
          Bucket: bucket,
          Key: key,
          ContentType: contentType,
        })
      );

      if (!response.UploadId) {
        throw new S3Error('Failed to create multipart upload: No upload ID returned');
      }

      return response.UploadId;
    } catch (error) {
      if (error instanceof S3Error) {
        throw error;
      }
      console.error('Failed to create multipart upload:', errorMessage(error));
      throw ErrorHandler.handleS3Error(error, bucket, key);
    }
  }

  /**
   * Uploads a single part of a multipart upload
   * Returns the ETag for the uploaded part
   */
  async uploadPart(
    bucket: string,
    key: string,
    uploadId: string,
    partNumber: number,
    data: Buffer
  ): Promise<string> {
    const startTime = Date.now();
    try {
      console.log(`Uploading part ${partNumber} (${(data.length / 1024 / 1024).toFixed(2)} MB)...`);

      const response = await this.s3Client.send(
        new UploadPartCommand({
          Bucket: bucket,
          Key: key,
          UploadId: uploadId,
          PartNumber: partNumber,
          Body: data,
        })
      );

      const duration = ((Date.now() - startTime) / 1000).toFixed(2);
      console.log(`Part ${partNumber} uploaded in ${duration}s`);

      if (!response.ETag) {
        throw new S3Error(`Failed to upload part ${partNumber}: No ETag returned`);
      }

      return response.ETag;
    } catch (error) {
      if (error instanceof S3Error) {
        throw error;
      }
      const duration = ((Date.now() - startTime) / 1000).toFixed(2);
      console.error(`Failed to upload part ${partNumber} after ${duration}s:`, errorMessage(error));
      throw ErrorHandler.handleS3Error(error, bucket, key);
    }
  }

  /**
   * Completes a multipart upload
   * Returns the S3 location URL
   */
  async completeUpload(
    bucket: string,
    key: string,
    uploadId: string,
    parts: UploadedPart[]
  ): Promise<string> {
    try {
      // Parts finish out of order when uploaded concurrently; S3 wants them ascending
      const sortedParts = [...parts].sort((a, b) => a.PartNumber - b.PartNumber);

      console.log(`Completing multipart upload with ${sortedParts.length} parts`);

      await this.s3Client.send(
        new CompleteMultipartUploadCommand({
          Bucket: bucket,
          Key: key,
          UploadId: uploadId,
          MultipartUpload: {
            Parts: sortedParts,
          },
        })
      );

      return `s3://${bucket}/${key}`;
    } catch (error) {
      console.error('Failed to complete multipart upload:', errorMessage(error));
      throw ErrorHandler.handleS3Error(error, bucket, key);
    }
  }

  /**
   * Aborts a multipart upload
   * Used for cleanup when the archive upload fails
   */
  async abortUpload(bucket: string, key: string, uploadId: string): Promise<void> {
    try {
      await this.s3Client.send(
        new AbortMultipartUploadCommand({
          Bucket: bucket,
          Key: key,
          UploadId: uploadId,
        })
      );
      console.log(`Aborted multipart upload ${uploadId} for ${bucket}/${key}`);
    } catch (error) {
      // Logged only: the caller is already failing with the error that caused the abort
      console.error(`Failed to abort multipart upload ${uploadId}:`, errorMessage(error));
    }
  }
}
