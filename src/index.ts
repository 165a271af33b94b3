export * from './types/api.js';
export * from './types/validation.js';
export * from './utils/errorHandler.js';
export { isWithin, listFiles } from './utils/fileTree.js';
export { ConfigService } from './services/ConfigService.js';
export { ValidationService } from './services/ValidationService.js';
export { S3Service } from './services/S3Service.js';
export { EnumerationService, KEY_DELIMITER } from './services/EnumerationService.js';
export type { EnumerationOptions } from './services/EnumerationService.js';
export { WorkerPool } from './services/WorkerPool.js';
export type { WorkerPoolOptions, PoolResult, PoolStats } from './services/WorkerPool.js';
export { MirrorWriter } from './services/MirrorWriter.js';
export type { MirroredFile } from './services/MirrorWriter.js';
export { TransferScheduler } from './services/TransferScheduler.js';
export type { TransferOptions } from './services/TransferScheduler.js';
export { DecompressionService } from './services/DecompressionService.js';
export type { SweepPlanEntry, SweepOptions } from './services/DecompressionService.js';
export { ArchiveService } from './services/ArchiveService.js';
export type { ArchiveUploadOptions, CreatedArchive } from './services/ArchiveService.js';
export { INTERRUPTED_EXIT_CODE, MirrorPipeline } from './services/MirrorPipeline.js';
export type { MirrorPipelineDependencies } from './services/MirrorPipeline.js';
