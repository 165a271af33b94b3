import { promises as fs } from 'fs';
import {
  ArchiveResult,
  MirrorConfig,
  MirrorRunCounts,
  MirrorRunSummary,
  MultipartUploader,
  ObjectStore,
  SweepOutcome,
  TransferOutcome,
} from '../types/api.js';
import { MirrorSetupError, errorMessage } from '../utils/errorHandler.js';
import { ArchiveService, ArchiveUploadOptions } from './ArchiveService.js';
import { DecompressionService } from './DecompressionService.js';
import { EnumerationService } from './EnumerationService.js';
import { TransferScheduler } from './TransferScheduler.js';

/** Conventional status for a process stopped by SIGINT */
export const INTERRUPTED_EXIT_CODE = 130;

export interface MirrorPipelineDependencies {
  store: ObjectStore;
  uploader?: MultipartUploader;
  archiveOptions?: ArchiveUploadOptions;
}

/**
 * Runs enumerate → transfer → sweep (→ archive) for one configured partition
 */
export class MirrorPipeline {
  private readonly enumerationService: EnumerationService;
  private readonly transferScheduler: TransferScheduler;
  private readonly decompressionService: DecompressionService;
  private readonly archiveService?: ArchiveService;

  constructor(private readonly config: MirrorConfig, dependencies: MirrorPipelineDependencies) {
    this.enumerationService = new EnumerationService(dependencies.store, config.fileSuffix);
    this.transferScheduler = new TransferScheduler(dependencies.store, config.concurrency);
    this.decompressionService = new DecompressionService({
      suffix: config.fileSuffix,
      compressedExtension: config.compressedExtension,
    });

    if (config.archive) {
      if (!dependencies.uploader) {
        throw new MirrorSetupError('Archive upload is configured but no uploader was provided');
      }
      this.archiveService = new ArchiveService(dependencies.uploader, dependencies.archiveOptions);
    }
  }

  /**
   * Per-item failures end up in the summary. Only setup and archive failures throw.
   * An aborted signal still sweeps what was downloaded but never archives.
   */
  async run(signal?: AbortSignal): Promise<MirrorRunSummary> {
    const startTime = new Date();
    const { bucket, startPrefix, localRoot } = this.config;

    try {
      await fs.mkdir(localRoot, { recursive: true });
    } catch (error) {
      throw new MirrorSetupError(`Failed to create local directory ${localRoot}: ${errorMessage(error)}`, error);
    }

    console.log(`[Pipeline] Mirroring s3://${bucket}/${startPrefix} into ${localRoot}`);

    const enumeration = await this.enumerationService.collectKeys(bucket, startPrefix, { signal });
    const transfers = await this.transferScheduler.transferAll(bucket, enumeration.keys, localRoot, { signal });
    const sweep = await this.decompressionService.sweep(localRoot);
    const interrupted = signal?.aborted === true;

    let archive: ArchiveResult | undefined;
    if (this.config.archive && this.archiveService && interrupted) {
      console.warn(`[Pipeline] Run was interrupted; not archiving a partial mirror to ${this.config.archive.key}`);
    } else if (this.config.archive && this.archiveService) {
      const created = await ArchiveService.createArchive(localRoot, this.config.archive.localPath);
      const s3Location = await this.archiveService.uploadArchive(bucket, this.config.archive.key, created.archivePath);
      archive = { ...created, s3Location };
      console.log(`[Pipeline] Archive uploaded to ${s3Location}`);
    }

    const summary: MirrorRunSummary = {
      startTime,
      endTime: new Date(),
      enumeration,
      transfers,
      sweep,
      archive,
      interrupted,
      counts: MirrorPipeline.countOutcomes(enumeration.keys.length, enumeration.failedPrefixes.length, transfers, sweep),
    };

    MirrorPipeline.logSummary(summary);
    return summary;
  }

  static exitCode(summary: MirrorRunSummary): number {
    return summary.interrupted ? INTERRUPTED_EXIT_CODE : 0;
  }

  static countOutcomes(
    discovered: number,
    failedPrefixes: number,
    transfers: readonly TransferOutcome[],
    sweep: readonly SweepOutcome[]
  ): MirrorRunCounts {
    const counts: MirrorRunCounts = {
      discovered,
      downloaded: 0,
      downloadFailed: 0,
      skipped: 0,
      decompressed: 0,
      decompressFailed: 0,
      originalsKept: 0,
      failedPrefixes,
    };

    for (const transfer of transfers) {
      if (transfer.status === 'downloaded') {
        counts.downloaded++;
      } else if (transfer.status === 'failed') {
        counts.downloadFailed++;
      } else {
        counts.skipped++;
      }
    }

    for (const outcome of sweep) {
      switch (outcome.status) {
        case 'decompressed':
          counts.decompressed++;
          break;
        case 'decompressed-original-kept':
          counts.decompressed++;
          counts.originalsKept++;
          break;
        case 'failed':
          counts.decompressFailed++;
          break;
      }
    }

    return counts;
  }

  private static logSummary(summary: MirrorRunSummary): void {
    const { counts } = summary;
    const seconds = ((summary.endTime.getTime() - summary.startTime.getTime()) / 1000).toFixed(2);

    console.log(`[Pipeline] ${summary.interrupted ? 'Interrupted' : 'Completed'} in ${seconds}s`);
    console.log(`  - Keys discovered: ${counts.discovered} (${counts.failedPrefixes} prefixes failed to list)`);
    console.log(`  - Downloaded: ${counts.downloaded}, failed: ${counts.downloadFailed}, skipped: ${counts.skipped}`);
    console.log(`  - Decompressed: ${counts.decompressed}, failed: ${counts.decompressFailed}, originals kept: ${counts.originalsKept}`);

    if (counts.failedPrefixes > 0 || counts.downloadFailed > 0 || counts.decompressFailed > 0) {
      console.warn('[Pipeline] Run finished with partial failures; see the log lines above');
    }
  }
}
