import { ObjectStore, TransferOutcome } from '../types/api.js';
import { MirrorWriter } from './MirrorWriter.js';
import { PoolStats, WorkerPool } from './WorkerPool.js';
import { DEFAULT_MAX_CONCURRENT_DOWNLOADS } from './ConfigService.js';

export interface TransferOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

/**
 * Downloads a batch of keys into the local mirror with a fixed ceiling on in-flight transfers.
 * Each key is tried once; failures are logged and reported in the outcome list, never thrown.
 */
export class TransferScheduler {
  private lastStats?: PoolStats;

  constructor(
    private readonly store: ObjectStore,
    private readonly defaultConcurrency: number = DEFAULT_MAX_CONCURRENT_DOWNLOADS
  ) {}

  async transferAll(
    bucket: string,
    keys: readonly string[],
    localRoot: string,
    options: TransferOptions = {}
  ): Promise<TransferOutcome[]> {
    const concurrency = options.concurrency ?? this.defaultConcurrency;
    console.log(`[Transfer] Downloading ${keys.length} objects to ${localRoot} with max ${concurrency} concurrent transfers`);

    const pool = new WorkerPool<string, TransferOutcome>(
      (key) => this.transferOne(bucket, key, localRoot),
      { concurrency, signal: options.signal, label: 'Transfer' }
    );

    const results = await pool.run(keys);
    this.lastStats = pool.getStats();

    return results.map((result): TransferOutcome => {
      switch (result.status) {
        case 'fulfilled':
          return result.value;
        case 'rejected': {
          const localPath = this.safeLocalPath(localRoot, result.item);
          console.error(`[Transfer] Failed to download ${result.item} to ${localPath}: ${result.error.message}`);
          return {
            key: result.item,
            localPath,
            status: 'failed',
            bytesWritten: 0,
            error: result.error,
          };
        }
        case 'skipped':
          return {
            key: result.item,
            localPath: this.safeLocalPath(localRoot, result.item),
            status: 'skipped',
            bytesWritten: 0,
          };
      }
    });
  }

  /**
   * Pool statistics of the last batch (peak concurrency, counts)
   */
  getLastStats(): PoolStats | undefined {
    return this.lastStats ? { ...this.lastStats } : undefined;
  }

  private async transferOne(bucket: string, key: string, localRoot: string): Promise<TransferOutcome> {
    // Resolve before touching the network so a bad key never opens a stream
    MirrorWriter.resolveLocalPath(localRoot, key);

    const source = await this.store.getObjectStream(bucket, key);
    const { localPath, bytesWritten } = await MirrorWriter.writeObject(localRoot, key, source);

    console.log(`[Transfer] Downloaded ${key} to ${localPath} (${bytesWritten} bytes)`);
    return { key, localPath, status: 'downloaded', bytesWritten };
  }

  private safeLocalPath(localRoot: string, key: string): string {
    try {
      return MirrorWriter.resolveLocalPath(localRoot, key);
    } catch {
      // Keys that cannot be mirrored have no local path
      return '';
    }
  }
}
