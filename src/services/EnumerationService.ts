import { EnumerationResult, ObjectStore, PrefixFailure } from '../types/api.js';
import { ListingError, errorMessage } from '../utils/errorHandler.js';

export const KEY_DELIMITER = '/';

export interface EnumerationOptions {
  suffix?: string;
  signal?: AbortSignal;
}

/**
 * Walks the delimited key hierarchy under a prefix and collects leaf keys that match a suffix.
 *
 * The walk is depth-first over an explicit stack of prefixes. Every prefix is listed
 * page by page until the store stops returning a continuation token; common prefixes
 * go onto the stack and matching keys into the accumulator.
 *
 * A listing failure ends that prefix only. Whatever its earlier pages produced is kept,
 * the failure is recorded in `failedPrefixes`, and the walk moves on to the next prefix.
 */
export class EnumerationService {
  constructor(
    private readonly store: ObjectStore,
    private readonly defaultSuffix: string = '.json.gz'
  ) {}

  async collectKeys(
    bucket: string,
    startPrefix: string,
    options: EnumerationOptions = {}
  ): Promise<EnumerationResult> {
    const suffix = options.suffix ?? this.defaultSuffix;
    const keys: string[] = [];
    const failedPrefixes: PrefixFailure[] = [];
    const frontier: string[] = [startPrefix];
    let pagesListed = 0;
    let aborted = false;

    console.log(`[Enumerate] Listing s3://${bucket}/${startPrefix} for *${suffix}`);

    while (frontier.length > 0 && !aborted) {
      const prefix = frontier.pop();
      if (prefix === undefined) {
        break;
      }

      const discovered: string[] = [];
      let continuationToken: string | undefined;

      do {
        if (options.signal?.aborted) {
          aborted = true;
          frontier.push(prefix);
          break;
        }

        try {
          const page = await this.store.listObjectsPage(bucket, prefix, KEY_DELIMITER, continuationToken);
          pagesListed++;

          discovered.push(...page.commonPrefixes);
          for (const key of page.keys) {
            if (key.endsWith(suffix)) {
              keys.push(key);
            }
          }

          continuationToken = page.nextContinuationToken;
        } catch (error) {
          const failure = new ListingError(
            `Error listing ${prefix}: ${errorMessage(error)}`,
            prefix,
            error
          );
          console.error(`[Enumerate] ${failure.message}`);
          failedPrefixes.push({ prefix, error: failure });
          continuationToken = undefined;
        }
      } while (continuationToken);

      if (aborted) {
        break;
      }

      // Reversed so the first listed sub-prefix is walked first
      for (let i = discovered.length - 1; i >= 0; i--) {
        frontier.push(discovered[i]);
      }
    }

    if (aborted) {
      console.warn(`[Enumerate] Aborted with ${frontier.length} prefixes left unlisted`);
    }
    console.log(
      `[Enumerate] Found ${keys.length} keys in ${pagesListed} pages` +
      (failedPrefixes.length > 0 ? `, ${failedPrefixes.length} prefixes failed` : '')
    );

    return { keys, failedPrefixes, pagesListed, aborted };
  }
}
