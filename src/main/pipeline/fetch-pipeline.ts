import PQueue from 'p-queue';
import type { FetchOutcome, FetchTarget, PassResult } from '../../shared/types/fetch-outcome.js';
import type { DownloadService } from '../services/download-service.js';
import type { OutcomeLog } from '../services/outcome-log.js';
import { extractMediaInfo, filenameFromUrl } from '../utils/naming.js';
import { toLogTimestamp } from '../utils/date.js';
import { errorMessage } from '../errors.js';
import type { ProgressCallback, ProgressEvent } from '../types.js';
import log from '../logger.js';

export interface FetchPipelineOptions {
  concurrency: number;
  label?: string;
}

/**
 * Fans targets out over a fixed-size worker pool. Each outcome is appended
 * to the log and counted as its worker finishes, so log order is completion
 * order. Calling `run` again with the failing targets gives a retry pass.
 */
export class FetchPipeline {
  constructor(
    private readonly worker: Pick<DownloadService, 'fetch'>,
    private readonly outcomeLog: OutcomeLog,
    private readonly options: FetchPipelineOptions
  ) {}

  async run(targets: readonly FetchTarget[], progress?: ProgressCallback, label = this.options.label ?? 'Downloading'): Promise<PassResult> {
    const queue = new PQueue({ concurrency: Math.max(1, this.options.concurrency) });
    const result: PassResult = { successCount: 0, failureCount: 0, failingTargets: [] };
    let completed = 0;

    const jobs = targets.map((target) =>
      queue.add(async () => {
        const outcome = await this.fetchSafely(target);
        await this.outcomeLog.append(outcome).catch((error: unknown) => {
          log.error('Could not log outcome for %s: %s', target.url, errorMessage(error));
        });
        completed += 1;
        if (outcome.success) {
          result.successCount += 1;
        } else {
          result.failureCount += 1;
          result.failingTargets.push(target);
        }
        this.report(progress, { completed, total: targets.length, label, outcome });
      })
    );

    await Promise.all(jobs);
    log.info('%s finished: %d saved, %d failed', label, result.successCount, result.failureCount);
    return result;
  }

  private report(progress: ProgressCallback | undefined, event: ProgressEvent): void {
    try {
      progress?.(event);
    } catch (error) {
      log.error('Progress callback failed for %s: %s', event.outcome.url, errorMessage(error));
    }
  }

  private async fetchSafely(target: FetchTarget): Promise<FetchOutcome> {
    try {
      return await this.worker.fetch(target);
    } catch (error) {
      log.error('Worker crashed on %s: %s', target.url, errorMessage(error));
      const { mediaId, variant } = extractMediaInfo(target.url);
      return {
        url: target.url,
        success: false,
        attempts: 1,
        mediaId,
        variant,
        filename: filenameFromUrl(target.url),
        errorMessage: errorMessage(error),
        timestamp: toLogTimestamp()
      };
    }
  }
}
