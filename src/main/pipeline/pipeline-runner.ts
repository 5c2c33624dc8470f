import fs from 'fs-extra';
import type { FetchTarget, HeaderMap, PassResult, RunMode, RunSummary } from '../../shared/types/fetch-outcome.js';
import { resolveRunOptions } from '../config/run-options.js';
import type { RunOptions } from '../config/run-options.js';
import { HttpClient } from '../services/http-client.js';
import type { HttpClientOptions, Transport } from '../services/http-client.js';
import { DownloadService } from '../services/download-service.js';
import type { DownloadServiceOptions } from '../services/download-service.js';
import { OutcomeLog } from '../services/outcome-log.js';
import { FetchPipeline } from './fetch-pipeline.js';
import { ConfigError } from '../errors.js';
import type { ConfirmRetry, ProgressCallback, UrlSource } from '../types.js';
import log from '../logger.js';

export interface PipelineRunRequest {
  options?: Partial<RunOptions>;
  source?: UrlSource;
  confirmRetry?: ConfirmRetry;
  progress?: ProgressCallback;
}

type ClientOptions = Pick<HttpClientOptions, 'retries' | 'timeoutMs'>;

export interface PipelineRunnerDeps {
  createClient?: (options: ClientOptions) => Transport;
  createWorker?: (options: DownloadServiceOptions, client: Transport) => Pick<DownloadService, 'fetch'>;
  shuffle?: <T>(items: T[]) => T[];
  env?: Record<string, string | undefined>;
}

interface TargetBatch {
  mode: RunMode;
  targets: FetchTarget[];
}

export const shuffle = <T>(items: T[]): T[] => {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i -= 1) {
    const j = Math.floor(Math.random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
};

export const buildTargets = (urls: readonly string[], headers: HeaderMap, referer?: string): FetchTarget[] => {
  const shared = Object.freeze({ ...headers });
  return [...new Set(urls)].map((url) => Object.freeze({ url, referer, headers: shared }));
};

/**
 * Run-level flow: pick the targets (fresh from a URL source, or replayed
 * from the log's failing URLs), run the primary pass and, when the caller
 * confirms, a retry pass over the failures of that pass.
 */
export class PipelineRunner {
  private isRunning = false;

  constructor(private readonly deps: PipelineRunnerDeps = {}) {}

  async run(request: PipelineRunRequest): Promise<RunSummary> {
    if (this.isRunning) {
      throw new Error('Pipeline is already running.');
    }
    this.isRunning = true;
    const startedAt = new Date();

    try {
      const options = resolveRunOptions(request.options, this.deps.env ?? process.env);
      const outcomeLog = new OutcomeLog(options.logFile);
      await fs.ensureDir(options.outDir);
      await outcomeLog.ensureInitialized();

      const batch = await this.collectTargets(request, options, outcomeLog);
      if (batch.targets.length === 0) {
        log.info(
          batch.mode === 'retry-failed' ? 'No failed URLs found in %s; nothing to retry.' : 'URL source returned no images (%s untouched).',
          outcomeLog.logPath
        );
        return this.buildSummary(batch.mode, { successCount: 0, failureCount: 0, failingTargets: [] }, undefined, outcomeLog, startedAt);
      }

      const client = this.createClient({ retries: options.httpRetries, timeoutMs: options.requestTimeoutMs });
      try {
        const worker = this.createWorker(
          {
            outDir: options.outDir,
            metadataEnabled: options.metadataEnabled,
            latitude: options.latitude,
            longitude: options.longitude,
            maxTries: options.maxTries
          },
          client
        );
        const pipeline = new FetchPipeline(worker, outcomeLog, { concurrency: options.workers });

        log.info('%s %d URLs with %d workers', batch.mode === 'retry-failed' ? 'Retrying' : 'Fetching', batch.targets.length, options.workers);
        const primary = await pipeline.run(batch.targets, request.progress, batch.mode === 'retry-failed' ? 'Retrying' : 'Downloading');

        let retry: PassResult | undefined;
        if (await this.shouldRetry(batch.mode, primary, options, request.confirmRetry)) {
          const shuffleFn = this.deps.shuffle ?? shuffle;
          retry = await pipeline.run(shuffleFn([...primary.failingTargets]), request.progress, 'Retrying');
          log.info('Retry complete. Recovered: %d | Still failing: %d', retry.successCount, retry.failureCount);
        } else if (primary.failureCount > 0) {
          log.info('%d URLs still failing; run again in retry-failed mode to retry them.', primary.failureCount);
        }

        return this.buildSummary(batch.mode, primary, retry, outcomeLog, startedAt);
      } finally {
        await client.close();
      }
    } finally {
      this.isRunning = false;
    }
  }

  private async collectTargets(request: PipelineRunRequest, options: RunOptions, outcomeLog: OutcomeLog): Promise<TargetBatch> {
    if (options.retryFailedOnly) {
      // Replayed URLs must be self-contained signed URLs: no session headers survive in the log.
      const urls = await outcomeLog.readFailingUrls();
      return { mode: 'retry-failed', targets: buildTargets(urls, {}, options.replayReferer) };
    }
    if (!request.source) {
      throw new ConfigError('A URL source is required unless retryFailedOnly is set.');
    }
    const { urls, headers, referer } = await request.source.collect();
    return { mode: 'fresh', targets: buildTargets(urls, headers, referer || undefined) };
  }

  private async shouldRetry(
    mode: RunMode,
    primary: PassResult,
    options: RunOptions,
    confirmRetry: ConfirmRetry | undefined
  ): Promise<boolean> {
    if (mode !== 'fresh' || primary.failureCount === 0 || options.skipConfirmation || !confirmRetry) {
      return false;
    }
    return confirmRetry(primary.failureCount);
  }

  private createClient(options: ClientOptions): Transport {
    return this.deps.createClient ? this.deps.createClient(options) : new HttpClient(options);
  }

  private createWorker(options: DownloadServiceOptions, client: Transport): Pick<DownloadService, 'fetch'> {
    return this.deps.createWorker ? this.deps.createWorker(options, client) : new DownloadService(options, client);
  }

  private buildSummary(
    mode: RunMode,
    primary: PassResult,
    retry: PassResult | undefined,
    outcomeLog: OutcomeLog,
    startedAt: Date
  ): RunSummary {
    const finishedAt = new Date();
    return {
      mode,
      total: primary.successCount + primary.failureCount,
      succeeded: primary.successCount,
      failed: primary.failureCount,
      retry,
      logFile: outcomeLog.logPath,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime()
    };
  }
}
