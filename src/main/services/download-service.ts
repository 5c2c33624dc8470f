import path from 'node:path';
import fs from 'fs-extra';
import type { DateTime } from 'luxon';
import type { FetchOutcome, FetchTarget, HeaderMap } from '../../shared/types/fetch-outcome.js';
import { parseCapturedAt, toLogTimestamp } from '../utils/date.js';
import { extractMediaInfo, filenameFromUrl } from '../utils/naming.js';
import { writeFileAtomic } from '../utils/files.js';
import { errorMessage } from '../errors.js';
import type { SleepFn, Transport } from './http-client.js';
import { sleep } from './http-client.js';
import { rewriteImageMetadata } from './metadata-service.js';
import type { MetadataRewriter } from './metadata-service.js';
import log from '../logger.js';

export interface DownloadServiceOptions {
  outDir: string;
  metadataEnabled: boolean;
  latitude?: number;
  longitude?: number;
  maxTries: number;
}

export interface DownloadServiceDeps {
  rewrite?: MetadataRewriter;
  sleep?: SleepFn;
  random?: () => number;
}

type AttemptResult =
  | { ok: true; httpStatus: number; advisory?: string }
  | { ok: false; httpStatus?: number; error: string };

/**
 * Fetch worker: one target in, one outcome out. Failures of any kind end up
 * in the returned outcome; `fetch` itself does not reject.
 */
export class DownloadService {
  private readonly rewrite: MetadataRewriter;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(
    private readonly options: DownloadServiceOptions,
    private readonly client: Pick<Transport, 'get'>,
    deps: DownloadServiceDeps = {}
  ) {
    this.rewrite = deps.rewrite ?? rewriteImageMetadata;
    this.sleep = deps.sleep ?? sleep;
    this.random = deps.random ?? Math.random;
  }

  retryDelay(attempt: number): number {
    return 2000 * attempt + this.random() * 500;
  }

  async fetch(target: FetchTarget): Promise<FetchOutcome> {
    const filename = filenameFromUrl(target.url);
    const outPath = path.join(this.options.outDir, filename);
    const capturedAt = parseCapturedAt(target.url);
    const requestHeaders: HeaderMap = target.referer ? { ...target.headers, Referer: target.referer } : { ...target.headers };
    let httpStatus: number | undefined;
    let pendingError: string | undefined;

    for (let attempt = 1; attempt <= this.options.maxTries; attempt += 1) {
      const result = await this.attempt(target, outPath, requestHeaders, capturedAt);
      httpStatus = result.httpStatus ?? httpStatus;
      if (result.ok) {
        return this.buildOutcome(target, filename, { success: true, attempts: attempt, httpStatus, advisory: result.advisory });
      }

      pendingError = result.error;
      log.warn('Attempt %d/%d failed for %s: %s', attempt, this.options.maxTries, target.url, result.error);
      if (attempt < this.options.maxTries) {
        await this.sleep(this.retryDelay(attempt));
      }
    }

    log.error('Giving up on %s after %d attempts', target.url, this.options.maxTries);
    return this.buildOutcome(target, filename, {
      success: false,
      attempts: this.options.maxTries,
      httpStatus,
      errorMessage: pendingError ?? 'No attempts made'
    });
  }

  private async attempt(
    target: FetchTarget,
    outPath: string,
    requestHeaders: HeaderMap,
    capturedAt: DateTime | undefined
  ): Promise<AttemptResult> {
    let data: Buffer;
    let status: number;
    try {
      const response = await this.client.get(target.url, requestHeaders);
      status = response.status;
      if (!response.ok) {
        await response.body?.cancel();
        return { ok: false, httpStatus: status, error: `HTTP ${status}` };
      }
      data = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }

    if (data.length === 0) {
      return { ok: false, httpStatus: status, error: `HTTP ${status} (empty body)` };
    }

    let advisory: string | undefined;
    if (this.options.metadataEnabled) {
      const rewritten = await this.rewrite(data, {
        capturedAt,
        latitude: this.options.latitude,
        longitude: this.options.longitude
      });
      data = rewritten.data;
      advisory = rewritten.advisory;
      if (advisory) {
        log.warn('%s for %s; saving original bytes', advisory, target.url);
      }
    }

    try {
      await writeFileAtomic(outPath, data);
    } catch (error) {
      return { ok: false, httpStatus: status, error: `Write failed: ${errorMessage(error)}` };
    }

    if (capturedAt) {
      await this.alignFileTimestamp(outPath, capturedAt);
    }
    return { ok: true, httpStatus: status, advisory };
  }

  private async alignFileTimestamp(filePath: string, capturedAt: DateTime): Promise<void> {
    const mtime = capturedAt.toJSDate();
    await fs.utimes(filePath, mtime, mtime).catch((error: unknown) => {
      log.debug('Could not set mtime on %s: %s', filePath, errorMessage(error));
    });
  }

  private buildOutcome(
    target: FetchTarget,
    filename: string,
    result: Pick<FetchOutcome, 'success' | 'attempts' | 'httpStatus' | 'errorMessage' | 'advisory'>
  ): FetchOutcome {
    const { mediaId, variant } = extractMediaInfo(target.url);
    return {
      url: target.url,
      mediaId,
      variant,
      filename,
      timestamp: toLogTimestamp(),
      ...result
    };
  }
}
