import type { DateTime } from 'luxon';

export type OutcomeStatus = 'success' | 'failed';

export type HeaderMap = Readonly<Record<string, string>>;

export interface FetchTarget {
  readonly url: string;
  readonly referer?: string;
  readonly headers: HeaderMap;
}

export interface FetchOutcome {
  url: string;
  success: boolean;
  attempts: number;
  httpStatus?: number;
  mediaId: string;
  variant: string;
  filename: string;
  errorMessage?: string;
  advisory?: string;
  timestamp: string;
}

export interface MetadataPatch {
  capturedAt?: DateTime;
  latitude?: number;
  longitude?: number;
}

export interface PassResult {
  successCount: number;
  failureCount: number;
  failingTargets: FetchTarget[];
}

export type RunMode = 'fresh' | 'retry-failed';

export interface RunSummary {
  mode: RunMode;
  total: number;
  succeeded: number;
  failed: number;
  retry?: PassResult;
  logFile: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}
