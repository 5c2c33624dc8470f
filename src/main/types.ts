import type { FetchOutcome, HeaderMap } from '../shared/types/fetch-outcome.js';

export interface ProgressEvent {
  completed: number;
  total: number;
  label: string;
  outcome: FetchOutcome;
}

export type ProgressCallback = (event: ProgressEvent) => void;

export interface UrlSourceResult {
  urls: string[];
  headers: HeaderMap;
  referer: string;
}

/** Supplies URLs plus the session headers and referer they must be fetched with. */
export interface UrlSource {
  collect(): Promise<UrlSourceResult>;
}

export type ConfirmRetry = (failureCount: number) => Promise<boolean>;
