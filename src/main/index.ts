export { PipelineRunner, buildTargets, shuffle } from './pipeline/pipeline-runner.js';
export type { PipelineRunRequest, PipelineRunnerDeps } from './pipeline/pipeline-runner.js';
export { FetchPipeline } from './pipeline/fetch-pipeline.js';
export type { FetchPipelineOptions } from './pipeline/fetch-pipeline.js';
export { DownloadService } from './services/download-service.js';
export type { DownloadServiceDeps, DownloadServiceOptions } from './services/download-service.js';
export { HttpClient, DEFAULT_HTTP_OPTIONS, RETRY_STATUSES, parseRetryAfter } from './services/http-client.js';
export type { FetchFn, HttpClientOptions, SleepFn, Transport } from './services/http-client.js';
export { OutcomeLog, LOG_COLUMNS } from './services/outcome-log.js';
export type { OutcomeRecord } from './services/outcome-log.js';
export { rewriteImageMetadata, buildExifDirectories, JPEG_QUALITY } from './services/metadata-service.js';
export type { MetadataRewriter, RewriteResult } from './services/metadata-service.js';
export { DEFAULT_RUN_OPTIONS, resolveRunOptions } from './config/run-options.js';
export type { RunOptions } from './config/run-options.js';
export { filenameFromUrl, extractMediaInfo } from './utils/naming.js';
export { parseCapturedAt, toExifTimestamp } from './utils/date.js';
export { ConfigError, FetchPipelineError, OutcomeLogError } from './errors.js';
export type { ConfirmRetry, ProgressCallback, ProgressEvent, UrlSource, UrlSourceResult } from './types.js';
export type * from '../shared/types/fetch-outcome.js';
export { default as log } from './logger.js';
