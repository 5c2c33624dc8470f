export type FetchPipelineErrorCode = 'CONFIG_INVALID' | 'LOG_CORRUPT';

export class FetchPipelineError extends Error {
  constructor(
    readonly code: FetchPipelineErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends FetchPipelineError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export class OutcomeLogError extends FetchPipelineError {
  constructor(
    readonly logPath: string,
    message: string
  ) {
    super('LOG_CORRUPT', `${message} (${logPath})`);
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
