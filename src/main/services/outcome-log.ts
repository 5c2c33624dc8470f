import path from 'node:path';
import fs from 'fs-extra';
import PQueue from 'p-queue';
import type { FetchOutcome, OutcomeStatus } from '../../shared/types/fetch-outcome.js';
import { parseCsv, toCsvLine } from '../utils/csv.js';
import type { CsvValue } from '../utils/csv.js';
import { OutcomeLogError } from '../errors.js';

export const LOG_COLUMNS = [
  'timestamp',
  'status',
  'attempts',
  'http_status',
  'media_id',
  'variant',
  'filename',
  'url',
  'error'
] as const;

export type LogColumn = (typeof LOG_COLUMNS)[number];

export type OutcomeRecord = Record<LogColumn, string>;

// One writer per log file for the whole process, however many OutcomeLog
// instances point at it.
const writers = new Map<string, PQueue>();

const writerFor = (logPath: string): PQueue => {
  let writer = writers.get(logPath);
  if (!writer) {
    writer = new PQueue({ concurrency: 1 });
    writers.set(logPath, writer);
  }
  return writer;
};

export const toLogRow = (outcome: FetchOutcome): CsvValue[] => {
  const status: OutcomeStatus = outcome.success ? 'success' : 'failed';
  const error = outcome.success ? outcome.advisory : outcome.errorMessage;
  return [
    outcome.timestamp,
    status,
    outcome.attempts,
    outcome.httpStatus,
    outcome.mediaId,
    outcome.variant,
    outcome.filename,
    outcome.url,
    error
  ];
};

/**
 * Append-only CSV record of fetch outcomes. Rows are never rewritten; the
 * current status of a URL is the status of its last row.
 */
export class OutcomeLog {
  readonly logPath: string;
  private readonly writer: PQueue;

  constructor(logPath: string) {
    this.logPath = path.resolve(logPath);
    this.writer = writerFor(this.logPath);
  }

  async ensureInitialized(): Promise<void> {
    await this.writer.add(async () => {
      if (await fs.pathExists(this.logPath)) {
        return;
      }
      await fs.ensureDir(path.dirname(this.logPath));
      await fs.writeFile(this.logPath, toCsvLine([...LOG_COLUMNS]), { encoding: 'utf8', flag: 'wx' });
    });
  }

  async append(outcome: FetchOutcome): Promise<void> {
    await this.writer.add(async () => {
      await fs.ensureDir(path.dirname(this.logPath));
      await fs.appendFile(this.logPath, toCsvLine(toLogRow(outcome)), 'utf8');
    });
  }

  async readRecords(): Promise<OutcomeRecord[]> {
    if (!(await fs.pathExists(this.logPath))) {
      return [];
    }
    const rows = parseCsv(await fs.readFile(this.logPath, 'utf8')).filter(
      (row) => !(row.length === 1 && row[0] === '')
    );
    if (rows.length === 0) {
      return [];
    }

    const [header, ...body] = rows;
    const indices = new Map(LOG_COLUMNS.map((column): [LogColumn, number] => [column, header.indexOf(column)]));
    const missing = LOG_COLUMNS.filter((column) => indices.get(column) === -1);
    if (missing.length > 0) {
      throw new OutcomeLogError(this.logPath, `Log header is missing columns: ${missing.join(', ')}`);
    }

    return body.map((row) => {
      const cell = (column: LogColumn): string => row[indices.get(column) ?? -1] ?? '';
      return {
        timestamp: cell('timestamp'),
        status: cell('status'),
        attempts: cell('attempts'),
        http_status: cell('http_status'),
        media_id: cell('media_id'),
        variant: cell('variant'),
        filename: cell('filename'),
        url: cell('url'),
        error: cell('error')
      };
    });
  }

  /**
   * URLs whose most recent row is not a success, in order of first
   * appearance in the log.
   */
  async readFailingUrls(): Promise<string[]> {
    const latest = new Map<string, string>();
    for (const record of await this.readRecords()) {
      if (record.url) {
        latest.set(record.url, record.status);
      }
    }
    return [...latest.entries()].filter(([, status]) => status !== 'success').map(([url]) => url);
  }
}
