import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { FetchOutcome } from '../../shared/types/fetch-outcome.js';
import { OutcomeLogError } from '../errors.js';
import { LOG_COLUMNS, OutcomeLog, toLogRow } from './outcome-log.js';

const HEADER = 'timestamp,status,attempts,http_status,media_id,variant,filename,url,error\n';

const outcome = (url: string, success: boolean, overrides: Partial<FetchOutcome> = {}): FetchOutcome => ({
  url,
  success,
  attempts: 1,
  httpStatus: success ? 200 : 503,
  mediaId: '42',
  variant: 'large',
  filename: '42_large.jpg',
  errorMessage: success ? undefined : 'HTTP 503',
  timestamp: '2024-01-02T03:04:05',
  ...overrides
});

describe('OutcomeLog', () => {
  let dir: string;
  let logPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'gallery-fetch-log-'));
    logPath = path.join(dir, 'download_log.csv');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('writes the header once and never truncates an existing log', async () => {
    const first = new OutcomeLog(logPath);
    await first.ensureInitialized();
    expect(await fs.readFile(logPath, 'utf8')).toBe(HEADER);

    await first.append(outcome('https://a.test/media/1/large', true));
    await new OutcomeLog(logPath).ensureInitialized();

    const lines = (await fs.readFile(logPath, 'utf8')).split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(HEADER.trimEnd());
  });

  it('creates the parent directory of a nested log path', async () => {
    const nested = new OutcomeLog(path.join(dir, 'logs', 'run', 'log.csv'));
    await nested.ensureInitialized();
    expect(await fs.readFile(nested.logPath, 'utf8')).toBe(HEADER);
  });

  it('appends one formatted row per outcome', async () => {
    const log = new OutcomeLog(logPath);
    await log.ensureInitialized();
    await log.append(outcome('https://a.test/media/42/large?u=1', false, { attempts: 5, errorMessage: 'HTTP 503, twice' }));

    const text = await fs.readFile(logPath, 'utf8');
    expect(text).toBe(
      `${HEADER}2024-01-02T03:04:05,failed,5,503,42,large,42_large.jpg,https://a.test/media/42/large?u=1,"HTTP 503, twice"\n`
    );
  });

  it('leaves http_status empty when no response was received', () => {
    const row = toLogRow(outcome('https://a.test/x', false, { httpStatus: undefined, errorMessage: 'socket hang up' }));
    expect(row).toEqual(['2024-01-02T03:04:05', 'failed', 1, undefined, '42', 'large', '42_large.jpg', 'https://a.test/x', 'socket hang up']);
  });

  it('records the advisory in the error column of a success', () => {
    const row = toLogRow(outcome('https://a.test/x', true, { advisory: 'EXIF write failed: bad input' }));
    expect(row[1]).toBe('success');
    expect(row[LOG_COLUMNS.indexOf('error')]).toBe('EXIF write failed: bad input');
  });

  it('keeps every row when many appends race', async () => {
    const log = new OutcomeLog(logPath);
    await log.ensureInitialized();
    const urls = Array.from({ length: 50 }, (_, i) => `https://a.test/media/${i}/large`);

    await Promise.all(urls.map((url, i) => new OutcomeLog(logPath).append(outcome(url, i % 2 === 0))));

    const records = await log.readRecords();
    expect(records).toHaveLength(50);
    expect(new Set(records.map((record) => record.url))).toEqual(new Set(urls));
  });

  it('reads records back by column name', async () => {
    const log = new OutcomeLog(logPath);
    await log.ensureInitialized();
    await log.append(outcome('https://a.test/media/7/small', false, { errorMessage: 'line one\nline "two"' }));

    expect(await log.readRecords()).toEqual([
      {
        timestamp: '2024-01-02T03:04:05',
        status: 'failed',
        attempts: '1',
        http_status: '503',
        media_id: '42',
        variant: 'large',
        filename: '42_large.jpg',
        url: 'https://a.test/media/7/small',
        error: 'line one\nline "two"'
      }
    ]);
  });

  it('reports a URL as failing only while its last row is a failure', async () => {
    const log = new OutcomeLog(logPath);
    await log.ensureInitialized();
    await log.append(outcome('a', false));
    await log.append(outcome('b', false));
    await log.append(outcome('c', true));
    await log.append(outcome('a', true));
    await log.append(outcome('c', false));
    await log.append(outcome('b', false));

    expect(await log.readFailingUrls()).toEqual(['b', 'c']);
  });

  it('returns nothing for a missing log', async () => {
    const log = new OutcomeLog(path.join(dir, 'absent.csv'));
    expect(await log.readRecords()).toEqual([]);
    expect(await log.readFailingUrls()).toEqual([]);
  });

  it('rejects a log whose header lacks required columns', async () => {
    await fs.writeFile(logPath, 'url,status\nhttps://a.test/x,failed\n');
    const log = new OutcomeLog(logPath);

    await expect(log.readFailingUrls()).rejects.toBeInstanceOf(OutcomeLogError);
    await expect(log.readRecords()).rejects.toThrow(
      'Log header is missing columns: timestamp, attempts, http_status, media_id, variant, filename, error'
    );
  });
});
