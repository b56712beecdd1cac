import path from 'path';
import { describe, expect, it } from 'vitest';
import { ConfigError } from '../src/errors.js';
import { buildConfig, parseArgs, parseRanges } from '../src/scrapers/dlsite/config.js';

const cwd = path.resolve('/work');

describe('parseRanges', () => {
  it('reads comma separated ranges and single numbers', () => {
    expect(parseRanges('1-499999, 1000000-1369999', 'doujin')).toEqual([
      { start: 1, end: 499999 },
      { start: 1000000, end: 1369999 }
    ]);
    expect(parseRanges('42', 'doujin')).toEqual([{ start: 42, end: 42 }]);
  });

  it('disables a namespace with "none"', () => {
    expect(parseRanges('none', 'commercial')).toEqual([]);
    expect(parseRanges('', 'commercial')).toEqual([]);
  });

  it('rejects malformed or inverted ranges', () => {
    expect(() => parseRanges('10-5', 'doujin')).toThrow(ConfigError);
    expect(() => parseRanges('0-5', 'doujin')).toThrow(ConfigError);
    expect(() => parseRanges('a-b', 'doujin')).toThrow('Invalid doujin range "a-b" (expected START-END)');
  });
});

describe('parseArgs', () => {
  it('reads value flags and switches', () => {
    expect(parseArgs(['--db', 'out.json', '--no-download', '--verbose'])).toEqual({
      dbPath: 'out.json',
      downloadImages: false,
      verbose: true
    });
  });

  it('rejects unknown flags and missing values', () => {
    expect(() => parseArgs(['--fast'])).toThrow('Unknown option --fast');
    expect(() => parseArgs(['--db'])).toThrow('--db needs a value');
  });
});

describe('buildConfig', () => {
  it('fills in defaults relative to the working directory', () => {
    const config = buildConfig([], {}, cwd);

    expect(config).toMatchObject({
      dbPath: path.join(cwd, 'dlsite_database.json'),
      archiveDir: path.join(cwd, 'DLsite_DB'),
      checkpointPath: path.join(cwd, 'DLsite_DB', '.checkpoint.json'),
      ranges: {
        doujin: [{ start: 1, end: 499999 }, { start: 1000000, end: 1369999 }],
        commercial: [{ start: 1, end: 499999 }, { start: 1000000, end: 1369999 }]
      },
      batchSize: 200,
      concurrency: 8,
      requestDelayMs: 100,
      requestTimeoutMs: 30000,
      maxRetries: 3,
      retryBaseDelayMs: 1000,
      retryMaxDelayMs: 30000,
      graceTimeoutMs: 15000,
      acceptedSites: ['maniax', 'pro'],
      baseUrl: 'https://www.dlsite.com',
      locale: 'ja_JP',
      downloadImages: true,
      retryInconclusive: true,
      verbose: false
    });
  });

  it('prefers flags over environment variables', () => {
    const config = buildConfig(
      ['--batch-size', '25', '--doujin', 'none', '--commercial', '5-9'],
      {
        DLSITE_BATCH_SIZE: '50',
        DLSITE_CONCURRENCY: '2',
        DLSITE_DB_PATH: 'data/db.json',
        DLSITE_BASE_URL: 'https://mirror.example.test/',
        DLSITE_DOWNLOAD_IMAGES: 'false'
      },
      cwd
    );

    expect(config.batchSize).toBe(25);
    expect(config.concurrency).toBe(2);
    expect(config.dbPath).toBe(path.join(cwd, 'data', 'db.json'));
    expect(config.baseUrl).toBe('https://mirror.example.test');
    expect(config.downloadImages).toBe(false);
    expect(config.ranges).toEqual({ doujin: [], commercial: [{ start: 5, end: 9 }] });
  });

  it('rejects values the crawler cannot run with', () => {
    expect(() => buildConfig(['--batch-size', '0'], {}, cwd)).toThrow('Batch size must be at least 1');
    expect(() => buildConfig(['--concurrency', 'many'], {}, cwd)).toThrow('Concurrency must be a whole number, got "many"');
    expect(() => buildConfig(['--batch-size', '10abc'], {}, cwd)).toThrow('Batch size must be a whole number, got "10abc"');
    expect(() => buildConfig([], { DLSITE_DELAY_MS: '1.5' }, cwd)).toThrow('Request delay must be a whole number, got "1.5"');
    expect(() => buildConfig(['--delay', '-1'], {}, cwd)).toThrow('Request delay must not be negative');
    expect(() => buildConfig(['--sites', ' , '], {}, cwd)).toThrow(ConfigError);
    expect(() => buildConfig(['--doujin', 'none', '--commercial', 'none'], {}, cwd)).toThrow(
      'Both namespaces are disabled; nothing to crawl'
    );
  });
});
