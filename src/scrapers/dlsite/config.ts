import path from 'path';
import { ConfigError } from '../../errors.js';
import type { CrawlerConfig, IdRange } from './types.js';

const DEFAULT_RANGES = '1-499999,1000000-1369999';

/** "1-499999,1000000-1369999" -> two ranges; "none" -> no ranges. */
export function parseRanges(value: string, label: string): IdRange[] {
  const trimmed = value.trim();
  if (!trimmed || trimmed.toLowerCase() === 'none') {
    return [];
  }
  return trimmed.split(',').map(part => {
    const match = part.trim().match(/^(\d+)(?:-(\d+))?$/);
    if (!match) {
      throw new ConfigError(`Invalid ${label} range "${part.trim()}" (expected START-END)`);
    }
    const start = Number.parseInt(match[1], 10);
    const end = match[2] === undefined ? start : Number.parseInt(match[2], 10);
    if (start < 1 || end < start) {
      throw new ConfigError(`Invalid ${label} range "${part.trim()}" (need 1 <= START <= END)`);
    }
    return { start, end };
  });
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(Boolean);
}

function parseInteger(value: string | undefined, fallback: number, label: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(`${label} must be a whole number, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

type ValueOption =
  | 'dbPath'
  | 'archiveDir'
  | 'checkpointPath'
  | 'doujin'
  | 'commercial'
  | 'batchSize'
  | 'concurrency'
  | 'delay'
  | 'timeout'
  | 'retries'
  | 'retryDelay'
  | 'grace'
  | 'sites'
  | 'locale';

type RawOptions = Partial<Record<ValueOption, string>> & {
  downloadImages?: boolean;
  retryInconclusive?: boolean;
  verbose?: boolean;
};

const VALUE_FLAGS: Partial<Record<string, ValueOption>> = {
  '--db': 'dbPath',
  '--archive': 'archiveDir',
  '--checkpoint': 'checkpointPath',
  '--doujin': 'doujin',
  '--commercial': 'commercial',
  '--batch-size': 'batchSize',
  '--concurrency': 'concurrency',
  '--delay': 'delay',
  '--timeout': 'timeout',
  '--retries': 'retries',
  '--retry-delay': 'retryDelay',
  '--grace': 'grace',
  '--sites': 'sites',
  '--locale': 'locale'
};

export function parseArgs(args: string[]): RawOptions {
  const options: RawOptions = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    const next = args[i + 1];
    const key = VALUE_FLAGS[arg];
    if (key && next !== undefined) {
      options[key] = next;
      i += 1;
    } else if (key) {
      throw new ConfigError(`${arg} needs a value`);
    } else if (arg === '--no-download') {
      options.downloadImages = false;
    } else if (arg === '--no-retry-inconclusive') {
      options.retryInconclusive = false;
    } else if (arg === '--verbose') {
      options.verbose = true;
    } else {
      throw new ConfigError(`Unknown option ${arg}`);
    }
  }
  return options;
}

export function buildConfig(args: string[], env: NodeJS.ProcessEnv, cwd = process.cwd()): CrawlerConfig {
  const overrides = parseArgs(args);
  const archiveDir = overrides.archiveDir ?? env.DLSITE_ARCHIVE_DIR ?? path.join(cwd, 'DLsite_DB');

  const config: CrawlerConfig = {
    dbPath: path.resolve(cwd, overrides.dbPath ?? env.DLSITE_DB_PATH ?? 'dlsite_database.json'),
    archiveDir: path.resolve(cwd, archiveDir),
    checkpointPath: path.resolve(cwd, overrides.checkpointPath ?? env.DLSITE_CHECKPOINT_PATH ?? path.join(archiveDir, '.checkpoint.json')),
    ranges: {
      doujin: parseRanges(overrides.doujin ?? env.DLSITE_DOUJIN_RANGES ?? DEFAULT_RANGES, 'doujin'),
      commercial: parseRanges(overrides.commercial ?? env.DLSITE_COMMERCIAL_RANGES ?? DEFAULT_RANGES, 'commercial')
    },
    batchSize: parseInteger(overrides.batchSize ?? env.DLSITE_BATCH_SIZE, 200, 'Batch size'),
    concurrency: parseInteger(overrides.concurrency ?? env.DLSITE_CONCURRENCY, 8, 'Concurrency'),
    requestDelayMs: parseInteger(overrides.delay ?? env.DLSITE_DELAY_MS, 100, 'Request delay'),
    requestTimeoutMs: parseInteger(overrides.timeout ?? env.DLSITE_TIMEOUT_MS, 30000, 'Request timeout'),
    maxRetries: parseInteger(overrides.retries ?? env.DLSITE_MAX_RETRIES, 3, 'Max retries'),
    retryBaseDelayMs: parseInteger(overrides.retryDelay ?? env.DLSITE_RETRY_DELAY_MS, 1000, 'Retry delay'),
    retryMaxDelayMs: parseInteger(env.DLSITE_RETRY_MAX_DELAY_MS, 30000, 'Max retry delay'),
    graceTimeoutMs: parseInteger(overrides.grace ?? env.DLSITE_GRACE_MS, 15000, 'Grace timeout'),
    acceptedSites: parseList(overrides.sites ?? env.DLSITE_SITES ?? 'maniax,pro'),
    baseUrl: (env.DLSITE_BASE_URL ?? 'https://www.dlsite.com').replace(/\/+$/, ''),
    locale: overrides.locale ?? env.DLSITE_LOCALE ?? 'ja_JP',
    userAgent: env.DLSITE_USER_AGENT || 'DlsiteCatalogCrawler/1.0',
    downloadImages: overrides.downloadImages ?? env.DLSITE_DOWNLOAD_IMAGES !== 'false',
    retryInconclusive: overrides.retryInconclusive ?? env.DLSITE_RETRY_INCONCLUSIVE !== 'false',
    verbose: overrides.verbose ?? env.DLSITE_VERBOSE === 'true'
  };

  validateConfig(config);
  return config;
}

export function validateConfig(config: CrawlerConfig): void {
  if (config.batchSize < 1) {
    throw new ConfigError('Batch size must be at least 1');
  }
  if (config.concurrency < 1) {
    throw new ConfigError('Concurrency must be at least 1');
  }
  const nonNegative: Array<[string, number]> = [
    ['Request delay', config.requestDelayMs],
    ['Request timeout', config.requestTimeoutMs],
    ['Max retries', config.maxRetries],
    ['Retry delay', config.retryBaseDelayMs],
    ['Max retry delay', config.retryMaxDelayMs],
    ['Grace timeout', config.graceTimeoutMs]
  ];
  for (const [label, value] of nonNegative) {
    if (value < 0) {
      throw new ConfigError(`${label} must not be negative`);
    }
  }
  if (config.acceptedSites.length === 0) {
    throw new ConfigError('At least one accepted site is required');
  }
  if (config.ranges.doujin.length === 0 && config.ranges.commercial.length === 0) {
    throw new ConfigError('Both namespaces are disabled; nothing to crawl');
  }
}

export const USAGE = `Usage: dlsite-crawl [options]

  --db <file>               database file (default ./dlsite_database.json)
  --archive <dir>           image archive root (default ./DLsite_DB)
  --checkpoint <file>       checkpoint file (default <archive>/.checkpoint.json)
  --doujin <ranges>         RJ ranges, e.g. 1-499999,1000000-1369999 or "none"
  --commercial <ranges>     VJ ranges, same format
  --batch-size <n>          identifiers per checkpointed batch (default 200)
  --concurrency <n>         requests in flight (default 8)
  --delay <ms>              minimum gap between request starts (default 100)
  --timeout <ms>            per-request timeout (default 30000)
  --retries <n>             retries for transient failures (default 3)
  --retry-delay <ms>        first backoff delay (default 1000)
  --grace <ms>              wait for in-flight requests after an interrupt (default 15000)
  --sites <list>            accepted catalog sites (default maniax,pro)
  --locale <locale>         catalog locale (default ja_JP)
  --no-download             skip image downloads
  --no-retry-inconclusive   do not revisit identifiers left inconclusive
  --verbose                 log every batch
`;
