import pLimit from 'p-limit';
import { TransientCatalogError, describeError } from '../../errors.js';
import type { Logger } from '../../logger.js';
import { createThrottle, sleep } from '../../throttle.js';
import { renderCode } from './identifiers.js';
import {
  TRANSLATION_NOT_AVAILABLE,
  type CatalogClient,
  type CatalogWork,
  type Identifier,
  type ImagePayload,
  type ImageSource,
  type Item,
  type ProbeOutcome
} from './types.js';

export interface FetcherOptions {
  concurrency: number;
  requestDelayMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  acceptedSites: string[];
}

export function toItem(work: CatalogWork): Item {
  return {
    maker: work.maker ?? 'Unknown',
    code: work.code,
    title: work.title,
    translateTitle: TRANSLATION_NOT_AVAILABLE
  };
}

export function backoffDelay(attempt: number, options: Pick<FetcherOptions, 'retryBaseDelayMs' | 'retryMaxDelayMs'>): number {
  const exponential = options.retryBaseDelayMs * 2 ** (attempt - 1);
  return Math.min(exponential, options.retryMaxDelayMs);
}

/**
 * The only component that reaches the catalog. Lookups and image downloads
 * share one concurrency cap and one pacing gate. An abort stops new attempts
 * from starting; requests already in flight are left to finish.
 */
export class RateLimitedFetcher implements ImageSource {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly throttle: () => Promise<void>;
  private readonly acceptedSites: Set<string>;

  constructor(
    private readonly catalog: CatalogClient,
    private readonly options: FetcherOptions,
    private readonly logger: Logger
  ) {
    this.limit = pLimit(options.concurrency);
    this.throttle = createThrottle(options.requestDelayMs);
    this.acceptedSites = new Set(options.acceptedSites);
  }

  probe(identifier: Identifier, signal?: AbortSignal): Promise<ProbeOutcome> {
    return this.limit(() => this.probeWithRetry(identifier, signal));
  }

  fetchImage(code: string, imageUrl?: string): Promise<ImagePayload> {
    return this.limit(async () => {
      await this.throttle();
      return this.catalog.fetchImage(code, imageUrl);
    });
  }

  private async probeWithRetry(identifier: Identifier, signal?: AbortSignal): Promise<ProbeOutcome> {
    const code = renderCode(identifier);
    let attempts = 0;

    while (true) {
      if (!signal?.aborted) {
        await this.throttle();
      }
      if (signal?.aborted) {
        return { kind: 'inconclusive', identifier, attempts, reason: 'aborted' };
      }
      attempts += 1;

      try {
        const result = await this.catalog.lookup(code);
        if (result.status === 'not-found') {
          return { kind: 'not-found', identifier };
        }
        if (!this.acceptedSites.has(result.work.siteId)) {
          return { kind: 'rejected-category', identifier, siteId: result.work.siteId };
        }
        return { kind: 'found', identifier, item: toItem(result.work), imageUrl: result.work.imageUrl };
      } catch (error) {
        if (!(error instanceof TransientCatalogError)) {
          this.logger.warn(`Lookup for ${code} failed`, error);
          return { kind: 'inconclusive', identifier, attempts, reason: describeError(error) };
        }
        if (attempts > this.options.maxRetries) {
          this.logger.warn(`Lookup for ${code} still failing after ${attempts} attempts`, error);
          return { kind: 'inconclusive', identifier, attempts, reason: describeError(error) };
        }

        const jitter = Math.floor(Math.random() * (this.options.retryBaseDelayMs / 2));
        const wait = Math.min(error.retryAfterMs ?? backoffDelay(attempts, this.options) + jitter, this.options.retryMaxDelayMs);
        this.logger.debug(`Retrying ${code} in ${wait}ms (attempt ${attempts}): ${error.message}`);
        await sleep(wait, signal);
      }
    }
  }
}
