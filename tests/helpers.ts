import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { TransientCatalogError } from '../src/errors.js';
import type { CatalogClient, CatalogWork, ImagePayload, LookupResult } from '../src/scrapers/dlsite/types.js';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'dlsite-tests-'));
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function work(code: string, overrides: Partial<CatalogWork> = {}): CatalogWork {
  return {
    code,
    title: `Title ${code}`,
    maker: `Maker ${code}`,
    siteId: code.startsWith('VJ') ? 'pro' : 'maniax',
    imageUrl: `https://img.example.test/${code}_img_main.jpg`,
    ...overrides
  };
}

/** In-process stand-in for the catalog; counts every call. */
export class FakeCatalog implements CatalogClient {
  readonly lookups: string[] = [];
  readonly imageFetches: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  private readonly works = new Map<string, CatalogWork>();
  private readonly transientFailures = new Map<string, number>();
  private readonly hanging = new Map<string, () => void>();
  private readonly lookupHooks = new Map<string, () => void>();
  private readonly brokenImages = new Set<string>();

  constructor(private readonly delayMs = 0) {}

  add(...works: CatalogWork[]): this {
    for (const entry of works) {
      this.works.set(entry.code, entry);
    }
    return this;
  }

  failTransiently(code: string, times: number): this {
    this.transientFailures.set(code, times);
    return this;
  }

  /** The lookup for `code` never settles; the returned promise resolves once it is called. */
  hang(code: string): Promise<void> {
    return new Promise(resolve => {
      this.hanging.set(code, resolve);
    });
  }

  failImage(code: string): this {
    this.brokenImages.add(code);
    return this;
  }

  onLookup(code: string, hook: () => void): this {
    this.lookupHooks.set(code, hook);
    return this;
  }

  lookupCount(code: string): number {
    return this.lookups.filter(entry => entry === code).length;
  }

  async lookup(code: string): Promise<LookupResult> {
    this.lookups.push(code);
    this.lookupHooks.get(code)?.();

    const hangStarted = this.hanging.get(code);
    if (hangStarted) {
      hangStarted();
      return new Promise<LookupResult>(() => undefined);
    }

    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
      const remaining = this.transientFailures.get(code) ?? 0;
      if (remaining > 0) {
        this.transientFailures.set(code, remaining - 1);
        throw new TransientCatalogError(`simulated timeout for ${code}`);
      }
      const found = this.works.get(code);
      return found ? { status: 'found', work: found } : { status: 'not-found' };
    } finally {
      this.inFlight -= 1;
    }
  }

  async fetchImage(code: string, imageUrl?: string): Promise<ImagePayload> {
    this.imageFetches.push(code);
    const url = imageUrl ?? this.works.get(code)?.imageUrl;
    if (!url || this.brokenImages.has(code)) {
      throw new Error(`no image for ${code}`);
    }
    return { data: Buffer.from(`image:${code}`), contentType: 'image/jpeg', url };
  }
}
