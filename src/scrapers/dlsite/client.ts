import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { AssetFetchError, CatalogResponseError, TransientCatalogError, describeError } from '../../errors.js';
import { parseCode } from './identifiers.js';
import type { CatalogClient, CatalogWork, ImagePayload, LookupResult, Namespace } from './types.js';

const SITE_BY_NAMESPACE: Record<Namespace, string> = {
  doujin: 'maniax',
  commercial: 'pro'
};

export interface DlsiteClientOptions {
  baseUrl: string;
  locale: string;
  userAgent: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

type RawProduct = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value : null;
}

export function fixImageUrl(url: string): string {
  if (url.startsWith('//')) {
    return `https:${url}`;
  }
  return url;
}

function retryAfterMs(response: AxiosResponse): number | undefined {
  const header = response.headers['retry-after'];
  const seconds = Number(header);
  if (header === undefined || Number.isNaN(seconds) || seconds <= 0) {
    return undefined;
  }
  return seconds * 1000;
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function parseProduct(payload: unknown, requestedCode: string): CatalogWork | null {
  const entries: unknown[] = Array.isArray(payload) ? payload : isRecord(payload) ? [payload] : [];
  const product = entries.find((entry): entry is RawProduct => isRecord(entry));
  if (!product) {
    return null;
  }

  const code = asString(product.workno) ?? asString(product.product_id);
  const siteId = asString(product.site_id);
  if (!code || !siteId) {
    throw new CatalogResponseError(`Malformed product payload for ${requestedCode}`);
  }

  const imageMain = isRecord(product.image_main) ? asString(product.image_main.url) : null;
  const imageUrl = imageMain ?? asString(product.work_image);

  return {
    code: code.toUpperCase(),
    title: asString(product.work_name) ?? '',
    maker: asString(product.maker_name) ?? asString(product.circle) ?? asString(product.brand),
    siteId,
    imageUrl: imageUrl ? fixImageUrl(imageUrl) : null
  };
}

/**
 * Talks to the public DLsite product API. Every call is a single attempt;
 * retrying, pacing and interrupts belong to the fetcher. Requests already
 * sent always run to completion or to their timeout.
 */
export class DlsiteClient implements CatalogClient {
  private readonly http: AxiosInstance;

  constructor(private readonly options: DlsiteClientOptions) {
    this.http = options.http ?? axios.create();
  }

  async lookup(code: string): Promise<LookupResult> {
    const identifier = parseCode(code);
    const site = identifier ? SITE_BY_NAMESPACE[identifier.namespace] : 'maniax';
    const url = `${this.options.baseUrl}/${site}/api/=/product.json`;

    const response = await this.request(() =>
      this.http.get<unknown>(url, {
        params: { workno: code, locale: this.options.locale },
        headers: { 'User-Agent': this.options.userAgent, Accept: 'application/json' },
        timeout: this.options.timeoutMs,
        responseType: 'json',
        validateStatus: () => true
      }),
      code
    );

    if (response.status === 404) {
      return { status: 'not-found' };
    }
    if (isTransientStatus(response.status)) {
      throw new TransientCatalogError(`Catalog answered ${response.status} for ${code}`, {
        status: response.status,
        retryAfterMs: retryAfterMs(response)
      });
    }
    if (response.status !== 200) {
      throw new CatalogResponseError(`Catalog answered ${response.status} for ${code}`, response.status);
    }

    const work = parseProduct(response.data, code);
    return work ? { status: 'found', work } : { status: 'not-found' };
  }

  async fetchImage(code: string, imageUrl?: string): Promise<ImagePayload> {
    const url = imageUrl ?? (await this.resolveImageUrl(code));
    if (!url) {
      throw new AssetFetchError(code, `No primary image known for ${code}`);
    }

    const response = await this.request(() =>
      this.http.get<ArrayBuffer>(url, {
        headers: { 'User-Agent': this.options.userAgent },
        timeout: this.options.timeoutMs,
        responseType: 'arraybuffer',
        validateStatus: () => true
      }),
      code
    );

    if (isTransientStatus(response.status)) {
      throw new TransientCatalogError(`Image download answered ${response.status} for ${code}`, {
        status: response.status,
        retryAfterMs: retryAfterMs(response)
      });
    }
    if (response.status !== 200) {
      throw new AssetFetchError(code, `Image download answered ${response.status} for ${code} (${url})`);
    }

    const contentType = response.headers['content-type'];
    return {
      data: Buffer.from(response.data),
      contentType: typeof contentType === 'string' ? contentType.split(';')[0].trim() : undefined,
      url
    };
  }

  private async resolveImageUrl(code: string): Promise<string | null> {
    const result = await this.lookup(code);
    return result.status === 'found' ? result.work.imageUrl : null;
  }

  private async request<T>(send: () => Promise<AxiosResponse<T>>, code: string): Promise<AxiosResponse<T>> {
    try {
      return await send();
    } catch (error) {
      throw new TransientCatalogError(`Request for ${code} failed: ${describeError(error)}`, { cause: error });
    }
  }
}
