export type Namespace = 'doujin' | 'commercial';

export const NAMESPACES: readonly Namespace[] = ['doujin', 'commercial'];

export interface Identifier {
  namespace: Namespace;
  number: number;
}

export interface IdRange {
  start: number;
  end: number;
}

export type NamespaceRanges = Record<Namespace, IdRange[]>;

export const TRANSLATION_NOT_AVAILABLE = 'NaN';

export interface Item {
  maker: string;
  code: string;
  title: string;
  translateTitle: string;
}

/** On-disk shape of a database entry. */
export interface StoredItem {
  maker: string;
  code: string;
  title: string;
  'translate-title': string;
}

export interface DatabaseFile {
  updated_at: string;
  items: StoredItem[];
}

export interface CheckpointFile {
  version: 1;
  updated_at: string;
  namespaces: Record<Namespace, { last: string | null; inconclusive: string[]; pending_images: string[] }>;
}

/** A product as the catalog describes it, before category filtering. */
export interface CatalogWork {
  code: string;
  title: string;
  maker: string | null;
  siteId: string;
  imageUrl: string | null;
}

export type LookupResult =
  | { status: 'found'; work: CatalogWork }
  | { status: 'not-found' };

export interface ImagePayload {
  data: Buffer;
  contentType?: string;
  url?: string;
}

export interface ImageSource {
  /** Downloads the primary image; without `imageUrl` the product is looked up first. */
  fetchImage(code: string, imageUrl?: string): Promise<ImagePayload>;
}

export interface CatalogClient extends ImageSource {
  lookup(code: string): Promise<LookupResult>;
}

export type ProbeOutcome =
  | { kind: 'found'; identifier: Identifier; item: Item; imageUrl: string | null }
  | { kind: 'not-found'; identifier: Identifier }
  | { kind: 'rejected-category'; identifier: Identifier; siteId: string }
  | { kind: 'inconclusive'; identifier: Identifier; attempts: number; reason: string };

export type AssetStatus = 'existing' | 'downloaded' | 'failed' | 'skipped';

export interface AssetResult {
  code: string;
  status: AssetStatus;
  path?: string;
  error?: string;
}

export interface CrawlerConfig {
  dbPath: string;
  archiveDir: string;
  checkpointPath: string;
  ranges: NamespaceRanges;
  batchSize: number;
  concurrency: number;
  requestDelayMs: number;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  graceTimeoutMs: number;
  acceptedSites: string[];
  baseUrl: string;
  locale: string;
  userAgent: string;
  downloadImages: boolean;
  retryInconclusive: boolean;
  verbose: boolean;
}
