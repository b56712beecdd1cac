import fs from 'fs/promises';
import { readFileIfExists, writeFileAtomic } from '../../atomicWrite.js';
import { PersistenceCorruptionError } from '../../errors.js';
import { IdentifierSpace, parseCode, renderCode } from './identifiers.js';
import { NAMESPACES, type CheckpointFile, type Namespace } from './types.js';

interface NamespaceProgress {
  last: number | null;
  inconclusive: Set<number>;
  pendingImages: Set<number>;
}

function emptyProgress(): Record<Namespace, NamespaceProgress> {
  return {
    doujin: { last: null, inconclusive: new Set(), pendingImages: new Set() },
    commercial: { last: null, inconclusive: new Set(), pendingImages: new Set() }
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Durable enumeration progress: the last processed identifier per
 * namespace, the identifiers whose probe never settled, and the stored
 * works whose image is not on disk yet.
 */
export class CheckpointStore {
  private progress = emptyProgress();
  private chain: Promise<void> = Promise.resolve();
  private readonly now: () => Date;

  constructor(
    private readonly filePath: string,
    private readonly space: IdentifierSpace,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async load(): Promise<Record<Namespace, number | null>> {
    const raw = await readFileIfExists(this.filePath);
    this.progress = raw === null ? emptyProgress() : this.parse(raw);
    return {
      doujin: this.resumeCursor('doujin'),
      commercial: this.resumeCursor('commercial')
    };
  }

  /** First number to probe in `namespace`; null when the namespace has no ranges. */
  resumeCursor(namespace: Namespace): number | null {
    const last = this.progress[namespace].last;
    if (last !== null) {
      return last + 1;
    }
    return this.space.startBound(namespace);
  }

  lastProcessed(namespace: Namespace): number | null {
    return this.progress[namespace].last;
  }

  advance(namespace: Namespace, number: number): void {
    const entry = this.progress[namespace];
    if (entry.last === null || number > entry.last) {
      entry.last = number;
    }
  }

  markInconclusive(namespace: Namespace, number: number): void {
    this.progress[namespace].inconclusive.add(number);
  }

  resolve(namespace: Namespace, number: number): void {
    this.progress[namespace].inconclusive.delete(number);
  }

  inconclusive(namespace: Namespace): number[] {
    return [...this.progress[namespace].inconclusive].sort((a, b) => a - b);
  }

  inconclusiveCount(): number {
    return NAMESPACES.reduce((total, namespace) => total + this.progress[namespace].inconclusive.size, 0);
  }

  markImagePending(namespace: Namespace, number: number): void {
    this.progress[namespace].pendingImages.add(number);
  }

  resolveImage(namespace: Namespace, number: number): void {
    this.progress[namespace].pendingImages.delete(number);
  }

  pendingImages(namespace: Namespace): number[] {
    return [...this.progress[namespace].pendingImages].sort((a, b) => a - b);
  }

  pendingImageCount(): number {
    return NAMESPACES.reduce((total, namespace) => total + this.progress[namespace].pendingImages.size, 0);
  }

  persist(): Promise<void> {
    const next = this.chain.then(() => writeFileAtomic(this.filePath, `${JSON.stringify(this.snapshot(), null, 2)}\n`));
    this.chain = next.catch(() => undefined);
    return next;
  }

  async clear(): Promise<void> {
    const next = this.chain.then(async () => {
      this.progress = emptyProgress();
      await fs.rm(this.filePath, { force: true });
    });
    this.chain = next.catch(() => undefined);
    await next;
  }

  private snapshot(): CheckpointFile {
    const describe = (namespace: Namespace) => {
      const last = this.progress[namespace].last;
      return {
        last: last === null ? null : renderCode({ namespace, number: last }),
        inconclusive: this.inconclusive(namespace).map(number => renderCode({ namespace, number })),
        pending_images: this.pendingImages(namespace).map(number => renderCode({ namespace, number }))
      };
    };
    return {
      version: 1,
      updated_at: this.now().toISOString(),
      namespaces: { doujin: describe('doujin'), commercial: describe('commercial') }
    };
  }

  private parse(raw: string): Record<Namespace, NamespaceProgress> {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceCorruptionError(this.filePath, 'Checkpoint file is not valid JSON', { cause: error });
    }
    if (!isRecord(data) || !isRecord(data.namespaces)) {
      throw new PersistenceCorruptionError(this.filePath, 'Checkpoint file has no namespaces section');
    }

    const progress = emptyProgress();
    for (const namespace of NAMESPACES) {
      const entry = data.namespaces[namespace];
      if (entry === undefined) {
        continue;
      }
      if (!isRecord(entry)) {
        throw new PersistenceCorruptionError(this.filePath, `Checkpoint entry for ${namespace} is malformed`);
      }
      if (entry.last !== null && entry.last !== undefined) {
        progress[namespace].last = this.parseNumber(entry.last, namespace);
      }
      for (const code of this.parseList(entry.inconclusive, 'Inconclusive', namespace)) {
        progress[namespace].inconclusive.add(this.parseNumber(code, namespace));
      }
      for (const code of this.parseList(entry.pending_images, 'Pending image', namespace)) {
        progress[namespace].pendingImages.add(this.parseNumber(code, namespace));
      }
    }
    return progress;
  }

  private parseList(value: unknown, label: string, namespace: Namespace): unknown[] {
    if (value === undefined) {
      return [];
    }
    if (!Array.isArray(value)) {
      throw new PersistenceCorruptionError(this.filePath, `${label} list for ${namespace} is malformed`);
    }
    return value;
  }

  private parseNumber(value: unknown, namespace: Namespace): number {
    const identifier = typeof value === 'string' ? parseCode(value) : null;
    if (!identifier || identifier.namespace !== namespace) {
      throw new PersistenceCorruptionError(this.filePath, `Unexpected identifier ${JSON.stringify(value)} under ${namespace}`);
    }
    return identifier.number;
  }
}
