import { readFileIfExists, writeFileAtomic } from '../../atomicWrite.js';
import { PersistenceCorruptionError } from '../../errors.js';
import { TRANSLATION_NOT_AVAILABLE, type DatabaseFile, type Item, type StoredItem } from './types.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as "YYYY-MM-DD HH:MM:SS". */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStored(item: Item): StoredItem {
  return {
    maker: item.maker,
    code: item.code,
    title: item.title,
    'translate-title': item.translateTitle
  };
}

export class WorkDatabase {
  private readonly entries: Item[] = [];
  private readonly byCode = new Map<string, Item>();
  private readonly dbPath: string;
  private readonly now: () => Date;
  private pendingWrites = 0;
  private chain: Promise<void> = Promise.resolve();

  private constructor(dbPath: string, items: Item[], now: () => Date) {
    this.dbPath = dbPath;
    this.now = now;
    for (const item of items) {
      this.insert(item);
    }
  }

  static async create(dbPath: string, options: { now?: () => Date } = {}): Promise<WorkDatabase> {
    const raw = await readFileIfExists(dbPath);
    const items = raw === null ? [] : parseDatabase(raw, dbPath);
    return new WorkDatabase(dbPath, items, options.now ?? (() => new Date()));
  }

  get size(): number {
    return this.entries.length;
  }

  get pending(): number {
    return this.pendingWrites;
  }

  has(code: string): boolean {
    return this.byCode.has(code);
  }

  get(code: string): Item | undefined {
    return this.byCode.get(code);
  }

  items(): Item[] {
    return [...this.entries];
  }

  /** Returns false when the code is already stored; the stored entry is kept. */
  upsert(item: Item): boolean {
    if (!this.insert(item)) {
      return false;
    }
    this.pendingWrites += 1;
    return true;
  }

  /**
   * Writes the items as they stand when this flush starts. Flushes run one
   * after another; upserts made meanwhile are picked up by the next one.
   */
  flush(force = false): Promise<void> {
    const next = this.chain.then(async () => {
      if (!force && this.pendingWrites === 0) {
        return;
      }
      const written = this.pendingWrites;
      const payload: DatabaseFile = {
        updated_at: formatTimestamp(this.now()),
        items: this.entries.map(toStored)
      };
      await writeFileAtomic(this.dbPath, `${JSON.stringify(payload, null, 2)}\n`);
      this.pendingWrites -= written;
    });
    this.chain = next.catch(() => undefined);
    return next;
  }

  async close(): Promise<void> {
    await this.flush(true);
  }

  private insert(item: Item): boolean {
    if (this.byCode.has(item.code)) {
      return false;
    }
    const copy = { ...item };
    this.entries.push(copy);
    this.byCode.set(copy.code, copy);
    return true;
  }
}

export function parseDatabase(raw: string, dbPath: string): Item[] {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new PersistenceCorruptionError(dbPath, 'Database file is not valid JSON', { cause: error });
  }

  // Older files are a bare array of entries.
  const list = Array.isArray(data) ? data : isRecord(data) ? data.items : undefined;
  if (!Array.isArray(list)) {
    throw new PersistenceCorruptionError(dbPath, 'Database file has no items list');
  }

  return list.map((entry, index) => {
    if (!isRecord(entry) || typeof entry.code !== 'string' || !entry.code) {
      throw new PersistenceCorruptionError(dbPath, `Database entry ${index} has no code`);
    }
    const translated = entry['translate-title'];
    return {
      maker: typeof entry.maker === 'string' ? entry.maker : 'Unknown',
      code: entry.code,
      title: typeof entry.title === 'string' ? entry.title : '',
      translateTitle: typeof translated === 'string' ? translated : TRANSLATION_NOT_AVAILABLE
    };
  });
}
