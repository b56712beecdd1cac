import type { IdRange, Identifier, Namespace, NamespaceRanges } from './types.js';

const PREFIXES: Record<Namespace, string> = {
  doujin: 'RJ',
  commercial: 'VJ'
};

const CODE_REGEX = /^(RJ|VJ)(\d+)$/;

function digitWidth(number: number): number {
  if (number <= 999999) {
    return 6;
  }
  if (number <= 99999999) {
    return 8;
  }
  return String(number).length;
}

/** RJ1305 -> "RJ001305", RJ1000000 -> "RJ01000000". */
export function renderCode(identifier: Identifier): string {
  const prefix = PREFIXES[identifier.namespace];
  return `${prefix}${String(identifier.number).padStart(digitWidth(identifier.number), '0')}`;
}

export function parseCode(code: string): Identifier | null {
  const match = code.trim().toUpperCase().match(CODE_REGEX);
  if (!match) {
    return null;
  }
  const namespace: Namespace = match[1] === 'RJ' ? 'doujin' : 'commercial';
  return { namespace, number: Number.parseInt(match[2], 10) };
}

/**
 * Archive folder shared by 1000 consecutive identifiers, padded to the
 * width of the code itself: RJ001750 -> RJ001000, RJ01369500 -> RJ01369000.
 */
export function bucketFolder(identifier: Identifier): string {
  const base = Math.floor(identifier.number / 1000) * 1000;
  const width = digitWidth(identifier.number);
  return `${PREFIXES[identifier.namespace]}${String(base).padStart(width, '0')}`;
}

export function normalizeRanges(ranges: IdRange[]): IdRange[] {
  const sorted = ranges
    .filter(range => range.end >= range.start)
    .map(range => ({ start: range.start, end: range.end }))
    .sort((a, b) => a.start - b.start);

  const merged: IdRange[] = [];
  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end + 1) {
      last.end = Math.max(last.end, range.end);
    } else {
      merged.push(range);
    }
  }
  return merged;
}

export class IdentifierSpace {
  private readonly ranges: NamespaceRanges;

  constructor(ranges: NamespaceRanges) {
    this.ranges = {
      doujin: normalizeRanges(ranges.doujin),
      commercial: normalizeRanges(ranges.commercial)
    };
  }

  startBound(namespace: Namespace): number | null {
    const first = this.ranges[namespace][0];
    return first ? first.start : null;
  }

  endBound(namespace: Namespace): number | null {
    const list = this.ranges[namespace];
    const last = list[list.length - 1];
    return last ? last.end : null;
  }

  /** Identifiers at or above `resumeCursor`, ascending. Each call starts over. */
  sequence(namespace: Namespace, resumeCursor?: number): Iterable<Identifier> {
    const ranges = this.ranges[namespace];
    return {
      *[Symbol.iterator]() {
        for (const range of ranges) {
          const from = resumeCursor === undefined ? range.start : Math.max(range.start, resumeCursor);
          for (let number = from; number <= range.end; number += 1) {
            yield { namespace, number };
          }
        }
      }
    };
  }

  size(namespace: Namespace, resumeCursor?: number): number {
    let total = 0;
    for (const range of this.ranges[namespace]) {
      const from = resumeCursor === undefined ? range.start : Math.max(range.start, resumeCursor);
      if (from <= range.end) {
        total += range.end - from + 1;
      }
    }
    return total;
  }
}

export function* batches<T>(source: Iterable<T>, size: number): Generator<T[]> {
  let current: T[] = [];
  for (const value of source) {
    current.push(value);
    if (current.length >= size) {
      yield current;
      current = [];
    }
  }
  if (current.length > 0) {
    yield current;
  }
}
