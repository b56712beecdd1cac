import type { Logger } from '../../logger.js';
import type { CheckpointStore } from './checkpoint.js';
import type { WorkDatabase } from './db.js';
import type { AssetArchiver } from './downloader.js';
import { IdentifierSpace, batches, renderCode } from './identifiers.js';
import { NAMESPACES, type Identifier, type Item, type Namespace, type ProbeOutcome } from './types.js';

export type OrchestratorState =
  | { phase: 'idle' }
  | { phase: 'resuming'; namespace: Namespace }
  | { phase: 'draining'; namespace: Namespace }
  | { phase: 'finalizing' }
  | { phase: 'done' };

export interface Prober {
  probe(identifier: Identifier, signal?: AbortSignal): Promise<ProbeOutcome>;
}

export interface OrchestratorOptions {
  batchSize: number;
  graceTimeoutMs: number;
  retryInconclusive: boolean;
  downloadImages: boolean;
}

export type BatchKind = 'sweep' | 'revisit';

export interface BatchReport {
  namespace: Namespace;
  kind: BatchKind;
  first: string;
  last: string;
  size: number;
  probed: number;
  found: number;
  notFound: number;
  rejected: number;
  inconclusive: number;
  skippedKnown: number;
  imagesDownloaded: number;
  imagesExisting: number;
  imagesFailed: number;
  totalItems: number;
  remaining: number;
}

type ImageTally = Pick<BatchReport, 'imagesDownloaded' | 'imagesExisting' | 'imagesFailed'>;

interface ArchiveTarget {
  number: number;
  item: Item;
  imageUrl?: string | null;
}

export interface RunSummary {
  batches: number;
  probed: number;
  found: number;
  notFound: number;
  rejected: number;
  inconclusive: number;
  skippedKnown: number;
  imagesDownloaded: number;
  imagesExisting: number;
  imagesFailed: number;
  totalItems: number;
  pendingInconclusive: number;
  pendingImages: number;
  interrupted: boolean;
  completed: boolean;
  durationMs: number;
}

export interface OrchestratorDeps {
  space: IdentifierSpace;
  fetcher: Prober;
  checkpoint: CheckpointStore;
  db: WorkDatabase;
  archiver: AssetArchiver | null;
  logger: Logger;
  options: OrchestratorOptions;
  onBatch?: (report: BatchReport) => void;
  onStateChange?: (state: OrchestratorState) => void;
}

/**
 * Waits for every task, unless `signal` fires: then waits at most `graceMs`
 * longer. Slots of tasks that had not settled by then stay undefined.
 */
export async function collectWithin<T>(
  tasks: Promise<T>[],
  signal: AbortSignal | undefined,
  graceMs: number
): Promise<Array<T | undefined>> {
  const results: Array<T | undefined> = tasks.map(() => undefined);
  const all = Promise.all(
    tasks.map((task, index) =>
      task.then(value => {
        results[index] = value;
      })
    )
  );
  all.catch(() => undefined);

  if (!signal) {
    await all;
    return results;
  }

  let timer: NodeJS.Timeout | undefined;
  let onAbort: () => void = () => undefined;
  const grace = new Promise<void>(resolve => {
    onAbort = () => {
      timer = setTimeout(resolve, graceMs);
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    await Promise.race([all, grace]);
  } finally {
    clearTimeout(timer);
    signal.removeEventListener('abort', onAbort);
  }
  return [...results];
}

export class CrawlOrchestrator {
  private current: OrchestratorState = { phase: 'idle' };
  private readonly space: IdentifierSpace;
  private readonly fetcher: Prober;
  private readonly checkpoint: CheckpointStore;
  private readonly db: WorkDatabase;
  private readonly archiver: AssetArchiver | null;
  private readonly logger: Logger;
  private readonly options: OrchestratorOptions;
  private readonly onBatch?: (report: BatchReport) => void;
  private readonly onStateChange?: (state: OrchestratorState) => void;

  constructor(deps: OrchestratorDeps) {
    this.space = deps.space;
    this.fetcher = deps.fetcher;
    this.checkpoint = deps.checkpoint;
    this.db = deps.db;
    this.archiver = deps.archiver;
    this.logger = deps.logger;
    this.options = deps.options;
    this.onBatch = deps.onBatch;
    this.onStateChange = deps.onStateChange;
  }

  get state(): OrchestratorState {
    return this.current;
  }

  async run(signal?: AbortSignal): Promise<RunSummary> {
    const startedAt = Date.now();
    const summary: RunSummary = {
      batches: 0,
      probed: 0,
      found: 0,
      notFound: 0,
      rejected: 0,
      inconclusive: 0,
      skippedKnown: 0,
      imagesDownloaded: 0,
      imagesExisting: 0,
      imagesFailed: 0,
      totalItems: this.db.size,
      pendingInconclusive: 0,
      pendingImages: 0,
      interrupted: false,
      completed: false,
      durationMs: 0
    };
    const addImages = (tally: ImageTally) => {
      summary.imagesDownloaded += tally.imagesDownloaded;
      summary.imagesExisting += tally.imagesExisting;
      summary.imagesFailed += tally.imagesFailed;
    };
    const record = (report: BatchReport) => {
      summary.batches += 1;
      summary.probed += report.probed;
      summary.found += report.found;
      summary.notFound += report.notFound;
      summary.rejected += report.rejected;
      summary.inconclusive += report.inconclusive;
      summary.skippedKnown += report.skippedKnown;
      addImages(report);
    };

    for (const namespace of NAMESPACES) {
      if (signal?.aborted) {
        break;
      }
      this.setState({ phase: 'resuming', namespace });
      addImages(await this.retryPendingImages(namespace, signal));

      if (this.options.retryInconclusive) {
        const pending = this.checkpoint.inconclusive(namespace).map(number => ({ namespace, number }));
        if (pending.length > 0) {
          this.logger.info(`Revisiting ${pending.length} inconclusive ${namespace} identifier(s)`);
        }
        for (const batch of batches(pending, this.options.batchSize)) {
          if (signal?.aborted) {
            break;
          }
          record(await this.processBatch(namespace, batch, 'revisit', signal));
        }
      }

      const cursor = this.checkpoint.resumeCursor(namespace);
      if (cursor === null || signal?.aborted) {
        continue;
      }
      const remaining = this.space.size(namespace, cursor);
      if (remaining === 0) {
        this.logger.debug(`Nothing left to sweep in ${namespace}`);
        continue;
      }

      this.setState({ phase: 'draining', namespace });
      this.logger.info(`Sweeping ${namespace} from ${renderCode({ namespace, number: cursor })} (${remaining} identifiers left)`);
      for (const batch of batches(this.space.sequence(namespace, cursor), this.options.batchSize)) {
        if (signal?.aborted) {
          break;
        }
        record(await this.processBatch(namespace, batch, 'sweep', signal));
      }
    }

    summary.interrupted = Boolean(signal?.aborted);
    this.setState({ phase: 'finalizing' });
    await this.db.flush(true);
    await this.checkpoint.persist();

    summary.pendingInconclusive = this.checkpoint.inconclusiveCount();
    summary.pendingImages = this.checkpoint.pendingImageCount();
    if (!summary.interrupted && summary.pendingInconclusive === 0) {
      await this.checkpoint.clear();
      summary.completed = true;
      this.logger.info('Every namespace has been swept; checkpoint cleared for the next run');
    }

    summary.totalItems = this.db.size;
    summary.durationMs = Date.now() - startedAt;
    this.setState({ phase: 'done' });
    return summary;
  }

  private async processBatch(namespace: Namespace, identifiers: Identifier[], kind: BatchKind, signal?: AbortSignal): Promise<BatchReport> {
    const report: BatchReport = {
      namespace,
      kind,
      first: renderCode(identifiers[0]),
      last: renderCode(identifiers[identifiers.length - 1]),
      size: identifiers.length,
      probed: 0,
      found: 0,
      notFound: 0,
      rejected: 0,
      inconclusive: 0,
      skippedKnown: 0,
      imagesDownloaded: 0,
      imagesExisting: 0,
      imagesFailed: 0,
      totalItems: 0,
      remaining: 0
    };

    const known: ArchiveTarget[] = [];
    const toProbe: Identifier[] = [];
    for (const identifier of identifiers) {
      const item = this.db.get(renderCode(identifier));
      if (item) {
        known.push({ number: identifier.number, item });
        this.checkpoint.resolve(namespace, identifier.number);
      } else {
        toProbe.push(identifier);
      }
    }
    report.skippedKnown = known.length;
    report.probed = toProbe.length;

    const outcomes = await collectWithin(
      toProbe.map(identifier => this.fetcher.probe(identifier, signal)),
      signal,
      this.options.graceTimeoutMs
    );

    const found: ArchiveTarget[] = [];
    outcomes.forEach((outcome, index) => {
      const identifier = toProbe[index];
      if (!outcome || outcome.kind === 'inconclusive') {
        this.checkpoint.markInconclusive(namespace, identifier.number);
        report.inconclusive += 1;
        return;
      }
      this.checkpoint.resolve(namespace, identifier.number);
      if (outcome.kind === 'found') {
        if (this.db.upsert(outcome.item)) {
          report.found += 1;
        }
        found.push({ number: identifier.number, item: outcome.item, imageUrl: outcome.imageUrl });
      } else if (outcome.kind === 'not-found') {
        report.notFound += 1;
      } else {
        report.rejected += 1;
        this.logger.debug(`${renderCode(identifier)} skipped: site ${outcome.siteId}`);
      }
    });

    const archiver = this.options.downloadImages ? this.archiver : null;
    if (archiver) {
      await this.archive(namespace, archiver, [...found, ...known], report, signal);
    }

    if (kind === 'sweep') {
      this.checkpoint.advance(namespace, identifiers[identifiers.length - 1].number);
    }
    await this.db.flush();
    await this.checkpoint.persist();

    report.totalItems = this.db.size;
    const next = this.checkpoint.resumeCursor(namespace);
    report.remaining = next === null ? 0 : this.space.size(namespace, next);

    this.logger.debug(
      `${report.first}-${report.last}: found ${report.found}, not found ${report.notFound}, rejected ${report.rejected}, ` +
        `inconclusive ${report.inconclusive}, known ${report.skippedKnown} (${report.totalItems} items)`
    );
    this.onBatch?.(report);
    return report;
  }

  /** Re-ensures images an earlier batch could not save. */
  private async retryPendingImages(namespace: Namespace, signal?: AbortSignal): Promise<ImageTally> {
    const tally: ImageTally = { imagesDownloaded: 0, imagesExisting: 0, imagesFailed: 0 };
    const archiver = this.options.downloadImages ? this.archiver : null;
    const pending = this.checkpoint.pendingImages(namespace);
    if (!archiver || pending.length === 0) {
      return tally;
    }

    this.logger.info(`Retrying ${pending.length} missing ${namespace} image(s)`);
    for (const numbers of batches(pending, this.options.batchSize)) {
      if (signal?.aborted) {
        break;
      }
      const targets: ArchiveTarget[] = [];
      for (const number of numbers) {
        const item = this.db.get(renderCode({ namespace, number }));
        if (item) {
          targets.push({ number, item });
        } else {
          this.checkpoint.resolveImage(namespace, number);
        }
      }
      await this.archive(namespace, archiver, targets, tally, signal);
      await this.checkpoint.persist();
    }
    return tally;
  }

  /**
   * Ensures each target's image, waiting at most the grace period once
   * interrupted. Targets that end without a file on disk stay pending.
   */
  private async archive(
    namespace: Namespace,
    archiver: AssetArchiver,
    targets: ArchiveTarget[],
    tally: ImageTally,
    signal?: AbortSignal
  ): Promise<void> {
    const results = await collectWithin(
      targets.map(target => archiver.ensure(target.item, target.imageUrl)),
      signal,
      this.options.graceTimeoutMs
    );
    results.forEach((result, index) => {
      const { number } = targets[index];
      if (result?.status === 'downloaded') {
        tally.imagesDownloaded += 1;
        this.checkpoint.resolveImage(namespace, number);
      } else if (result?.status === 'existing') {
        tally.imagesExisting += 1;
        this.checkpoint.resolveImage(namespace, number);
      } else if (result?.status === 'skipped') {
        this.checkpoint.resolveImage(namespace, number);
      } else {
        tally.imagesFailed += 1;
        this.checkpoint.markImagePending(namespace, number);
      }
    });
  }

  private setState(state: OrchestratorState): void {
    this.current = state;
    this.onStateChange?.(state);
  }
}
