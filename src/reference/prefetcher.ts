import { ItemFetcher } from './item-fetcher';
import { mapBounded } from './bounded-pool';
import { logger } from '../observability/logger';
import { prefetchItemsTotal } from '../observability/metrics';

export interface WarmReport {
  category: string;
  /** Items in the category listing */
  listed: number;
  /** Items fetched through to the upstream during this run */
  fetched: number;
  /** Items already cached and left alone */
  skipped: number;
  failed: number;
  /** Set when the category listing itself could not be fetched */
  error?: string;
  durationMs: number;
}

export interface PrefetcherOptions {
  /** Categories warmed when start() is called without arguments */
  categories: readonly string[];
  /** Max in-flight item fetches per category lane */
  concurrency: number;
}

/**
 * Warms the cache for hot categories in the background.
 *
 * One lane per category, each lane bounded to `concurrency` item fetches.
 * Items already cached are skipped, so re-running a warm-up costs no
 * upstream calls for fresh entries.
 */
export class Prefetcher {
  private current?: Promise<void>;
  private last?: WarmReport[];
  private readonly log = logger.child({ component: 'prefetcher' });

  constructor(
    private readonly fetcher: ItemFetcher,
    private readonly options: PrefetcherOptions,
  ) {}

  /**
   * Launch a detached warm-up. Returns false when one is already running
   * (the running warm-up is left alone).
   */
  start(categories: readonly string[] = this.options.categories): boolean {
    if (this.current) {
      this.log.warn({ categories }, 'Prefetch already running, skipping');
      return false;
    }

    this.log.info({ categories, concurrency: this.options.concurrency }, 'Prefetch started');
    this.current = this.warm(categories)
      .then((reports) => {
        this.log.info(
          {
            fetched: reports.reduce((n, r) => n + r.fetched, 0),
            skipped: reports.reduce((n, r) => n + r.skipped, 0),
            failed: reports.reduce((n, r) => n + r.failed, 0),
          },
          'Prefetch completed',
        );
      })
      .catch((err: unknown) => {
        this.log.error({ err }, 'Prefetch run failed');
      })
      .finally(() => {
        this.current = undefined;
      });
    return true;
  }

  /** Warm the given categories and resolve once every lane has finished */
  async warm(categories: readonly string[]): Promise<WarmReport[]> {
    const reports = await Promise.all(categories.map((category) => this.warmCategory(category)));
    this.last = reports;
    return reports;
  }

  isRunning(): boolean {
    return this.current !== undefined;
  }

  lastReport(): WarmReport[] | undefined {
    return this.last;
  }

  /**
   * Shutdown hook: resolves true once the running warm-up settles,
   * or false if `timeoutMs` elapses first.
   */
  async drain(timeoutMs?: number): Promise<boolean> {
    const running = this.current;
    if (!running) return true;
    if (timeoutMs === undefined) {
      await running;
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([running.then((): true => true), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async warmCategory(category: string): Promise<WarmReport> {
    const start = Date.now();
    const report: WarmReport = { category, listed: 0, fetched: 0, skipped: 0, failed: 0, durationMs: 0 };

    const list = await this.fetcher.fetchCategoryList(category);
    if (!list.ok) {
      report.error = list.error.message;
      report.durationMs = Date.now() - start;
      prefetchItemsTotal.inc({ category, outcome: 'list_failed' });
      this.log.warn({ category, error: list.error }, 'Prefetch skipped category; listing unavailable');
      return report;
    }
    report.listed = list.value.length;

    await mapBounded(list.value, this.options.concurrency, async (summary) => {
      try {
        if (await this.fetcher.isItemCached(category, summary.index)) {
          report.skipped++;
          prefetchItemsTotal.inc({ category, outcome: 'skipped' });
          return;
        }

        const result = await this.fetcher.fetchItem(category, summary.index);
        if (result.ok) {
          report.fetched++;
          prefetchItemsTotal.inc({ category, outcome: 'fetched' });
        } else {
          report.failed++;
          prefetchItemsTotal.inc({ category, outcome: 'failed' });
          this.log.warn({ category, index: summary.index, error: result.error }, 'Prefetch item failed');
        }
      } catch (err) {
        report.failed++;
        prefetchItemsTotal.inc({ category, outcome: 'failed' });
        this.log.warn({ err, category, index: summary.index }, 'Prefetch item threw');
      }
    });

    report.durationMs = Date.now() - start;
    this.log.info(
      { category, listed: report.listed, fetched: report.fetched, skipped: report.skipped, failed: report.failed },
      'Category prefetch complete',
    );
    return report;
  }
}
