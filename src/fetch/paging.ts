import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { sleep as defaultSleep, type SleepFn } from '../shared/utils.js';
import type { Decoded } from './decode.js';

/** One decoded page plus the position of the page after it (null at end of feed). */
export interface PageResult<P, T> {
  items: Decoded<T>[];
  next: P | null;
}

export interface PagedSource<P, T> {
  readonly name: string;
  fetchPage(position: P): Promise<PageResult<P, T>>;
}

/** The part of the backoff policy the walk needs. */
export interface PagePacer {
  readonly maxConsecutiveFailures: number;
  pageDelayMs(pagesFetched: number): number;
  errorDelayMs(): number;
}

/** Constant delay between pages; `maxConsecutiveFailures` 1 means a failing page ends the walk. */
export class FixedPacer implements PagePacer {
  constructor(
    private readonly delayMs: number,
    readonly maxConsecutiveFailures = 1,
  ) {}

  pageDelayMs(): number {
    return this.delayMs;
  }

  errorDelayMs(): number {
    return this.delayMs;
  }
}

export interface WalkOptions {
  pacer: PagePacer;
  shouldStop?: () => boolean;
  sleep?: SleepFn;
  maxPages?: number;
}

/** Return `false` to end the walk after this item. */
export type ItemHandler<T> = (item: T) => boolean | void;

export type WalkOutcome<P> =
  | { status: 'done'; pages: number; truncated: boolean }
  | { status: 'paused'; position: P; reason: 'stopped' | 'failed'; error?: string; pages: number };

/**
 * Walk a paged source from `start` until the end of the feed, a handler asks to stop,
 * the stop signal is raised, or too many consecutive pages fail. A page's items are
 * applied only after the whole page fetched and decoded, so a paused walk resumed at
 * `position` sees every item exactly once.
 */
export async function walkPages<P, T>(
  source: PagedSource<P, T>,
  start: P,
  onItem: ItemHandler<T>,
  opts: WalkOptions,
): Promise<WalkOutcome<P>> {
  const { pacer, shouldStop, maxPages } = opts;
  const sleep = opts.sleep ?? defaultSleep;

  let position = start;
  let pages = 0;
  let failures = 0;

  while (true) {
    if (shouldStop?.()) {
      logger.info({ source: source.name, pages }, 'Walk stopped on request');
      return { status: 'paused', position, reason: 'stopped', pages };
    }
    if (maxPages !== undefined && pages >= maxPages) {
      return { status: 'done', pages, truncated: true };
    }

    let page: PageResult<P, T>;
    try {
      page = await source.fetchPage(position);
    } catch (err) {
      failures++;
      const error = errorMessage(err);
      logger.warn({ source: source.name, attempt: failures, error }, 'Page fetch failed');
      if (failures >= pacer.maxConsecutiveFailures) {
        return { status: 'paused', position, reason: 'failed', error, pages };
      }
      await sleep(pacer.errorDelayMs());
      continue;
    }

    failures = 0;
    pages++;

    for (const item of page.items) {
      if (item.kind === 'skip') {
        logger.debug({ source: source.name, reason: item.reason }, 'Skipping item');
        continue;
      }
      if (onItem(item.value) === false) {
        return { status: 'done', pages, truncated: false };
      }
    }

    if (page.next === null) {
      return { status: 'done', pages, truncated: false };
    }
    position = page.next;
    await sleep(pacer.pageDelayMs(pages));
  }
}
