import type { Config } from '../shared/config.js';
import type { PagePacer } from './paging.js';

/** [min, max] seconds. */
export type DelayWindow = readonly [number, number];

export type RandomFn = () => number;

export interface BackoffOptions {
  maxConsecutiveFailures: number;
  baseDelay: DelayWindow;
  jitterStdDev: number;
  minDelay: number;
  longPauseProbability: number;
  longPause: DelayWindow;
  restEveryPages: number;
  rest: DelayWindow;
  errorDelay: DelayWindow;
}

export type PacingFamily = 'feed' | 'light' | 'archive';

/**
 * Pacing shared by every paged fetcher. Between pages the delay is a jittered base
 * (floored at `minDelay`), plus an occasional long pause, plus a forced rest every
 * `restEveryPages` pages; the three stack.
 */
export class BackoffPolicy implements PagePacer {
  constructor(
    readonly options: BackoffOptions,
    private readonly random: RandomFn = Math.random,
  ) {}

  get maxConsecutiveFailures(): number {
    return this.options.maxConsecutiveFailures;
  }

  /** Delay to wait after the `pagesFetched`-th page (1-based). */
  pageDelayMs(pagesFetched: number): number {
    const o = this.options;
    let seconds = Math.max(o.minDelay, this.uniform(o.baseDelay) + this.gaussian() * o.jitterStdDev);

    if (this.random() < o.longPauseProbability) {
      seconds += this.uniform(o.longPause);
    }
    if (o.restEveryPages > 0 && pagesFetched > 0 && pagesFetched % o.restEveryPages === 0) {
      seconds += this.uniform(o.rest);
    }
    return Math.round(seconds * 1000);
  }

  errorDelayMs(): number {
    return Math.round(this.uniform(this.options.errorDelay) * 1000);
  }

  private uniform([min, max]: DelayWindow): number {
    return min + this.random() * (max - min);
  }

  // Box-Muller; 1 - random() keeps the log argument above zero.
  private gaussian(): number {
    const u1 = 1 - this.random();
    const u2 = this.random();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }
}

export function backoffOptionsFromConfig(fetch: Config['fetch'], family: PacingFamily): BackoffOptions {
  const baseDelay =
    family === 'light' ? fetch.light_delay : family === 'archive' ? fetch.archive_delay : fetch.feed_delay;
  return {
    maxConsecutiveFailures: fetch.max_consecutive_errors,
    baseDelay,
    jitterStdDev: fetch.jitter_stddev,
    minDelay: fetch.min_delay,
    longPauseProbability: fetch.long_pause_probability,
    longPause: fetch.long_pause,
    restEveryPages: fetch.rest_every_pages,
    rest: fetch.rest,
    errorDelay: fetch.error_delay,
  };
}

/** Pacers per source family: feed (liked, replied), light (at-mentions, system) and archive. */
export interface Pacing {
  feed: PagePacer;
  light: PagePacer;
  archive: PagePacer;
}

export function pacingFromConfig(fetch: Config['fetch'], random: RandomFn = Math.random): Pacing {
  return {
    feed: new BackoffPolicy(backoffOptionsFromConfig(fetch, 'feed'), random),
    light: new BackoffPolicy(backoffOptionsFromConfig(fetch, 'light'), random),
    archive: new BackoffPolicy(backoffOptionsFromConfig(fetch, 'archive'), random),
  };
}
